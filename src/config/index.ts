import { z } from 'zod';
import fs from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { errorMessage } from '../core/errors.js';

dotenv.config();

const ConfigSchema = z.object({
  aws: z.object({
    region: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
  }),
  quarantine: z.object({
    groupName: z.string().min(1).default('ec2-quarantine-sg'),
    description: z
      .string()
      .min(1)
      .default('Quarantine Security Group for Incident Response - Blocks all traffic'),
  }),
  reports: z.object({
    directory: z.string().min(1),
  }),
  recovery: z.object({
    directory: z.string().min(1),
  }),
  custody: z.object({
    ledgerPath: z.string().min(1),
  }),
  waiters: z.object({
    snapshotMaxWaitSeconds: z.number().int().positive().default(1800),
    instanceMaxWaitSeconds: z.number().int().positive().default(300),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const FileSchema = z.record(z.unknown());
const SectionSchema = z.record(z.unknown());

function section(fileRaw: Record<string, unknown>, key: string): Record<string, unknown> {
  const parsed = SectionSchema.safeParse(fileRaw[key]);
  return parsed.success ? parsed.data : {};
}

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function loadConfig(configPath = 'evidence.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = FileSchema.parse(JSON.parse(fs.readFileSync(full, 'utf8')));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${errorMessage(e)}`);
    }
  }
  const home = os.homedir();
  const merged = {
    aws: {
      region: process.env.AWS_REGION || process.env.AWS_DEFAULT_REGION || undefined,
      profile: process.env.AWS_PROFILE || undefined,
      ...section(fileRaw, 'aws'),
    },
    quarantine: {
      groupName: process.env.QUARANTINE_GROUP_NAME || undefined,
      ...section(fileRaw, 'quarantine'),
    },
    reports: {
      directory: process.env.EVIDENCE_REPORT_DIR || path.join(home, 'Downloads'),
      ...section(fileRaw, 'reports'),
    },
    recovery: {
      directory: process.env.RECOVERY_DIR || path.join(os.tmpdir(), 'ec2-evidence-recovery'),
      ...section(fileRaw, 'recovery'),
    },
    custody: {
      ledgerPath:
        process.env.CUSTODY_LEDGER_PATH || path.join(home, '.ec2-evidence', 'custody.jsonl'),
      ...section(fileRaw, 'custody'),
    },
    waiters: {
      snapshotMaxWaitSeconds: numberFromEnv('SNAPSHOT_MAX_WAIT_SECONDS'),
      instanceMaxWaitSeconds: numberFromEnv('INSTANCE_MAX_WAIT_SECONDS'),
      ...section(fileRaw, 'waiters'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: process.env.LOG_PRETTY === '1' ? false : true,
      ...section(fileRaw, 'logging'),
    },
  };
  return ConfigSchema.parse(merged);
}
