import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { RecoveryRecord } from '../core/types.js';
import { NotFoundError, RepositoryError } from './errors.js';

/** Pre-isolation security-group membership, keyed by instance id. */
export interface RecoveryStore {
  save(record: RecoveryRecord): Promise<RecoveryRecord>;
  find(instanceId: string): Promise<RecoveryRecord | null>;
  get(instanceId: string): Promise<RecoveryRecord>;
  remove(instanceId: string): Promise<void>;
  list(): Promise<RecoveryRecord[]>;
  /** Human-readable location of the record, shown to the operator and in reports. */
  locate(instanceId: string): string;
}

const recordSchema = z.object({
  instanceId: z.string().min(1),
  groupIds: z.array(z.string().min(1)),
  quarantineGroupId: z.string().min(1),
  savedAt: z.string().datetime(),
});

const FILE_PREFIX = 'original-sgs-';
const SAFE_ID = /^[A-Za-z0-9._-]+$/;

function map(row: z.infer<typeof recordSchema>): RecoveryRecord {
  return {
    instanceId: row.instanceId,
    groupIds: row.groupIds,
    quarantineGroupId: row.quarantineGroupId,
    savedAt: new Date(row.savedAt),
  };
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One JSON file per instance. Writes go through a temp file and rename so a
 * reader never sees a half-written record; concurrent writers for the same
 * instance are last-writer-wins.
 */
export class FileRecoveryRepository implements RecoveryStore {
  constructor(private readonly directory: string) {}

  locate(instanceId: string): string {
    if (!SAFE_ID.test(instanceId)) {
      throw new RepositoryError(`Invalid instance id for recovery record: ${instanceId}`);
    }
    return path.join(this.directory, `${FILE_PREFIX}${instanceId}.json`);
  }

  async save(record: RecoveryRecord): Promise<RecoveryRecord> {
    const file = this.locate(record.instanceId);
    const body = JSON.stringify(
      {
        instanceId: record.instanceId,
        groupIds: record.groupIds,
        quarantineGroupId: record.quarantineGroupId,
        savedAt: record.savedAt.toISOString(),
      },
      null,
      2,
    );
    const tmp = `${file}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(tmp, body + '\n', 'utf8');
      await fs.rename(tmp, file);
      return record;
    } catch (err) {
      throw new RepositoryError(`Failed to save recovery record for ${record.instanceId}`, err);
    }
  }

  async find(instanceId: string): Promise<RecoveryRecord | null> {
    // No record can be stored under an id that fails the filename check.
    if (!SAFE_ID.test(instanceId)) return null;
    const file = this.locate(instanceId);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw new RepositoryError(`Failed to read recovery record for ${instanceId}`, err);
    }
    return map(this.parse(raw, file));
  }

  async get(instanceId: string): Promise<RecoveryRecord> {
    const record = await this.find(instanceId);
    if (!record) throw new NotFoundError(`No recovery record for instance ${instanceId}`);
    return record;
  }

  async remove(instanceId: string): Promise<void> {
    if (!SAFE_ID.test(instanceId)) return;
    try {
      await fs.unlink(this.locate(instanceId));
    } catch (err) {
      if (isMissing(err)) return;
      throw new RepositoryError(`Failed to remove recovery record for ${instanceId}`, err);
    }
  }

  async list(): Promise<RecoveryRecord[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (err) {
      if (isMissing(err)) return [];
      throw new RepositoryError('Failed to list recovery records', err);
    }
    const records: RecoveryRecord[] = [];
    for (const name of names.sort()) {
      if (!name.startsWith(FILE_PREFIX) || !name.endsWith('.json')) continue;
      const file = path.join(this.directory, name);
      let raw: string;
      try {
        raw = await fs.readFile(file, 'utf8');
      } catch (err) {
        // Removed by a concurrent restore after the directory was read.
        if (isMissing(err)) continue;
        throw new RepositoryError(`Failed to read recovery record ${file}`, err);
      }
      records.push(map(this.parse(raw, file)));
    }
    return records;
  }

  private parse(raw: string, file: string): z.infer<typeof recordSchema> {
    try {
      return recordSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new RepositoryError(`Corrupt recovery record ${file}`, err);
    }
  }
}
