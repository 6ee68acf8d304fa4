import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { CustodyEntry, EvidenceAction } from '../core/types.js';
import { canonicalCustodyJson } from '../utils/chainIntegrity.js';
import { computeHashChain } from '../utils/hashChain.js';
import { RepositoryError } from './errors.js';

export interface AppendCustodyInput {
  action: EvidenceAction;
  subjectId: string;
  reportPath: string;
  reportSha256: string;
  operator: string;
  recordedAt?: Date;
}

const entrySchema = z.object({
  id: z.string().min(1),
  action: z.enum(['NETWORK_ISOLATION', 'EBS_SNAPSHOT_CREATION', 'SNAPSHOT_DELETION', 'NETWORK_RESTORATION']),
  subjectId: z.string(),
  reportPath: z.string(),
  reportSha256: z.string(),
  operator: z.string(),
  recordedAt: z.string(),
  hashPrev: z.string().nullable(),
  hashCurr: z.string(),
});

/**
 * Append-only JSON-lines ledger. Each entry links to the previous one by hash,
 * so an edited or removed line breaks verification from that point on.
 */
export class CustodyRepository {
  /** Appends run one at a time so each reads the hash the previous one wrote. */
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly ledgerPath: string) {}

  get location(): string {
    return this.ledgerPath;
  }

  async list(): Promise<CustodyEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.ledgerPath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw new RepositoryError(`Failed to read custody ledger ${this.ledgerPath}`, err);
    }
    return raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line, i) => {
        try {
          return entrySchema.parse(JSON.parse(line));
        } catch (err) {
          throw new RepositoryError(`Corrupt custody ledger line ${i + 1}`, err);
        }
      });
  }

  async latest(): Promise<CustodyEntry | null> {
    const entries = await this.list();
    return entries.length ? entries[entries.length - 1] : null;
  }

  append(input: AppendCustodyInput): Promise<CustodyEntry> {
    const run = this.tail.then(() => this.appendNext(input));
    // A failed append still rejects for its caller; the queue moves on.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async appendNext(input: AppendCustodyInput): Promise<CustodyEntry> {
    const prev = await this.latest();
    const hashPrev = prev?.hashCurr ?? null;
    const fields = {
      action: input.action,
      subjectId: input.subjectId,
      reportPath: input.reportPath,
      reportSha256: input.reportSha256,
      operator: input.operator,
      recordedAt: (input.recordedAt ?? new Date()).toISOString(),
    };
    const entry: CustodyEntry = {
      id: randomUUID(),
      ...fields,
      hashPrev,
      hashCurr: computeHashChain(hashPrev, canonicalCustodyJson(fields, hashPrev)),
    };
    try {
      await fs.mkdir(path.dirname(this.ledgerPath), { recursive: true });
      await fs.appendFile(this.ledgerPath, JSON.stringify(entry) + '\n', 'utf8');
    } catch (err) {
      throw new RepositoryError(`Failed to append custody entry to ${this.ledgerPath}`, err);
    }
    return entry;
  }
}
