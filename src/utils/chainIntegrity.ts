import type { CustodyEntry } from '../core/types.js';
import { computeHashChain } from './hashChain.js';

export interface ChainBreak {
  index: number; // position in the ledger (oldest first)
  entryId: string;
  reason: 'PREV_MISMATCH' | 'CURR_MISMATCH';
  expected?: string | null;
  actual?: string | null;
}

export interface ChainVerificationResult {
  valid: boolean;
  breaks: ChainBreak[];
  lastHash?: string | null; // last valid hash in the verified portion
  entries: number;
}

type ChainFields = Pick<
  CustodyEntry,
  'action' | 'subjectId' | 'reportPath' | 'reportSha256' | 'operator' | 'recordedAt'
>;

// Field order is part of the hash; do not reorder.
export function canonicalCustodyJson(entry: ChainFields, prev: string | null): string {
  return JSON.stringify({
    action: entry.action,
    subjectId: entry.subjectId,
    reportPath: entry.reportPath,
    reportSha256: entry.reportSha256,
    operator: entry.operator,
    recordedAt: entry.recordedAt,
    prev,
  });
}

/**
 * Verifies the custody ledger hash chain. Entries must be in append order.
 */
export function verifyCustodyChain(entries: CustodyEntry[]): ChainVerificationResult {
  const breaks: ChainBreak[] = [];
  let prevHash: string | null = null;
  let lastValid: string | null = null;

  for (let i = 0; i < entries.length; i++) {
    const e = entries[i];
    const actualPrev = e.hashPrev ?? null;
    if (actualPrev !== prevHash) {
      breaks.push({
        index: i,
        entryId: e.id,
        reason: 'PREV_MISMATCH',
        expected: prevHash,
        actual: actualPrev,
      });
      // Once broken, later links cannot be trusted
      return { valid: false, breaks, lastHash: lastValid, entries: entries.length };
    }

    const expectedCurr = computeHashChain(prevHash, canonicalCustodyJson(e, prevHash));
    if (e.hashCurr !== expectedCurr) {
      breaks.push({
        index: i,
        entryId: e.id,
        reason: 'CURR_MISMATCH',
        expected: expectedCurr,
        actual: e.hashCurr,
      });
      return { valid: false, breaks, lastHash: lastValid, entries: entries.length };
    }

    prevHash = e.hashCurr;
    lastValid = e.hashCurr;
  }

  return { valid: true, breaks, lastHash: lastValid, entries: entries.length };
}
