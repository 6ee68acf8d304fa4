import { describe, it, expect } from 'vitest';
import { canonicalCustodyJson, verifyCustodyChain } from '../../src/utils/chainIntegrity.js';
import { computeHashChain } from '../../src/utils/hashChain.js';
import type { CustodyEntry, EvidenceAction } from '../../src/core/types.js';

function link(id: string, prev: string | null, subjectId: string, action: EvidenceAction = 'NETWORK_ISOLATION'): CustodyEntry {
  const fields = {
    action,
    subjectId,
    reportPath: `/reports/${subjectId}.txt`,
    reportSha256: 'a'.repeat(64),
    operator: 'analyst',
    recordedAt: '2024-03-02T10:15:30.000Z',
  };
  return {
    id,
    ...fields,
    hashPrev: prev,
    hashCurr: computeHashChain(prev, canonicalCustodyJson(fields, prev)),
  };
}

describe('verifyCustodyChain', () => {
  it('validates an empty ledger', () => {
    const res = verifyCustodyChain([]);
    expect(res).toEqual({ valid: true, breaks: [], lastHash: null, entries: 0 });
  });

  it('accepts a valid two-entry chain', () => {
    const e1 = link('e1', null, 'i-1');
    const e2 = link('e2', e1.hashCurr, 'i-1', 'EBS_SNAPSHOT_CREATION');
    const res = verifyCustodyChain([e1, e2]);
    expect(res.valid).toBe(true);
    expect(res.lastHash).toBe(e2.hashCurr);
    expect(res.entries).toBe(2);
  });

  it('detects an edited entry', () => {
    const e1 = link('e1', null, 'i-1');
    const e2 = link('e2', e1.hashCurr, 'i-1');
    const edited = { ...e2, reportSha256: 'b'.repeat(64) };

    const res = verifyCustodyChain([e1, edited]);

    expect(res.valid).toBe(false);
    expect(res.breaks).toEqual([
      { index: 1, entryId: 'e2', reason: 'CURR_MISMATCH', expected: expect.any(String), actual: e2.hashCurr },
    ]);
    expect(res.breaks[0].expected).not.toBe(e2.hashCurr);
    expect(res.lastHash).toBe(e1.hashCurr);
  });

  it('detects a removed entry', () => {
    const e1 = link('e1', null, 'i-1');
    const e2 = link('e2', e1.hashCurr, 'i-2');
    const e3 = link('e3', e2.hashCurr, 'i-3');

    const res = verifyCustodyChain([e1, e3]);

    expect(res.valid).toBe(false);
    expect(res.breaks[0]).toMatchObject({ index: 1, reason: 'PREV_MISMATCH', expected: e1.hashCurr, actual: e2.hashCurr });
    expect(res.lastHash).toBe(e1.hashCurr);
  });
});
