import { describe, it, expect } from 'vitest';
import { computeHashChain, sha256Hex } from '../../src/utils/hashChain.js';

describe('computeHashChain', () => {
  it('produces deterministic value', () => {
    const a = computeHashChain(null, '{"a":1}');
    const b = computeHashChain(null, '{"a":1}');
    expect(a).toEqual(b);
  });
  it('changes with prev hash', () => {
    const base = computeHashChain(null, '{"a":1}');
    const chained = computeHashChain(base, '{"a":1}');
    expect(chained).not.toEqual(base);
  });
  it('treats a missing prev like an empty one', () => {
    expect(computeHashChain(undefined, 'x')).toEqual(computeHashChain(null, 'x'));
    expect(computeHashChain(null, 'x')).toEqual(sha256Hex('x'));
  });
});

describe('sha256Hex', () => {
  it('hashes utf8 content', () => {
    expect(sha256Hex('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});
