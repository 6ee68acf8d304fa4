import crypto from 'crypto';

export function computeHashChain(prev: string | null | undefined, canonicalJson: string): string {
  const prevPart = prev || '';
  return crypto.createHash('sha256').update(prevPart + canonicalJson).digest('hex');
}

export function sha256Hex(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}
