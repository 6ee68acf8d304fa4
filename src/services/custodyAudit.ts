import { custodyVerificationsTotal } from '../metrics/index.js';
import type { CustodyRepository } from '../repositories/custodyRepository.js';
import { verifyCustodyChain, type ChainVerificationResult } from '../utils/chainIntegrity.js';
import { getLogger } from '../utils/logging.js';

export interface CustodyVerification extends ChainVerificationResult {
  ledger: string;
}

export async function verifyCustodyLedger(custody: CustodyRepository): Promise<CustodyVerification> {
  const result = verifyCustodyChain(await custody.list());
  custodyVerificationsTotal.inc({ result: result.valid ? 'valid' : 'invalid' });
  if (!result.valid) {
    getLogger().warn({ ledger: custody.location, breaks: result.breaks }, 'custody ledger chain broken');
  }
  return { ...result, ledger: custody.location };
}
