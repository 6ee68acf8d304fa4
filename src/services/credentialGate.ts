import { AuthError, errorMessage } from '../core/errors.js';
import type { Identity } from '../core/types.js';
import type { CloudProvider } from '../provider/cloudProvider.js';
import { getLogger } from '../utils/logging.js';

// SDK failures that mean no usable client could be configured, as opposed to bad credentials.
const CLIENT_UNRESOLVED = [/region is missing/i, /cannot find module/i];

export class CredentialGate {
  constructor(private readonly provider: CloudProvider | null) {}

  async verify(): Promise<Identity> {
    if (!this.provider) {
      throw new AuthError('CLI_MISSING', 'AWS client is not available');
    }
    try {
      const identity = await this.provider.getCallerIdentity();
      getLogger().debug({ account: identity.account, arn: identity.arn }, 'caller identity verified');
      return identity;
    } catch (err) {
      const message = errorMessage(err);
      if (CLIENT_UNRESOLVED.some((re) => re.test(message))) {
        throw new AuthError(
          'CLI_MISSING',
          `AWS client could not be configured: ${message}. Set AWS_REGION or configure a profile.`,
          err,
        );
      }
      throw new AuthError(
        'NOT_AUTHENTICATED',
        `AWS credentials not configured or invalid: ${message}. Run 'aws configure' or set AWS environment variables.`,
        err,
      );
    }
  }
}
