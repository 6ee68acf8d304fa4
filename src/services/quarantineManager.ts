import { ProviderError, errorMessage } from '../core/errors.js';
import type { CloudProvider } from '../provider/cloudProvider.js';
import { getLogger } from '../utils/logging.js';

export interface QuarantineSettings {
  groupName: string;
  description: string;
}

export interface QuarantineGroup {
  groupId: string;
  vpcId: string;
  created: boolean;
}

/**
 * Lookup-or-create of the quarantine security group: one per VPC, no ingress and
 * no egress. An existing group is returned as-is and never modified.
 */
export class QuarantineManager {
  constructor(
    private readonly provider: CloudProvider,
    private readonly settings: QuarantineSettings,
  ) {}

  async ensureQuarantineGroup(vpcId?: string): Promise<QuarantineGroup> {
    const log = getLogger();
    const targetVpc = vpcId ?? (await this.provider.getDefaultVpcId());
    if (!targetVpc) {
      throw new ProviderError('NO_DEFAULT_VPC', 'Could not find default VPC');
    }

    const existing = await this.provider.findSecurityGroup(this.settings.groupName, targetVpc);
    if (existing) {
      log.info({ groupId: existing.id, vpcId: targetVpc }, 'using existing quarantine group');
      return { groupId: existing.id, vpcId: targetVpc, created: false };
    }

    const groupId = await this.provider.createSecurityGroup({
      name: this.settings.groupName,
      description: this.settings.description,
      vpcId: targetVpc,
    });
    log.info({ groupId, vpcId: targetVpc }, 'created quarantine group');
    try {
      await this.provider.revokeDefaultEgress(groupId);
    } catch (err) {
      // the default rule may already be gone
      log.warn({ groupId, err: errorMessage(err) }, 'could not revoke default egress rule');
    }
    return { groupId, vpcId: targetVpc, created: true };
  }
}
