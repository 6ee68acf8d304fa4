import { ProviderError, SelectError } from '../core/errors.js';
import { isAffirmative } from '../core/interaction.js';
import type { RecoveryRecord, WrittenReport } from '../core/types.js';
import type { RecoveryStore } from '../repositories/recoveryRepository.js';
import { getLogger } from '../utils/logging.js';
import { formatUtc } from '../utils/time.js';
import { chooseFromList } from './instanceSelector.js';
import { tracked, type WorkflowContext } from './workflowContext.js';

export interface RestoreRequest {
  instanceId?: string;
  confirm?: boolean;
  /** Keep the recovery record after a successful restore. */
  keepRecord?: boolean;
  reportDirectory?: string;
}

export type RestoreOutcome =
  | { status: 'cancelled'; instanceId?: string }
  | {
      status: 'restored';
      instanceId: string;
      restoredGroupIds: string[];
      recordRemoved: boolean;
      report: WrittenReport;
    };

function describeRecord(r: RecoveryRecord): string {
  return `${r.instanceId} | ${r.groupIds.join(', ')} | saved ${formatUtc(r.savedAt)}`;
}

/** Reverses an isolation from the saved recovery record. */
export class RestoreWorkflow {
  constructor(
    private readonly ctx: WorkflowContext,
    private readonly recovery: RecoveryStore,
  ) {}

  restore(req: RestoreRequest = {}): Promise<RestoreOutcome> {
    return tracked(this.ctx, 'restore', () => this.run(req));
  }

  private async run(req: RestoreRequest): Promise<RestoreOutcome> {
    const { provider, io, reporter } = this.ctx;

    let record: RecoveryRecord;
    if (req.instanceId) {
      record = await this.recovery.get(req.instanceId);
    } else {
      const records = await this.recovery.list();
      if (records.length > 0) io.say('Isolated instances with recovery records:');
      try {
        record = await chooseFromList(io, records, {
          noun: 'recovery record',
          purpose: 'restore',
          describe: describeRecord,
        });
      } catch (err) {
        if (err instanceof SelectError && err.code === 'CANCELLED') return { status: 'cancelled' };
        throw err;
      }
    }
    const { instanceId } = record;

    const instance = await provider.getInstance(instanceId);
    if (!instance) {
      throw new ProviderError('INSTANCE_NOT_FOUND', `Instance ${instanceId} not found`);
    }
    const currentGroupIds = instance.securityGroups.map((g) => g.id);
    io.say(`Current security groups: ${currentGroupIds.join(', ') || 'none'}`);
    io.say(`Security groups to restore: ${record.groupIds.join(', ')}`);

    const confirmed =
      req.confirm ??
      isAffirmative(await io.ask('Restore network connectivity for this instance? (yes/no): '));
    if (!confirmed) {
      io.say('Operation cancelled');
      return { status: 'cancelled', instanceId };
    }

    await provider.setInstanceSecurityGroups(instanceId, record.groupIds);
    getLogger().info({ instanceId, groupIds: record.groupIds }, 'instance network restored');

    const report = await reporter.write(
      instanceId,
      'NETWORK_RESTORATION',
      [
        ['Restored Security Groups', record.groupIds.join(', ')],
        ['Removed Security Groups', currentGroupIds.join(', ') || 'none'],
        ['Quarantine Security Group', record.quarantineGroupId],
        ['Isolated Since', formatUtc(record.savedAt)],
        ['Instance State', instance.state],
      ],
      { directory: req.reportDirectory, io },
    );

    const recordRemoved = !req.keepRecord;
    if (recordRemoved) await this.recovery.remove(instanceId);

    io.say(`✓ Restored security groups on ${instanceId}`);
    io.say(`✓ Evidence report generated: ${report.path}`);
    return { status: 'restored', instanceId, restoredGroupIds: record.groupIds, recordRemoved, report };
  }
}
