import { ProviderError, SelectError, errorMessage } from '../core/errors.js';
import { isAffirmative } from '../core/interaction.js';
import type { WrittenReport } from '../core/types.js';
import type { RecoveryStore } from '../repositories/recoveryRepository.js';
import { getLogger } from '../utils/logging.js';
import { InstanceSelector } from './instanceSelector.js';
import type { QuarantineManager } from './quarantineManager.js';
import type { SnapshotOutcome, SnapshotRequest, SnapshotWorkflow } from './snapshotWorkflow.js';
import { tracked, type WorkflowContext } from './workflowContext.js';

export type IsolationStep =
  | 'Idle'
  | 'GroupResolved'
  | 'InstanceVerified'
  | 'Confirmed'
  | 'Isolated'
  | 'SnapshotTriggered';

export interface IsolationRequest {
  instanceId?: string;
  /** Pre-answered confirmation; undefined means ask the operator. */
  confirm?: boolean;
  /** Whether to preserve volumes afterwards; undefined means ask. */
  snapshotAfter?: boolean;
  snapshot?: Omit<SnapshotRequest, 'instanceId' | 'reportDirectory'>;
  reportDirectory?: string;
}

export interface IsolatedOutcome {
  status: 'isolated';
  step: IsolationStep;
  instanceId: string;
  quarantineGroupId: string;
  originalGroupIds: string[];
  recoveryLocation: string;
  report: WrittenReport;
  snapshots?: SnapshotOutcome;
  snapshotError?: string;
}

export type IsolationOutcome =
  | { status: 'cancelled'; step: IsolationStep; instanceId?: string }
  | { status: 'already-isolated'; step: IsolationStep; instanceId: string; quarantineGroupId: string }
  | IsolatedOutcome;

/**
 * Idle → GroupResolved → InstanceVerified → Confirmed → Isolated → (SnapshotTriggered).
 * A provider failure stops the sequence where it is; nothing is rolled back, and a
 * recovery record saved before a failed group swap stays usable.
 */
export class IsolationWorkflow {
  private readonly selector: InstanceSelector;

  constructor(
    private readonly ctx: WorkflowContext,
    private readonly quarantine: QuarantineManager,
    private readonly recovery: RecoveryStore,
    private readonly snapshots: SnapshotWorkflow,
  ) {
    this.selector = new InstanceSelector(ctx.provider, ctx.io);
  }

  isolate(req: IsolationRequest = {}): Promise<IsolationOutcome> {
    return tracked(this.ctx, 'isolate', () => this.run(req));
  }

  private async run(req: IsolationRequest): Promise<IsolationOutcome> {
    const { provider, io, reporter, clock } = this.ctx;
    const log = getLogger();
    let step: IsolationStep = 'Idle';
    const advance = (next: IsolationStep, fields: Record<string, unknown> = {}) => {
      step = next;
      log.debug({ step, ...fields }, 'isolation step');
    };

    io.say('Checking for quarantine security group...');
    const group = await this.quarantine.ensureQuarantineGroup();
    io.say(
      group.created
        ? `Created quarantine security group: ${group.groupId} (no inbound/outbound traffic allowed)`
        : `Using existing quarantine security group: ${group.groupId}`,
    );
    advance('GroupResolved', { groupId: group.groupId });

    let instanceId = req.instanceId;
    if (!instanceId) {
      try {
        instanceId = await this.selector.select('isolate');
      } catch (err) {
        if (err instanceof SelectError && err.code === 'CANCELLED') {
          return { status: 'cancelled', step };
        }
        throw err;
      }
    }

    io.say(`Verifying instance ${instanceId}...`);
    const instance = await provider.getInstance(instanceId);
    if (!instance) {
      throw new ProviderError('INSTANCE_NOT_FOUND', `Instance ${instanceId} not found`);
    }
    advance('InstanceVerified', { instanceId });

    const originalGroupIds = instance.securityGroups.map((g) => g.id);
    io.say('Current security groups:');
    for (const g of instance.securityGroups) io.say(`  - ${g.id} (${g.name})`);

    if (originalGroupIds.length === 1 && originalGroupIds[0] === group.groupId) {
      // Saving again would overwrite the real pre-isolation record with the quarantine group.
      io.say(`Instance ${instanceId} is already isolated by ${group.groupId}; nothing to do`);
      return {
        status: 'already-isolated',
        step,
        instanceId,
        quarantineGroupId: group.groupId,
      };
    }

    io.say('WARNING: This will isolate the instance by replacing all security groups with quarantine SG');
    io.say('The instance will be completely isolated from network traffic');
    const confirmed =
      req.confirm ?? isAffirmative(await io.ask('Are you sure you want to proceed? (yes/no): '));
    if (!confirmed) {
      io.say('Operation cancelled');
      return { status: 'cancelled', step, instanceId };
    }
    advance('Confirmed', { instanceId });

    await this.recovery.save({
      instanceId,
      groupIds: originalGroupIds,
      quarantineGroupId: group.groupId,
      savedAt: clock(),
    });
    const recoveryLocation = this.recovery.locate(instanceId);
    io.say(`Original security groups saved to: ${recoveryLocation}`);

    io.say('Applying quarantine security group...');
    await provider.setInstanceSecurityGroups(instanceId, [group.groupId]);
    advance('Isolated', { instanceId, groupId: group.groupId });
    log.info({ instanceId, quarantineGroupId: group.groupId, originalGroupIds }, 'instance isolated');

    const report = await reporter.write(
      instanceId,
      'NETWORK_ISOLATION',
      [
        ['Quarantine Security Group', group.groupId],
        ['Original Security Groups', originalGroupIds.join(', ')],
        ['Instance State', instance.state],
        ['Instance Type', instance.type],
        ['Availability Zone', instance.availabilityZone],
        ['Launch Time', instance.launchTime?.toISOString() ?? 'unknown'],
        ['Recovery Record', recoveryLocation],
      ],
      { directory: req.reportDirectory, io },
    );

    io.say(`✓ Instance ${instanceId} has been successfully isolated!`);
    io.say(`✓ Applied quarantine security group: ${group.groupId}`);
    io.say(`✓ Evidence report generated: ${report.path}`);
    io.say(`To restore connectivity run: ec2-evidence restore ${instanceId}`);

    const outcome: IsolatedOutcome = {
      status: 'isolated',
      step,
      instanceId,
      quarantineGroupId: group.groupId,
      originalGroupIds,
      recoveryLocation,
      report,
    };

    const snapshotAfter =
      req.snapshotAfter ??
      isAffirmative(
        await io.ask('Do you want to create an EBS snapshot for evidence preservation? (yes/no): '),
      );
    if (!snapshotAfter) return outcome;

    advance('SnapshotTriggered', { instanceId });
    outcome.step = step;
    try {
      outcome.snapshots = await this.snapshots.createEvidenceSnapshots({
        ...req.snapshot,
        instanceId,
        reportDirectory: req.reportDirectory,
      });
    } catch (err) {
      // isolation already happened; report the snapshot failure alongside it
      outcome.snapshotError = errorMessage(err);
      log.error({ instanceId, err: outcome.snapshotError }, 'snapshot after isolation failed');
      io.say(`✗ Snapshot creation failed: ${outcome.snapshotError}`);
    }
    return outcome;
  }
}
