import { ProviderError, SelectError, errorMessage } from '../core/errors.js';
import type {
  AttachedVolume,
  EvidenceDetails,
  Instance,
  Snapshot,
  WrittenReport,
} from '../core/types.js';
import { getLogger } from '../utils/logging.js';
import { descriptionStamp } from '../utils/time.js';
import { InstanceSelector } from './instanceSelector.js';
import { tracked, type WorkflowContext } from './workflowContext.js';

export const DEFAULT_PRESERVATION_REASON = 'Digital forensics evidence collection';

export interface SnapshotRequest {
  instanceId?: string;
  /** Undefined means ask; an empty string means no case number. */
  caseNumber?: string;
  /** Undefined means ask; blank falls back to DEFAULT_PRESERVATION_REASON. */
  reason?: string;
  /** Block until every created snapshot reports completed. */
  wait?: boolean;
  reportDirectory?: string;
}

export interface CreatedSnapshot {
  snapshotId: string;
  volumeId: string;
  device: string;
  description: string;
  startTime?: Date;
  tagged: boolean;
}

export interface FailedVolume {
  volumeId: string;
  device: string;
  error: string;
}

export type SnapshotOutcome =
  | { status: 'cancelled' }
  | {
      status: 'created';
      instanceId: string;
      snapshots: CreatedSnapshot[];
      failures: FailedVolume[];
      report: WrittenReport;
      waitError?: string;
    };

export function snapshotDescription(
  instanceId: string,
  device: string,
  stamp: string,
  caseNumber?: string,
): string {
  const description = `EVIDENCE-SNAPSHOT-${instanceId}-${device}-${stamp}`;
  return caseNumber ? `CASE-${caseNumber}-${description}` : description;
}

export function evidenceTags(
  instanceId: string,
  volume: AttachedVolume,
  operator: string,
  reason: string,
  caseNumber?: string,
): Record<string, string> {
  const tags: Record<string, string> = {
    Name: `Evidence-${instanceId}-${volume.device}`,
    SourceInstance: instanceId,
    SourceVolume: volume.volumeId,
    EvidenceType: 'DigitalForensics',
    CreatedBy: operator,
    CreationReason: reason,
  };
  if (caseNumber) tags.CaseNumber = caseNumber;
  return tags;
}

export class SnapshotWorkflow {
  private readonly selector: InstanceSelector;

  constructor(
    private readonly ctx: WorkflowContext,
    private readonly waitSeconds: number,
  ) {
    this.selector = new InstanceSelector(ctx.provider, ctx.io);
  }

  createEvidenceSnapshots(req: SnapshotRequest = {}): Promise<SnapshotOutcome> {
    return tracked(this.ctx, 'snapshot', () => this.run(req));
  }

  private async run(req: SnapshotRequest): Promise<SnapshotOutcome> {
    const { provider, io, reporter, bus } = this.ctx;
    const log = getLogger();

    let instanceId = req.instanceId;
    if (!instanceId) {
      try {
        instanceId = await this.selector.select('snapshot');
      } catch (err) {
        if (err instanceof SelectError && err.code === 'CANCELLED') return { status: 'cancelled' };
        throw err;
      }
    }

    io.say('Retrieving instance information...');
    const instance = await provider.getInstance(instanceId);
    if (!instance) {
      throw new ProviderError('INSTANCE_NOT_FOUND', `Instance ${instanceId} not found`);
    }
    if (instance.volumes.length === 0) {
      throw new ProviderError('NO_VOLUMES', `No EBS volumes found attached to instance ${instanceId}`);
    }
    io.say(`Found ${instance.volumes.length} EBS volume(s) attached to instance:`);
    for (const v of instance.volumes) io.say(`  - Volume: ${v.volumeId} (Device: ${v.device})`);

    const caseNumber = (
      req.caseNumber ?? (await io.ask('Enter case/incident number (optional, press Enter to skip): '))
    ).trim();
    const reason =
      (req.reason ?? (await io.ask('Enter reason for evidence preservation: '))).trim() ||
      DEFAULT_PRESERVATION_REASON;

    const stamp = descriptionStamp(this.ctx.clock());
    const snapshots: CreatedSnapshot[] = [];
    const failures: FailedVolume[] = [];

    io.say('Creating snapshots...');
    for (const volume of instance.volumes) {
      const description = snapshotDescription(instanceId, volume.device, stamp, caseNumber || undefined);
      io.say(`  Creating snapshot for volume ${volume.volumeId} (${volume.device})...`);
      let created: Snapshot | undefined;
      try {
        created = await provider.createSnapshot({ volumeId: volume.volumeId, description });
      } catch (err) {
        const error = errorMessage(err);
        failures.push({ volumeId: volume.volumeId, device: volume.device, error });
        log.error({ instanceId, volumeId: volume.volumeId, err: error }, 'snapshot creation failed');
        io.say(`  ✗ Failed to snapshot ${volume.volumeId}: ${error}`);
        await bus.emit('snapshotFailed', { instanceId, volumeId: volume.volumeId, error });
      }
      if (!created) continue;

      let tagged = true;
      try {
        await provider.tagResource(
          created.id,
          evidenceTags(instanceId, volume, reporter.operator, reason, caseNumber || undefined),
        );
      } catch (err) {
        tagged = false;
        log.warn({ snapshotId: created.id, err: errorMessage(err) }, 'snapshot tagging failed');
        io.say(`  ! Snapshot ${created.id} created but evidence tags could not be applied`);
      }

      snapshots.push({
        snapshotId: created.id,
        volumeId: volume.volumeId,
        device: volume.device,
        description,
        startTime: created.startTime,
        tagged,
      });
      await bus.emit('snapshotCreated', { instanceId, volumeId: volume.volumeId, snapshotId: created.id });
      io.say(`  ✓ Snapshot created: ${created.id}`);
    }

    if (snapshots.length === 0) {
      throw new ProviderError(
        'ALL_SNAPSHOTS_FAILED',
        `No snapshots were created for instance ${instanceId} (${failures.length} volume(s) failed)`,
      );
    }

    const report = await reporter.write(
      instanceId,
      'EBS_SNAPSHOT_CREATION',
      this.details(instance, caseNumber, reason, snapshots, failures),
      { directory: req.reportDirectory, io },
    );

    let waitError: string | undefined;
    if (req.wait) {
      io.say('Waiting for snapshots to complete...');
      try {
        await provider.waitForSnapshotsCompleted(
          snapshots.map((s) => s.snapshotId),
          this.waitSeconds,
        );
        io.say('✓ All snapshots completed');
      } catch (err) {
        waitError = errorMessage(err);
        log.warn({ instanceId, err: waitError }, 'snapshot completion wait failed');
        io.say(`! ${waitError}`);
      }
    }

    return { status: 'created', instanceId, snapshots, failures, report, waitError };
  }

  // Snapshots are numbered 1..K in creation order; skipped volumes leave no gap.
  private details(
    instance: Instance,
    caseNumber: string,
    reason: string,
    snapshots: CreatedSnapshot[],
    failures: FailedVolume[],
  ): EvidenceDetails {
    const details: EvidenceDetails = [
      ['Case Number', caseNumber || 'Not specified'],
      ['Preservation Reason', reason],
      ['Source Instance Type', instance.type],
      ['Source Instance State', instance.state],
      ['Source Instance AZ', instance.availabilityZone],
      ['Source Instance Launch Time', instance.launchTime?.toISOString() ?? 'unknown'],
      ['Total Volumes Processed', String(instance.volumes.length)],
      ['Snapshots Created', String(snapshots.length)],
      ['Snapshots Failed', String(failures.length)],
    ];
    snapshots.forEach((snap, i) => {
      const n = i + 1;
      details.push(
        [`Snapshot ${n} ID`, snap.snapshotId],
        [`Snapshot ${n} Source Volume`, snap.volumeId],
        [`Snapshot ${n} Device`, snap.device],
        [`Snapshot ${n} Start Time`, snap.startTime?.toISOString() ?? 'unknown'],
        [`Snapshot ${n} Evidence Tags`, snap.tagged ? 'applied' : 'missing'],
      );
    });
    for (const f of failures) {
      details.push([`Failed Volume ${f.volumeId} (${f.device})`, f.error]);
    }
    return details;
  }
}
