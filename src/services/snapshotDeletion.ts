import { DeletionError, ProviderError, SelectError, errorMessage } from '../core/errors.js';
import type { Snapshot, WrittenReport } from '../core/types.js';
import { getLogger } from '../utils/logging.js';
import { chooseFromList } from './instanceSelector.js';
import { tracked, type WorkflowContext } from './workflowContext.js';

export const DELETE_TOKEN = 'DELETE';

export interface DeletionRequest {
  snapshotId?: string;
  /** Undefined means ask; blank fails with REASON_REQUIRED. */
  reason?: string;
  /** Must equal DELETE exactly; undefined means ask. */
  confirmation?: string;
  /** Must be "yes"; undefined means ask. */
  acknowledgement?: string;
  reportDirectory?: string;
}

export type DeletionOutcome =
  | { status: 'cancelled'; snapshotId?: string }
  | { status: 'deleted'; snapshotId: string; report: WrittenReport };

export function describeSnapshot(s: Snapshot): string {
  const started = s.startTime?.toISOString() ?? 'unknown';
  return `${s.id} | ${s.tags['Name'] ?? 'No Name'} | ${s.sizeGiB}GB | ${started} | ${s.state}`;
}

export class SnapshotDeletion {
  constructor(private readonly ctx: WorkflowContext) {}

  deleteSnapshot(req: DeletionRequest = {}): Promise<DeletionOutcome> {
    return tracked(this.ctx, 'delete-snapshot', () => this.run(req));
  }

  private async run(req: DeletionRequest): Promise<DeletionOutcome> {
    const { provider, io, reporter } = this.ctx;
    const log = getLogger();

    let snapshotId = req.snapshotId;
    if (!snapshotId) {
      const owned = await provider.listOwnedSnapshots();
      if (owned.length > 0) io.say('Available EBS Snapshots:');
      try {
        snapshotId = (
          await chooseFromList(io, owned, { noun: 'snapshot', purpose: 'delete', describe: describeSnapshot })
        ).id;
      } catch (err) {
        if (err instanceof SelectError && err.code === 'CANCELLED') return { status: 'cancelled' };
        throw err;
      }
    }

    io.say(`Verifying snapshot ${snapshotId}...`);
    let snapshot: Snapshot | null;
    try {
      snapshot = await provider.getSnapshot(snapshotId);
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      throw new DeletionError(
        'NOT_FOUND',
        `Snapshot ${snapshotId} not found or access denied: ${err.message}`,
        err,
      );
    }
    if (!snapshot) {
      throw new DeletionError('NOT_FOUND', `Snapshot ${snapshotId} not found or access denied`);
    }

    io.say('Snapshot Details:');
    io.say(`  ID: ${snapshot.id}`);
    io.say(`  Description: ${snapshot.description}`);
    io.say(`  Size: ${snapshot.sizeGiB}GB`);
    io.say(`  Created: ${snapshot.startTime?.toISOString() ?? 'unknown'}`);
    io.say(`  State: ${snapshot.state}`);
    io.say('CRITICAL WARNING: You are about to DELETE digital evidence!');
    io.say('This action is IRREVERSIBLE and may impact legal proceedings.');

    const reason = (req.reason ?? (await io.ask('Enter reason for snapshot deletion (required): '))).trim();
    if (!reason) {
      throw new DeletionError('REASON_REQUIRED', 'Deletion reason is required for audit purposes');
    }

    const confirmation =
      req.confirmation ?? (await io.ask(`Type '${DELETE_TOKEN}' to confirm snapshot deletion: `));
    if (confirmation !== DELETE_TOKEN) {
      io.say('Operation cancelled - confirmation text did not match');
      return { status: 'cancelled', snapshotId };
    }
    const acknowledgement =
      req.acknowledgement ??
      (await io.ask('Are you absolutely sure? This cannot be undone! (yes/no): '));
    if (acknowledgement.trim().toLowerCase() !== 'yes') {
      io.say('Operation cancelled');
      return { status: 'cancelled', snapshotId };
    }

    // The audit record must exist even if the delete call is rejected.
    const report = await reporter.write(
      snapshotId,
      'SNAPSHOT_DELETION',
      [
        ['Deleted Snapshot ID', snapshot.id],
        ['Snapshot Description', snapshot.description],
        ['Snapshot Size', `${snapshot.sizeGiB}GB`],
        ['Snapshot State', snapshot.state],
        ['Snapshot Creation Time', snapshot.startTime?.toISOString() ?? 'unknown'],
        ['Source Volume', snapshot.volumeId],
        ['Source Instance', snapshot.tags['SourceInstance'] ?? 'Unknown'],
        ['Deletion Reason', reason],
        ['Deletion Authorization', 'Confirmed by operator'],
      ],
      { directory: req.reportDirectory, io },
    );

    io.say(`Deleting snapshot ${snapshotId}...`);
    try {
      await provider.deleteSnapshot(snapshotId);
    } catch (err) {
      log.error({ snapshotId, auditReport: report.path, err: errorMessage(err) }, 'snapshot deletion rejected');
      throw new DeletionError(
        'PROVIDER_REJECTED',
        `Deletion of ${snapshotId} was rejected: ${errorMessage(err)} (audit record: ${report.path})`,
        err,
        report.path,
      );
    }

    log.warn({ snapshotId, reason, operator: reporter.operator }, 'evidence snapshot deleted');
    io.say(`✓ Snapshot ${snapshotId} has been successfully deleted`);
    io.say(`✓ Deletion audit log generated: ${report.path}`);
    return { status: 'deleted', snapshotId, report };
  }
}
