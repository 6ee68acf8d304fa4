import type { AppConfig } from '../config/index.js';
import { errorMessage } from '../core/errors.js';
import type { Interaction } from '../core/interaction.js';
import { EventBus, type EvidenceEvents } from '../events/eventBus.js';
import { bindMetrics } from '../metrics/index.js';
import { AwsCloudProvider } from '../provider/awsProvider.js';
import type { CloudProvider } from '../provider/cloudProvider.js';
import { CustodyRepository } from '../repositories/custodyRepository.js';
import { FileRecoveryRepository, type RecoveryStore } from '../repositories/recoveryRepository.js';
import { getLogger } from '../utils/logging.js';
import { CredentialGate } from './credentialGate.js';
import { EvidenceReporter } from './evidenceReporter.js';
import { InstanceManager } from './instanceManager.js';
import { IsolationWorkflow } from './isolationWorkflow.js';
import { QuarantineManager } from './quarantineManager.js';
import { RestoreWorkflow } from './restoreWorkflow.js';
import { SnapshotDeletion } from './snapshotDeletion.js';
import { SnapshotWorkflow } from './snapshotWorkflow.js';
import type { WorkflowContext } from './workflowContext.js';

export interface ToolkitOverrides {
  provider?: CloudProvider;
  recovery?: RecoveryStore;
  custody?: CustodyRepository;
  bus?: EventBus<EvidenceEvents>;
  clock?: () => Date;
  operator?: string;
  host?: string;
}

export interface EvidenceToolkit {
  provider: CloudProvider;
  bus: EventBus<EvidenceEvents>;
  reporter: EvidenceReporter;
  recovery: RecoveryStore;
  custody: CustodyRepository;
  gate: CredentialGate;
  quarantine: QuarantineManager;
  instances: InstanceManager;
  snapshots: SnapshotWorkflow;
  isolation: IsolationWorkflow;
  deletion: SnapshotDeletion;
  restore: RestoreWorkflow;
}

/**
 * Every written report is appended to the custody ledger. A ledger failure is
 * logged and does not undo the report or the cloud action it describes.
 */
export function bindCustody(bus: EventBus<EvidenceEvents>, custody: CustodyRepository): void {
  bus.on('reportWritten', async (written) => {
    try {
      const entry = await custody.append({
        action: written.report.action,
        subjectId: written.report.subjectId,
        reportPath: written.path,
        reportSha256: written.sha256,
        operator: written.report.operator,
        recordedAt: written.report.timestamp,
      });
      getLogger().debug({ entryId: entry.id, hash: entry.hashCurr }, 'custody entry appended');
    } catch (err) {
      getLogger().error(
        { reportPath: written.path, ledger: custody.location, err: errorMessage(err) },
        'custody ledger append failed',
      );
    }
  });
}

/**
 * Bus with the custody ledger (and optionally the prometheus counters) subscribed.
 * Long-lived callers build one and pass it to every toolkit they create.
 */
export function createEvidenceBus(
  custody: CustodyRepository,
  opts: { metrics?: boolean } = {},
): EventBus<EvidenceEvents> {
  const bus = new EventBus<EvidenceEvents>();
  bindCustody(bus, custody);
  if (opts.metrics) bindMetrics(bus);
  return bus;
}

export function createToolkit(
  cfg: AppConfig,
  io: Interaction,
  overrides: ToolkitOverrides = {},
): EvidenceToolkit {
  const provider =
    overrides.provider ??
    new AwsCloudProvider({ region: cfg.aws.region, profile: cfg.aws.profile });
  const clock = overrides.clock ?? (() => new Date());
  const recovery = overrides.recovery ?? new FileRecoveryRepository(cfg.recovery.directory);
  const custody = overrides.custody ?? new CustodyRepository(cfg.custody.ledgerPath);
  const bus = overrides.bus ?? createEvidenceBus(custody);

  const reporter = new EvidenceReporter({
    defaultDirectory: cfg.reports.directory,
    region: () => provider.getRegion(),
    bus,
    operator: overrides.operator,
    host: overrides.host,
    clock,
  });
  const ctx: WorkflowContext = { provider, io, reporter, bus, clock };
  const quarantine = new QuarantineManager(provider, cfg.quarantine);
  const snapshots = new SnapshotWorkflow(ctx, cfg.waiters.snapshotMaxWaitSeconds);

  return {
    provider,
    bus,
    reporter,
    recovery,
    custody,
    gate: new CredentialGate(provider),
    quarantine,
    instances: new InstanceManager(provider, cfg.waiters.instanceMaxWaitSeconds),
    snapshots,
    isolation: new IsolationWorkflow(ctx, quarantine, recovery, snapshots),
    deletion: new SnapshotDeletion(ctx),
    restore: new RestoreWorkflow(ctx, recovery),
  };
}
