import { Command } from 'commander';
import { loadConfig, type AppConfig } from '../config/index.js';
import { errorMessage } from '../core/errors.js';
import type { Interaction } from '../core/interaction.js';
import type { Instance } from '../core/types.js';
import { verifyCustodyLedger } from '../services/custodyAudit.js';
import { createToolkit, type EvidenceToolkit } from '../services/evidenceToolkit.js';
import { getLogger } from '../utils/logging.js';

export interface CliDeps {
  io: Interaction;
  config?: () => AppConfig;
  toolkit?: (cfg: AppConfig, io: Interaction) => EvidenceToolkit;
  stderr?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

interface ReportOpts {
  reportDir?: string;
}

interface SnapshotOpts extends ReportOpts {
  caseNumber?: string;
  reason?: string;
  wait?: boolean;
}

interface IsolateOpts extends SnapshotOpts {
  yes?: boolean;
  snapshot?: boolean;
}

interface DeleteOpts extends ReportOpts {
  reason?: string;
  yes?: boolean;
}

interface RestoreOpts extends ReportOpts {
  yes?: boolean;
  keepRecord?: boolean;
}

function describeRow(i: Instance): string {
  return [i.id, i.type, i.state, i.publicIp ?? '-', i.privateIp ?? '-', i.name ?? 'No Name'].join(' | ');
}

export function buildProgram(deps: CliDeps): Command {
  const { io } = deps;
  const config = deps.config ?? (() => loadConfig());
  const toolkitFor = deps.toolkit ?? createToolkit;
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(line + '\n'));
  const setExitCode = deps.setExitCode ?? ((code: number) => (process.exitCode = code));

  let toolkit: EvidenceToolkit | null = null;
  const kit = () => (toolkit ??= toolkitFor(config(), io));

  // Errors end the run with exit code 1; a cancelled outcome is a normal return.
  const run = async (body: (kit: EvidenceToolkit) => Promise<void>, gated = true) => {
    try {
      const k = kit();
      if (gated) await k.gate.verify();
      await body(k);
    } catch (err) {
      getLogger().debug({ err: errorMessage(err) }, 'command failed');
      stderr(`Error: ${errorMessage(err)}`);
      setExitCode(1);
    }
  };

  const program = new Command();
  program
    .name('ec2-evidence')
    .description('EC2 incident response: network isolation and evidence preservation')
    .version('0.1.0')
    .enablePositionalOptions()
    // inherited by every subcommand added below; help and usage errors surface as CommanderError
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.say(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    });

  program
    .command('isolate')
    .argument('[instanceId]', 'instance to isolate; omitted means choose from a list')
    .description('Replace all security groups of an instance with the quarantine group')
    .option('-y, --yes', 'skip the isolation confirmation')
    .option('--snapshot', 'snapshot all volumes after isolating')
    .option('--no-snapshot', 'do not offer a snapshot after isolating')
    .option('--case-number <case>', 'case or incident number for the snapshots')
    .option('--reason <reason>', 'preservation reason for the snapshots')
    .option('--wait', 'wait for snapshots to complete')
    .option('--report-dir <dir>', 'directory for evidence reports')
    .action(async (instanceId: string | undefined, opts: IsolateOpts) => {
      await run(async (k) => {
        const outcome = await k.isolation.isolate({
          instanceId,
          confirm: opts.yes ? true : undefined,
          snapshotAfter: opts.snapshot,
          snapshot: { caseNumber: opts.caseNumber, reason: opts.reason, wait: opts.wait },
          reportDirectory: opts.reportDir,
        });
        if (outcome.status === 'isolated' && outcome.snapshotError) setExitCode(1);
      });
    });

  const snapshot = program
    .command('snapshot')
    .argument('[instanceId]', 'instance whose volumes to snapshot')
    .description('Create tagged evidence snapshots of every volume attached to an instance')
    .option('--case-number <case>', 'case or incident number')
    .option('--reason <reason>', 'preservation reason')
    .option('--wait', 'wait for snapshots to complete')
    .option('--report-dir <dir>', 'directory for the evidence report')
    .action(async (instanceId: string | undefined, opts: SnapshotOpts) => {
      await run(async (k) => {
        await k.snapshots.createEvidenceSnapshots({
          instanceId,
          caseNumber: opts.caseNumber,
          reason: opts.reason,
          wait: opts.wait,
          reportDirectory: opts.reportDir,
        });
      });
    });

  snapshot
    .command('delete')
    .argument('[snapshotId]', 'snapshot to delete; omitted means choose from owned snapshots')
    .description('Delete an evidence snapshot after writing a deletion audit report')
    .option('--reason <reason>', 'deletion reason (required)')
    .option('-y, --yes', 'answer both deletion confirmations')
    .option('--report-dir <dir>', 'directory for the audit report')
    .action(async (snapshotId: string | undefined, opts: DeleteOpts) => {
      await run(async (k) => {
        await k.deletion.deleteSnapshot({
          snapshotId,
          reason: opts.reason,
          confirmation: opts.yes ? 'DELETE' : undefined,
          acknowledgement: opts.yes ? 'yes' : undefined,
          reportDirectory: opts.reportDir,
        });
      });
    });

  program
    .command('restore')
    .argument('[instanceId]', 'isolated instance to restore')
    .description('Re-apply the security groups saved when the instance was isolated')
    .option('-y, --yes', 'skip the confirmation')
    .option('--keep-record', 'keep the recovery record after restoring')
    .option('--report-dir <dir>', 'directory for the evidence report')
    .action(async (instanceId: string | undefined, opts: RestoreOpts) => {
      await run(async (k) => {
        await k.restore.restore({
          instanceId,
          confirm: opts.yes ? true : undefined,
          keepRecord: opts.keepRecord,
          reportDirectory: opts.reportDir,
        });
      });
    });

  const instances = program.command('instances').description('List and power-cycle instances');
  instances
    .command('list')
    .description('List instances: id | type | state | public ip | private ip | name')
    .action(async () => {
      await run(async (k) => {
        const list = await k.instances.list();
        if (!list.length) {
          io.say('No instances found');
          return;
        }
        for (const i of list) io.say(describeRow(i));
      });
    });
  instances
    .command('start')
    .argument('<instanceId>')
    .description('Start an instance and wait until it is running')
    .option('--no-wait', 'return once the start request is accepted')
    .action(async (instanceId: string, opts: { wait: boolean }) => {
      await run(async (k) => {
        io.say(`Starting instance ${instanceId}...`);
        const result = await k.instances.start(instanceId, { wait: opts.wait });
        io.say(
          result.waited
            ? `✓ Instance ${instanceId} is running`
            : `✓ Start requested for ${instanceId} (was ${result.previousState})`,
        );
      });
    });
  instances
    .command('stop')
    .argument('<instanceId>')
    .description('Stop an instance')
    .action(async (instanceId: string) => {
      await run(async (k) => {
        const result = await k.instances.stop(instanceId);
        io.say(`✓ Stop requested for ${instanceId} (was ${result.previousState})`);
      });
    });

  const custody = program.command('custody').description('Inspect the evidence custody ledger');
  custody
    .command('list')
    .description('Print ledger entries, oldest first')
    .action(async () => {
      await run(async (k) => {
        const entries = await k.custody.list();
        if (!entries.length) {
          io.say(`Custody ledger ${k.custody.location} is empty`);
          return;
        }
        for (const e of entries) {
          io.say(`${e.recordedAt} | ${e.action} | ${e.subjectId} | ${e.operator} | ${e.reportPath}`);
        }
      }, false);
    });
  custody
    .command('verify')
    .description('Verify the hash chain of the custody ledger')
    .action(async () => {
      await run(async (k) => {
        const result = await verifyCustodyLedger(k.custody);
        if (!result.valid) {
          stderr(`Ledger INVALID: ${JSON.stringify(result.breaks, null, 2)}`);
          setExitCode(1);
          return;
        }
        io.say(`Ledger valid. Entries: ${result.entries}. Last hash: ${result.lastHash ?? 'none'}`);
      }, false);
    });

  return program;
}
