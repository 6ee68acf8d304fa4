import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import { NotFoundError } from '../../src/repositories/errors.js';
import { FileRecoveryRepository } from '../../src/repositories/recoveryRepository.js';
import { parseDetails } from '../../src/services/evidenceReporter.js';
import { IsolationWorkflow } from '../../src/services/isolationWorkflow.js';
import { QuarantineManager } from '../../src/services/quarantineManager.js';
import { RestoreWorkflow } from '../../src/services/restoreWorkflow.js';
import { SnapshotWorkflow } from '../../src/services/snapshotWorkflow.js';
import { FakeCloudProvider, makeInstance } from '../utils/fakeProvider.js';
import { ScriptedInteraction, makeContext, tempDir } from '../utils/harness.js';

async function isolatedSetup(answers: string[] = []) {
  const root = tempDir();
  const reports = path.join(root, 'reports');
  const provider = new FakeCloudProvider([
    makeInstance({
      id: 'i-1',
      securityGroups: [
        { id: 'sg-web', name: 'web' },
        { id: 'sg-db', name: 'db' },
      ],
    }),
  ]);
  const io = new ScriptedInteraction(answers);
  const ctx = makeContext(provider, io, reports);
  const recovery = new FileRecoveryRepository(path.join(root, 'recovery'));
  const quarantine = new QuarantineManager(provider, { groupName: 'ec2-quarantine-sg', description: 'q' });
  await new IsolationWorkflow(ctx, quarantine, recovery, new SnapshotWorkflow(ctx, 60)).isolate({
    instanceId: 'i-1',
    confirm: true,
    snapshotAfter: false,
    reportDirectory: reports,
  });
  return { provider, io, recovery, reports, restore: new RestoreWorkflow(ctx, recovery) };
}

const groupIds = (p: FakeCloudProvider) => p.instances.get('i-1')?.securityGroups.map((g) => g.id);

describe('RestoreWorkflow', () => {
  it('re-applies exactly the recorded groups and removes the record', async () => {
    const { provider, recovery, reports, restore } = await isolatedSetup();
    expect(groupIds(provider)).toEqual(['sg-0001']);

    const outcome = await restore.restore({ instanceId: 'i-1', confirm: true, reportDirectory: reports });

    if (outcome.status !== 'restored') throw new Error(`unexpected ${outcome.status}`);
    expect(groupIds(provider)).toEqual(['sg-web', 'sg-db']);
    expect(outcome.recordRemoved).toBe(true);
    expect(await recovery.find('i-1')).toBeNull();
    expect(outcome.report.report.action).toBe('NETWORK_RESTORATION');
    const details = new Map(parseDetails(fs.readFileSync(outcome.report.path, 'utf8')));
    expect(details.get('Restored Security Groups')).toBe('sg-web, sg-db');
    expect(details.get('Removed Security Groups')).toBe('sg-0001');
    expect(details.get('Isolated Since')).toBe('2024-03-02 10:15:30 UTC');
  });

  it('keeps the record when asked', async () => {
    const { recovery, reports, restore } = await isolatedSetup();
    await restore.restore({ instanceId: 'i-1', confirm: true, keepRecord: true, reportDirectory: reports });
    expect(await recovery.find('i-1')).not.toBeNull();
  });

  it('selects from recovery records and asks for confirmation', async () => {
    const { provider, io, reports, restore } = await isolatedSetup(['1', 'no']);

    const outcome = await restore.restore({ reportDirectory: reports });

    expect(outcome).toEqual({ status: 'cancelled', instanceId: 'i-1' });
    expect(io.questions).toEqual([
      "Select recovery record to restore (1-1) or 'q' to quit: ",
      'Restore network connectivity for this instance? (yes/no): ',
    ]);
    expect(groupIds(provider)).toEqual(['sg-0001']);
  });

  it('fails with NotFoundError when no record exists', async () => {
    const { restore } = await isolatedSetup();
    await expect(restore.restore({ instanceId: 'i-other', confirm: true })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
