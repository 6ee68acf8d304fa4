import type { FastifyInstance, FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { NonInteractive, type Interaction } from '../../core/interaction.js';
import { verifyCustodyLedger } from '../../services/custodyAudit.js';
import type { EvidenceToolkit } from '../../services/evidenceToolkit.js';
import type { CreatedSnapshot, SnapshotOutcome } from '../../services/snapshotWorkflow.js';
import {
  deleteSnapshotBodySchema,
  isolateBodySchema,
  restoreBodySchema,
  snapshotBodySchema,
  toPublicReport,
} from '../schemas/evidenceSchemas.js';

export type EvidenceRouteOptions = {
  toolkit: (io: Interaction) => EvidenceToolkit;
  /** Used when a request names no report directory; the API never prompts for one. */
  reportDirectory: string;
};

interface IdParams {
  id: string;
}

function badRequest(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
}

function publicSnapshot(s: CreatedSnapshot) {
  return {
    snapshotId: s.snapshotId,
    volumeId: s.volumeId,
    device: s.device,
    description: s.description,
    startTime: s.startTime?.toISOString(),
    tagged: s.tagged,
  };
}

function publicSnapshotOutcome(o: SnapshotOutcome) {
  if (o.status === 'cancelled') return o;
  return {
    status: o.status,
    instanceId: o.instanceId,
    snapshots: o.snapshots.map(publicSnapshot),
    failures: o.failures,
    report: toPublicReport(o.report),
    waitError: o.waitError,
  };
}

export async function evidenceRoutes(app: FastifyInstance, opts: EvidenceRouteOptions) {
  // Fresh non-interactive channel per request; its lines are echoed in the response.
  const session = async () => {
    const io = new NonInteractive();
    const kit = opts.toolkit(io);
    await kit.gate.verify();
    return { io, kit };
  };

  app.post<{ Params: IdParams }>('/v1/instances/:id/isolate', async (req, reply) => {
    const parsed = isolateBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(reply, parsed.error);
    const body = parsed.data;
    const { io, kit } = await session();
    const outcome = await kit.isolation.isolate({
      instanceId: req.params.id,
      confirm: body.confirm,
      snapshotAfter: body.snapshotAfter,
      snapshot: body.snapshot,
      reportDirectory: body.reportDirectory ?? opts.reportDirectory,
    });
    if (outcome.status !== 'isolated') return { outcome, messages: io.lines };
    return {
      outcome: {
        status: outcome.status,
        step: outcome.step,
        instanceId: outcome.instanceId,
        quarantineGroupId: outcome.quarantineGroupId,
        originalGroupIds: outcome.originalGroupIds,
        recoveryLocation: outcome.recoveryLocation,
        report: toPublicReport(outcome.report),
        snapshots: outcome.snapshots && publicSnapshotOutcome(outcome.snapshots),
        snapshotError: outcome.snapshotError,
      },
      messages: io.lines,
    };
  });

  app.post<{ Params: IdParams }>('/v1/instances/:id/snapshots', async (req, reply) => {
    const parsed = snapshotBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(reply, parsed.error);
    const { io, kit } = await session();
    const outcome = await kit.snapshots.createEvidenceSnapshots({
      instanceId: req.params.id,
      ...parsed.data,
      reportDirectory: parsed.data.reportDirectory ?? opts.reportDirectory,
    });
    return reply.status(201).send({ outcome: publicSnapshotOutcome(outcome), messages: io.lines });
  });

  app.post<{ Params: IdParams }>('/v1/instances/:id/restore', async (req, reply) => {
    const parsed = restoreBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(reply, parsed.error);
    const { io, kit } = await session();
    const outcome = await kit.restore.restore({
      instanceId: req.params.id,
      confirm: parsed.data.confirm,
      keepRecord: parsed.data.keepRecord,
      reportDirectory: parsed.data.reportDirectory ?? opts.reportDirectory,
    });
    if (outcome.status === 'cancelled') return { outcome, messages: io.lines };
    return { outcome: { ...outcome, report: toPublicReport(outcome.report) }, messages: io.lines };
  });

  app.get<{ Params: { instanceId: string } }>('/v1/recovery/:instanceId', async (req) => {
    const record = await opts.toolkit(new NonInteractive()).recovery.get(req.params.instanceId);
    return { record: { ...record, savedAt: record.savedAt.toISOString() } };
  });

  app.post<{ Params: IdParams }>('/v1/snapshots/:id/delete', async (req, reply) => {
    const parsed = deleteSnapshotBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return badRequest(reply, parsed.error);
    const { io, kit } = await session();
    const outcome = await kit.deletion.deleteSnapshot({
      snapshotId: req.params.id,
      ...parsed.data,
      reportDirectory: parsed.data.reportDirectory ?? opts.reportDirectory,
    });
    if (outcome.status === 'cancelled') {
      return reply.status(409).send({ outcome, messages: io.lines });
    }
    return { outcome: { ...outcome, report: toPublicReport(outcome.report) }, messages: io.lines };
  });

  app.get('/v1/custody/verify', async () => {
    return verifyCustodyLedger(opts.toolkit(new NonInteractive()).custody);
  });
}
