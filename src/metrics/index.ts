import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { EventBus, EvidenceEvents } from '../events/eventBus.js';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const workflowRunsTotal = new Counter({
  name: 'evidence_workflow_runs_total',
  help: 'Workflow runs by workflow and outcome',
  labelNames: ['workflow', 'outcome'] as const, // outcome=completed|cancelled|failed
  registers: [registry],
});

export const workflowDurationSeconds = new Histogram({
  name: 'evidence_workflow_duration_seconds',
  help: 'Wall time of a workflow run including operator prompts (seconds)',
  labelNames: ['workflow'] as const,
  buckets: [0.5, 1, 5, 15, 30, 60, 300, 900],
  registers: [registry],
});

export const reportsWrittenTotal = new Counter({
  name: 'evidence_reports_written_total',
  help: 'Evidence reports written',
  labelNames: ['action'] as const,
  registers: [registry],
});

export const snapshotsTotal = new Counter({
  name: 'evidence_snapshots_total',
  help: 'Per-volume snapshot attempts',
  labelNames: ['result'] as const, // result=created|failed
  registers: [registry],
});

// Custody ledger verifications (label result=valid|invalid)
export const custodyVerificationsTotal = new Counter({
  name: 'custody_verifications_total',
  help: 'Total custody ledger verifications',
  labelNames: ['result'] as const,
  registers: [registry],
});

/**
 * Subscribes the counters to a bus. One registry serves every bus in the process,
 * so binding twice to the same bus would double count; callers bind once.
 */
export function bindMetrics(bus: EventBus<EvidenceEvents>): void {
  bus.on('workflowFinished', (e) => {
    workflowRunsTotal.inc({ workflow: e.workflow, outcome: e.outcome });
    workflowDurationSeconds.observe({ workflow: e.workflow }, e.seconds);
  });
  bus.on('reportWritten', (r) => {
    reportsWrittenTotal.inc({ action: r.report.action });
  });
  bus.on('snapshotCreated', () => {
    snapshotsTotal.inc({ result: 'created' });
  });
  bus.on('snapshotFailed', () => {
    snapshotsTotal.inc({ result: 'failed' });
  });
}

export function metricsSummary() {
  return registry.metrics();
}
