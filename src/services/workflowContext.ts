import type { Interaction } from '../core/interaction.js';
import type { EventBus, EvidenceEvents, WorkflowName } from '../events/eventBus.js';
import type { CloudProvider } from '../provider/cloudProvider.js';
import type { EvidenceReporter } from './evidenceReporter.js';

/** Collaborators every workflow needs. */
export interface WorkflowContext {
  provider: CloudProvider;
  io: Interaction;
  reporter: EvidenceReporter;
  bus: EventBus<EvidenceEvents>;
  clock: () => Date;
}

/**
 * Runs a workflow body and reports how it ended on the bus (metrics listen there).
 * Errors are re-thrown unchanged.
 */
export async function tracked<T extends { status: string }>(
  ctx: WorkflowContext,
  workflow: WorkflowName,
  body: () => Promise<T>,
): Promise<T> {
  const start = process.hrtime.bigint();
  const seconds = () => Number(process.hrtime.bigint() - start) / 1e9;
  try {
    const result = await body();
    await ctx.bus.emit('workflowFinished', {
      workflow,
      outcome: result.status === 'cancelled' ? 'cancelled' : 'completed',
      seconds: seconds(),
    });
    return result;
  } catch (err) {
    await ctx.bus.emit('workflowFinished', { workflow, outcome: 'failed', seconds: seconds() });
    throw err;
  }
}
