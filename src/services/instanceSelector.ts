import { SelectError } from '../core/errors.js';
import type { Interaction } from '../core/interaction.js';
import type { Instance } from '../core/types.js';
import type { CloudProvider } from '../provider/cloudProvider.js';

/**
 * Turns the operator's answer into a zero-based index into a 1..count listing.
 * A single invalid answer aborts; callers re-invoke to retry.
 */
export function parseSelection(answer: string, count: number): number {
  const trimmed = answer.trim();
  if (trimmed.toLowerCase() === 'q') {
    throw new SelectError('CANCELLED', 'Operation cancelled');
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new SelectError('OUT_OF_RANGE', 'Invalid selection. Please enter a valid number');
  }
  const n = Number(trimmed);
  if (n < 1 || n > count) {
    throw new SelectError(
      'OUT_OF_RANGE',
      `Invalid selection. Please select a number between 1 and ${count}`,
    );
  }
  return n - 1;
}

/** Prints a numbered listing and returns the item the operator picked. */
export async function chooseFromList<T>(
  io: Interaction,
  items: T[],
  opts: { noun: string; purpose: string; describe: (item: T) => string },
): Promise<T> {
  if (items.length === 0) {
    throw new SelectError('NONE_AVAILABLE', `No ${opts.noun}s available to ${opts.purpose}`);
  }
  items.forEach((item, i) => io.say(`${i + 1}. ${opts.describe(item)}`));
  const answer = await io.ask(
    `Select ${opts.noun} to ${opts.purpose} (1-${items.length}) or 'q' to quit: `,
  );
  return items[parseSelection(answer, items.length)];
}

export function describeInstance(instance: Instance): string {
  return `${instance.id} | ${instance.name ?? 'No Name'} | ${instance.state}`;
}

export class InstanceSelector {
  constructor(
    private readonly provider: CloudProvider,
    private readonly io: Interaction,
  ) {}

  async select(purpose: string): Promise<string> {
    const instances = (await this.provider.listInstances()).filter((i) => i.state !== 'terminated');
    if (instances.length > 0) {
      this.io.say('Available EC2 Instances:');
    }
    const chosen = await chooseFromList(this.io, instances, {
      noun: 'instance',
      purpose,
      describe: describeInstance,
    });
    this.io.say(`Selected instance: ${chosen.id} (${chosen.name ?? 'No Name'})`);
    return chosen.id;
  }
}
