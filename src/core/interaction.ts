import { InteractionRequiredError } from './errors.js';

/**
 * Operator channel used by workflows when a request leaves a decision open.
 * The CLI backs it with readline; the HTTP API uses NonInteractive, which refuses
 * to ask, so every decision must arrive in the request body.
 */
export interface Interaction {
  ask(question: string): Promise<string>;
  say(line: string): void;
}

export class NonInteractive implements Interaction {
  readonly lines: string[] = [];

  async ask(question: string): Promise<string> {
    throw new InteractionRequiredError(question);
  }

  say(line: string): void {
    this.lines.push(line);
  }
}

export function isAffirmative(answer: string): boolean {
  const a = answer.trim().toLowerCase();
  return a === 'y' || a === 'yes';
}
