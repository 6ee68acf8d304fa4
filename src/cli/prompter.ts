import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';
import type { Interaction } from '../core/interaction.js';

/**
 * Terminal-backed Interaction. One readline interface is opened lazily and kept
 * for the whole run; an answer pending when input ends resolves to ''.
 */
export class ReadlinePrompter implements Interaction {
  private rl: Interface | null = null;
  private closed = false;

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout,
  ) {}

  ask(question: string): Promise<string> {
    if (this.closed) return Promise.resolve('');
    const rl = this.open();
    return new Promise((resolve) => {
      const onClose = () => resolve('');
      rl.once('close', onClose);
      rl.question(question, (answer) => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  say(line: string): void {
    this.output.write(line + '\n');
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private open(): Interface {
    if (!this.rl) {
      const rl = createInterface({ input: this.input, output: this.output, terminal: false });
      rl.once('close', () => {
        this.closed = true;
      });
      this.rl = rl;
    }
    return this.rl;
  }
}
