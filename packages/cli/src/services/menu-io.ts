import { createInterface } from 'readline';
import type { Interface } from 'readline';

/**
 * Terminal port used by the interactive menu.
 */
export interface MenuIO {
  /**
   * Shows a prompt and waits for one line of input.
   * @returns The line without its newline, or null once input has ended
   */
  ask(prompt: string): Promise<string | null>;

  /** Writes one line of output */
  write(line: string): void;

  /** Releases the underlying streams */
  close(): void;
}

/**
 * MenuIO over readline.
 *
 * Lines are queued as they arrive so piped input is not lost between
 * prompts.
 */
export class ReadlineMenuIO implements MenuIO {
  private readonly rl: Interface;
  private readonly lines: string[] = [];
  private readonly waiting: Array<(line: string | null) => void> = [];
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, crlfDelay: Infinity });

    this.rl.on('line', (line: string) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.once('close', () => {
      this.ended = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
  }

  ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);

    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise(resolve => this.waiting.push(resolve));
  }

  write(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    if (!this.ended) {
      this.rl.close();
    }
  }
}
