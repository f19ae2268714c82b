/**
 * Blocking terminal prompts.
 *
 * The installer only ever waits on one answer at a time, so a prompt is a
 * single awaited question; nothing else runs while it is pending. Lines that
 * arrive between questions (piped input) are queued for the next one.
 */
import * as readline from 'node:readline';

/**
 * Source of interactive answers. The CLI uses a readline-backed prompter;
 * tests substitute a scripted one.
 */
export interface Prompter {
  /** Ask a free-form question; resolves to the trimmed answer. */
  ask(question: string): Promise<string>;
  /** Ask a yes/no question. Anything not starting with y/Y counts as the default. */
  confirm(question: string, defaultValue?: boolean): Promise<boolean>;
  /** Release the underlying input stream. */
  close(): void;
}

/**
 * Interpret a yes/no answer.
 */
export function parseConfirmation(answer: string, defaultValue: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized.startsWith('y')) return true;
  if (normalized.startsWith('n')) return false;
  return defaultValue;
}

/**
 * Prompter reading from stdin (a pipe in CI, the terminal otherwise).
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | null = null;
  private readonly pending: string[] = [];
  private inputEnded = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private getInterface(): readline.Interface {
    if (!this.rl) {
      this.rl = readline.createInterface({
        input: this.input,
        output: this.output,
      });
      // Only emitted for lines no question was waiting on
      this.rl.on('line', (line) => {
        this.pending.push(line.trim());
      });
      this.rl.once('close', () => {
        this.inputEnded = true;
      });
    }
    return this.rl;
  }

  ask(question: string): Promise<string> {
    const queued = this.pending.shift();
    if (queued !== undefined) {
      this.output.write(question);
      return Promise.resolve(queued);
    }
    if (this.inputEnded) {
      return Promise.resolve('');
    }
    const rl = this.getInterface();
    return new Promise((resolve) => {
      // End of input (Ctrl+D, exhausted pipe) answers with an empty string
      const onClose = (): void => resolve('');
      rl.once('close', onClose);
      rl.question(question, (answer) => {
        rl.off('close', onClose);
        resolve(answer.trim());
      });
    });
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? '[Y/n]' : '[y/N]';
    const answer = await this.ask(`${question} ${hint}: `);
    return parseConfirmation(answer, defaultValue);
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
