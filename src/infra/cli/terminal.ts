import * as readline from 'readline';
import { LedgerOutput } from '../../application/ledger.js';

export class InputClosedError extends Error {
  constructor(message = 'Input stream closed') {
    super(message);
    this.name = 'InputClosedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Console surface of the interactive menu.
 * Input is consumed one whitespace-separated token at a time.
 */
export interface Terminal extends LedgerOutput {
  prompt(text: string): void;
  readToken(): Promise<string>;
}

export class ConsoleTerminal implements Terminal {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private pending: string[] = [];

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly stdout: NodeJS.WritableStream = process.stdout,
    private readonly stderr: NodeJS.WritableStream = process.stderr
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  prompt(text: string): void {
    this.stdout.write(text);
  }

  info(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  error(line: string): void {
    this.stderr.write(`${line}\n`);
  }

  async readToken(): Promise<string> {
    for (;;) {
      const token = this.pending.shift();
      if (token !== undefined) {
        return token;
      }

      const next = await this.lines.next();
      if (next.done) {
        throw new InputClosedError();
      }
      this.pending = next.value.split(/\s+/).filter((part) => part !== '');
    }
  }

  close(): void {
    this.rl.close();
  }
}
