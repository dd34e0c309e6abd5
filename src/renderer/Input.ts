/**
 * Line input for prompts
 * The terminal stays in cooked mode: the operator edits the line with the terminal's own
 * line discipline and we receive it once Enter is pressed.
 */

import * as readline from 'readline';
import { InterruptError } from '../utils/errors';

export interface ReadOptions {
  /** Keep the typed characters off the screen (passwords) */
  mask?: boolean;
}

export interface LineSource {
  /** Resolve with the next line typed by the operator, without its line terminator */
  readLine(options?: ReadOptions): Promise<string>;
  close(): void;
}

/** A terminal input that can switch its line discipline off */
type RawInput = NodeJS.ReadableStream & { isTTY: true; setRawMode(mode: boolean): unknown };

const CTRL_C = '\x03';
const CTRL_D = '\x04';
const ERASE_KEYS: ReadonlySet<string> = new Set(['\x7f', '\b']);

function isRawInput(stream: NodeJS.ReadableStream): stream is RawInput {
  return (
    'isTTY' in stream && stream.isTTY === true && 'setRawMode' in stream && typeof stream.setRawMode === 'function'
  );
}

/**
 * Apply Backspace/Delete keystrokes that raw mode left in the line
 */
export function applyErasures(line: string): string {
  const chars: string[] = [];
  for (const char of line) {
    if (ERASE_KEYS.has(char)) {
      chars.pop();
    } else {
      chars.push(char);
    }
  }
  return chars.join('');
}

interface Waiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Line source over a readable stream (stdin by default).
 * The stream is only touched on the first read, and paused whenever nobody is waiting,
 * so an idle session does not keep the process alive.
 */
export class ReadlineSource implements LineSource {
  private rl: readline.Interface | null = null;
  private readonly queue: string[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(private readonly input: NodeJS.ReadableStream = process.stdin) {}

  readLine(options: ReadOptions = {}): Promise<string> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.reject(new InterruptError());

    // Without a TTY nothing is echoed, so a masked read is a plain one
    if (options.mask && isRawInput(this.input)) {
      return this.readMasked(this.input);
    }
    return this.nextLine();
  }

  close(): void {
    if (this.rl) {
      this.rl.close();
    } else {
      this.closed = true;
    }
  }

  /**
   * Read one line with the terminal in raw mode, so the kernel does not echo it.
   * Ctrl+C and Ctrl+D close the source, which rejects the read with InterruptError.
   */
  private async readMasked(input: RawInput): Promise<string> {
    const watchInterrupt = (chunk: unknown) => {
      const text = String(chunk);
      if (text.includes(CTRL_C) || text.includes(CTRL_D)) this.close();
    };

    input.setRawMode(true);
    input.on('data', watchInterrupt);
    try {
      return applyErasures(await this.nextLine());
    } finally {
      input.removeListener('data', watchInterrupt);
      input.setRawMode(false);
    }
  }

  private nextLine(): Promise<string> {
    const rl = this.ensureInterface();
    return new Promise<string>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
      rl.resume();
    });
  }

  private ensureInterface(): readline.Interface {
    if (this.rl) return this.rl;

    const rl = readline.createInterface({ input: this.input, terminal: false });
    rl.on('line', (line: string) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(line);
      } else {
        this.queue.push(line);
      }
      if (this.waiters.length === 0) rl.pause();
    });
    rl.on('close', () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter.reject(new InterruptError());
      }
    });

    this.rl = rl;
    return rl;
  }
}

/**
 * Line source that answers from a fixed script, then reports the input as closed.
 * Lets hosts drive prompts without an operator (tests, replayed sessions).
 */
export class ScriptedSource implements LineSource {
  private readonly answers: string[];
  private closed = false;
  /** Number of lines handed out so far */
  reads = 0;
  /** Lines handed out by masked reads */
  maskedReads = 0;

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  readLine(options: ReadOptions = {}): Promise<string> {
    const answer = this.closed ? undefined : this.answers.shift();
    if (answer === undefined) return Promise.reject(new InterruptError('Scripted input exhausted'));
    this.reads++;
    if (options.mask) this.maskedReads++;
    return Promise.resolve(answer);
  }

  close(): void {
    this.closed = true;
  }
}
