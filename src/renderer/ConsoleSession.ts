/**
 * Console session: the render operations, prompts, logging and failure wrapper of one host application
 */

import { cursor, style } from './ansi';
import { formatOptions, parseListChoice, parseYesNo, yesNoHint } from './answers';
import { ReadlineSource, type LineSource, type ReadOptions } from './Input';
import { centerText } from './layout';
import { createStyles, type ConsoleStyles } from './styles';
import { createProcessTerminal, type Terminal } from './terminal';
import { VirtualConsole, type PaintOptions, type ProgressState } from './VirtualConsole';
import {
  resolveSessionConfig,
  type SessionConfig,
  type SessionConfigInput,
  type SessionPreferences,
} from '../config';
import { PromptValidationError } from '../utils/errors';
import { Logger, LogLevel, type LogContext } from '../utils/logger';
import type { NormalizedFailure } from '../utils/stackFrames';
import { wrapWork, type WrapOptions } from '../utils/wrapper';

export interface ConsoleSessionOptions extends SessionConfigInput {
  /** Defaults to process.stdout */
  terminal?: Terminal;
  /** Defaults to a readline source over process.stdin, opened on the first prompt */
  lineSource?: LineSource;
  /** Stored preferences, usually `createPreferenceStore().store` */
  preferences?: SessionPreferences;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface InputOptions {
  /** Cut the answer to this many characters */
  maxLength?: number;
  /** Read a secret: the typed characters never reach the screen */
  mask?: boolean;
}

export interface AskYnOptions {
  /** Answer returned for an empty line; without it an empty line re-prompts */
  defaultAnswer?: boolean;
}

type Severity = 'warn' | 'error' | 'notice';

const SEVERITY_LEVELS: Record<Severity, LogLevel> = {
  warn: LogLevel.Warning,
  error: LogLevel.Error,
  notice: LogLevel.Notice,
};

const DEFAULT_INPUT_PROMPT = 'Press [Enter] to continue:';

function clockTime(date: Date): string {
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

export class ConsoleSession {
  readonly config: SessionConfig;
  readonly logger: Logger;
  readonly terminal: Terminal;
  readonly view: VirtualConsole;
  private readonly styles: ConsoleStyles;
  private lineSource: LineSource | null;
  private readonly now: () => Date;
  private closed = false;

  constructor(options: ConsoleSessionOptions = {}) {
    this.config = resolveSessionConfig(options, options.preferences, options.env);
    this.now = options.now ?? (() => new Date());
    this.logger = new Logger({
      name: this.config.logName,
      directory: this.config.logDirectory,
      level: this.config.logLevel,
      restart: this.config.restartLog,
      now: this.now,
    });
    this.terminal = options.terminal ?? createProcessTerminal();
    this.styles = createStyles(this.terminal.isStyled);
    this.view = new VirtualConsole(this.terminal, this.styles, {
      barWidth: this.config.barWidth,
      lowLatencyInterval: this.config.lowLatencyInterval,
    });
    this.lineSource = options.lineSource ?? null;
  }

  /**
   * Erase the screen. The title and any bars must be set again afterwards.
   */
  clear(): void {
    this.view.clear();
  }

  setMainTitle(text: string | null): void {
    this.view.setMainTitle(text);
  }

  /**
   * Write a line centered for the current width
   */
  printCenter(text: string): void {
    this.view.advanceScroll(centerText(text, this.terminal.columns));
  }

  warnCenter(text: string, context?: LogContext): void {
    this.view.advanceScroll(this.styles.warn(centerText(text, this.terminal.columns)));
    this.logger.warning(text, context);
  }

  errorCenter(text: string, context?: LogContext): void {
    this.view.advanceScroll(this.styles.error(centerText(text, this.terminal.columns)));
    this.logger.error(text, context);
  }

  /**
   * Plain sequential output
   */
  console(text: string, options: PaintOptions = {}): void {
    this.view.advanceScroll(text, options);
  }

  warn(text: string, context?: LogContext): void {
    this.report('warn', text, context);
  }

  error(text: string, context?: LogContext): void {
    this.report('error', text, context);
  }

  notice(text: string, context?: LogContext): void {
    this.report('notice', text, context);
  }

  info(text: string, context?: LogContext): void {
    this.notice(text, context);
  }

  /**
   * Read one line from the operator. Neither the prompt nor the answer is logged.
   */
  async input(prompt: string = DEFAULT_INPUT_PROMPT, options: InputOptions = {}): Promise<string> {
    const answer = await this.ask(prompt, { mask: options.mask });
    return options.maxLength === undefined ? answer : answer.slice(0, Math.max(0, options.maxLength));
  }

  /**
   * Ask until the operator answers y/yes or n/no (any case)
   */
  askYn(prompt: string, options: AskYnOptions = {}): Promise<boolean> {
    const question = `${prompt} ${yesNoHint(options.defaultAnswer)}`;
    return this.askUntilValid(question, (answer) => parseYesNo(answer, options.defaultAnswer));
  }

  /**
   * Show a numbered list and ask until the operator picks an entry by number or exact text.
   * Resolves with the entry's text.
   */
  async askList(prompt: string, options: readonly string[]): Promise<string> {
    if (options.length === 0) {
      throw new RangeError('askList needs at least one option');
    }
    this.view.advanceScroll([prompt, ...formatOptions(options)].join('\n'));
    return this.askUntilValid(`Select 1-${options.length}:`, (answer) => parseListChoice(answer, options));
  }

  loadBar(title: string, current: number, maximum: number, options: PaintOptions = {}): Readonly<ProgressState> {
    return this.view.renderProgress(title, current, maximum, options);
  }

  bold(text: string): string {
    return this.styles.bold(text);
  }

  underline(text: string): string {
    return this.styles.underline(text);
  }

  windowText(text: string): string {
    return this.styles.window(text);
  }

  /**
   * Wrap work so any failure is printed as one line, logged with its trace, and swallowed
   * (the wrapped call then returns undefined) unless `rethrow` is set.
   */
  wrap<A extends unknown[], R>(work: (...args: A) => Promise<R>, options?: WrapOptions): (...args: A) => Promise<R | undefined>;
  wrap<A extends unknown[], R>(work: (...args: A) => R, options?: WrapOptions): (...args: A) => R | undefined;
  wrap<A extends unknown[]>(work: (...args: A) => unknown, options: WrapOptions = {}): (...args: A) => unknown {
    return wrapWork(this.reportFailure, work, options);
  }

  /**
   * Restore the terminal and release the input and the log file. Safe to call more than once.
   */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.view.clearPrompt();
      if (this.terminal.isStyled) {
        this.terminal.write(style.reset + cursor.show);
      }
    } finally {
      this.lineSource?.close();
      this.logger.close();
    }
  }

  private readonly reportFailure = (failure: NormalizedFailure): void => {
    this.paintLeveled('error', failure.summary);
    this.logger.error(failure.logEntry);
  };

  private report(severity: Severity, text: string, context?: LogContext): void {
    this.paintLeveled(severity, text);
    this.logger.log(SEVERITY_LEVELS[severity], text, context);
  }

  private paintLeveled(severity: Severity, text: string): void {
    const prefix = this.styles.timestamp(clockTime(this.now()));
    this.view.advanceScroll(prefix + this.styles[severity](text));
  }

  private lines(): LineSource {
    if (!this.lineSource) {
      this.lineSource = new ReadlineSource();
    }
    return this.lineSource;
  }

  private async ask(prompt: string, options: ReadOptions = {}): Promise<string> {
    this.view.renderPrompt(prompt);
    try {
      return await this.lines().readLine(options);
    } finally {
      this.view.clearPrompt();
    }
  }

  /**
   * Re-prompt on the same row, with the parser's hint in front, until the parser accepts an answer
   */
  private async askUntilValid<T>(question: string, parse: (answer: string) => T): Promise<T> {
    let hint = '';
    for (;;) {
      const answer = await this.ask(hint + question);
      try {
        return parse(answer);
      } catch (error) {
        if (!(error instanceof PromptValidationError)) throw error;
        hint = `${error.message} `;
      }
    }
  }
}
