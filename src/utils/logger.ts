import { openSync, writeSync, fsyncSync, closeSync } from 'fs';
import { join } from 'path';
import { ConfigurationError } from './errors';

/**
 * Syslog severities, lower number = more severe
 */
export enum LogLevel {
  Emergency = 0,
  Alert = 1,
  Critical = 2,
  Error = 3,
  Warning = 4,
  Notice = 5,
  Info = 6,
  Debug = 7,
}

export const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.Emergency]: 'EMERGENCY',
  [LogLevel.Alert]: 'ALERT',
  [LogLevel.Critical]: 'CRITICAL',
  [LogLevel.Error]: 'ERROR',
  [LogLevel.Warning]: 'WARNING',
  [LogLevel.Notice]: 'NOTICE',
  [LogLevel.Info]: 'INFO',
  [LogLevel.Debug]: 'DEBUG',
};

const LOG_NAME_PATTERN = /^[A-Za-z0-9]+$/;

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  name: string;
  directory: string;
  level: LogLevel;
  restart?: boolean;
  now?: () => Date;
}

export function isValidLogName(name: string): boolean {
  return LOG_NAME_PATTERN.test(name);
}

/**
 * Narrow a number to a LogLevel (integer 0-7)
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'number' && Number.isInteger(value) && value >= LogLevel.Emergency && value <= LogLevel.Debug;
}

/**
 * Parse a level given as a number, a numeric string or a full level name ("warning", "Notice")
 */
export function parseLogLevel(value: unknown): LogLevel {
  if (isLogLevel(value)) return value;

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
      const numeric = Number(trimmed);
      if (isLogLevel(numeric)) return numeric;
    }
    const upper = trimmed.toUpperCase();
    for (const level of Object.values(LogLevel)) {
      if (isLogLevel(level) && LOG_LEVEL_NAMES[level] === upper) return level;
    }
  }

  throw new ConfigurationError(`Invalid log level ${JSON.stringify(value)}: expected an integer 0-7 or a syslog level name`);
}

/**
 * Loggers still holding a descriptor; one shared exit hook closes them all
 */
const openLoggers = new Set<Logger>();

function closeOpenLoggers(): void {
  for (const logger of [...openLoggers]) logger.close();
}

function track(logger: Logger): void {
  if (openLoggers.size === 0) process.on('exit', closeOpenLoggers);
  openLoggers.add(logger);
}

function untrack(logger: Logger): void {
  if (!openLoggers.delete(logger)) return;
  if (openLoggers.size === 0) process.removeListener('exit', closeOpenLoggers);
}

/**
 * Keep an entry on one physical line
 */
function flatten(text: string): string {
  return text.replace(/\r?\n/g, '\\n');
}

/**
 * Format log entry as string
 */
export function formatLogLine(timestamp: Date, level: LogLevel, message: string, context?: LogContext): string {
  const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `${timestamp.toISOString()} [${LOG_LEVEL_NAMES[level]}] ${flatten(message)}${contextStr}\n`;
}

/**
 * Leveled file logger.
 * The file is opened once, every entry is written and fsynced before the call returns,
 * and the descriptor is released on close() or process exit, whichever comes first.
 */
export class Logger {
  readonly path: string;
  readonly level: LogLevel;
  private fd: number | null;
  private writeFailed = false;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    if (!isValidLogName(options.name)) {
      throw new ConfigurationError(`Invalid log name "${options.name}": only letters and digits are allowed`);
    }
    if (!isLogLevel(options.level)) {
      throw new ConfigurationError(`Invalid log level ${options.level}: expected an integer 0-7`);
    }

    this.path = join(options.directory, `${options.name}.log`);
    this.level = options.level;
    this.now = options.now ?? (() => new Date());

    try {
      this.fd = openSync(this.path, options.restart ? 'w' : 'a');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Cannot open log file ${this.path}: ${reason}`, { cause: error });
    }

    track(this);
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  /**
   * Whether an entry at this level would be persisted
   */
  isEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  /**
   * Write one entry. Returns false when the entry was dropped by the threshold or the logger is closed.
   */
  log(level: LogLevel, message: string, context?: LogContext): boolean {
    if (!this.isEnabled(level) || this.fd === null) return false;

    const line = formatLogLine(this.now(), level, message, context);
    try {
      writeSync(this.fd, line);
      fsyncSync(this.fd);
      return true;
    } catch (error) {
      // Logging must never take the host down; report the first failure only
      if (!this.writeFailed) {
        this.writeFailed = true;
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`consolekit: cannot write to ${this.path}: ${reason}\n`);
      }
      return false;
    }
  }

  emergency(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Emergency, message, context);
  }

  alert(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Alert, message, context);
  }

  critical(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Critical, message, context);
  }

  error(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Error, message, context);
  }

  warning(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Warning, message, context);
  }

  notice(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Notice, message, context);
  }

  info(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Info, message, context);
  }

  debug(message: string, context?: LogContext): boolean {
    return this.log(LogLevel.Debug, message, context);
  }

  /**
   * Release the file descriptor. Safe to call more than once.
   */
  close(): void {
    untrack(this);
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }
}
