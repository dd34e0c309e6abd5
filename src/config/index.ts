import Conf from 'conf';
import { basename, extname } from 'path';
import { ConfigurationError } from '../utils/errors';
import { isValidLogName, LogLevel, parseLogLevel } from '../utils/logger';
import { DEFAULT_BAR_WIDTH } from '../renderer/layout';

/**
 * Preferences persisted between runs, per user
 */
export interface SessionPreferences {
  logLevel?: number;
  restartLog?: boolean;
}

export type PreferenceStore = Conf<SessionPreferences>;

/**
 * Construction options of a session. Every key is optional.
 */
export interface SessionConfigInput {
  /** Base name of the log file; letters and digits only */
  logName?: string;
  /** Truncate the log file when the session opens it (default: append) */
  restartLog?: boolean;
  /** Syslog threshold 0-7, or a level name */
  logLevel?: number | string;
  /** Directory of the log file (default: working directory at construction) */
  logDirectory?: string;
  /** Preferred inner width of progress bars */
  barWidth?: number;
  /** Low-latency calls paint once every this many calls */
  lowLatencyInterval?: number;
}

export interface SessionConfig {
  logName: string;
  restartLog: boolean;
  logLevel: LogLevel;
  logDirectory: string;
  barWidth: number;
  lowLatencyInterval: number;
}

export const ENV_LOG_LEVEL = 'CONSOLEKIT_LOG_LEVEL';
export const DEFAULT_LOG_LEVEL = LogLevel.Warning;
export const DEFAULT_LOW_LATENCY_INTERVAL = 100;
const FALLBACK_LOG_NAME = 'console';

const PREFERENCE_SCHEMA = {
  logLevel: { type: 'integer', minimum: 0, maximum: 7 },
  restartLog: { type: 'boolean' },
} as const;

/**
 * Open the preference store. Without `cwd` it lives in the user's config directory.
 */
export function createPreferenceStore(options: { cwd?: string; projectName?: string } = {}): PreferenceStore {
  return new Conf<SessionPreferences>({
    projectName: options.projectName ?? 'consolekit',
    cwd: options.cwd,
    schema: PREFERENCE_SCHEMA,
  });
}

/**
 * Persist preferences, validating them the same way construction options are validated
 */
export function savePreferences(store: PreferenceStore, preferences: SessionPreferences): void {
  if (preferences.logLevel !== undefined) {
    store.set('logLevel', parseLogLevel(preferences.logLevel));
  }
  if (preferences.restartLog !== undefined) {
    store.set('restartLog', preferences.restartLog);
  }
}

/**
 * Log name derived from the running script: basename without extension, letters and digits only
 */
export function defaultLogName(script: string | undefined = process.argv[1]): string {
  if (!script) return FALLBACK_LOG_NAME;
  const name = basename(script, extname(script)).replace(/[^A-Za-z0-9]/g, '');
  return name || FALLBACK_LOG_NAME;
}

function positiveInteger(key: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`Invalid ${key} ${value}: expected a positive integer`);
  }
  return value;
}

/**
 * Merge explicit options, the environment, stored preferences and defaults, in that order of priority.
 * Throws ConfigurationError on the first invalid value.
 */
export function resolveSessionConfig(
  input: SessionConfigInput = {},
  preferences: SessionPreferences = {},
  env: NodeJS.ProcessEnv = process.env
): SessionConfig {
  const logName = input.logName ?? defaultLogName();
  if (!isValidLogName(logName)) {
    throw new ConfigurationError(`Invalid log name "${logName}": only letters and digits are allowed`);
  }

  // An exported but empty variable counts as unset
  const envLevel = env[ENV_LOG_LEVEL]?.trim() || undefined;
  const levelSource = input.logLevel ?? envLevel ?? preferences.logLevel;
  const logLevel = levelSource === undefined ? DEFAULT_LOG_LEVEL : parseLogLevel(levelSource);

  return {
    logName,
    restartLog: input.restartLog ?? preferences.restartLog ?? false,
    logLevel,
    logDirectory: input.logDirectory ?? process.cwd(),
    barWidth: positiveInteger('barWidth', input.barWidth, DEFAULT_BAR_WIDTH),
    lowLatencyInterval: positiveInteger('lowLatencyInterval', input.lowLatencyInterval, DEFAULT_LOW_LATENCY_INTERVAL),
  };
}
