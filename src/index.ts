/**
 * consolekit
 *
 * A virtual console for Node.js terminals: a pinned title row, pinned progress bars and a
 * prompt row over a scrolling region, leveled file logging, and a wrapper that turns any
 * failure into one console line and one log line.
 */

export { ConsoleSession } from './renderer/ConsoleSession';
export type { ConsoleSessionOptions, InputOptions, AskYnOptions } from './renderer/ConsoleSession';
export { VirtualConsole } from './renderer/VirtualConsole';
export type { ProgressState, PaintOptions, VirtualConsoleOptions } from './renderer/VirtualConsole';
export { createProcessTerminal, supportsStyling, MemoryTerminal } from './renderer/terminal';
export type { Terminal, MemoryTerminalOptions, OutputStream } from './renderer/terminal';
export { ReadlineSource, ScriptedSource } from './renderer/Input';
export type { LineSource, ReadOptions } from './renderer/Input';
export { parseYesNo, parseListChoice, YES_ANSWERS, NO_ANSWERS } from './renderer/answers';
export { centerPadding, centerText, progressPercent, formatProgressBar, computeLayout } from './renderer/layout';
export type { ScreenLayout, Padding } from './renderer/layout';
export { createStyles } from './renderer/styles';
export type { ConsoleStyles } from './renderer/styles';
export { cursor, screen, style, stripAnsi, visibleLength, truncate } from './renderer/ansi';

export { Logger, LogLevel, LOG_LEVEL_NAMES, parseLogLevel, formatLogLine } from './utils/logger';
export type { LoggerOptions, LogContext } from './utils/logger';
export {
  ConfigurationError,
  PromptValidationError,
  InterruptError,
  UnhandledWorkFailure,
  isInterrupt,
} from './utils/errors';
export { wrapWork, isReported, markReported } from './utils/wrapper';
export type { WrapOptions, FailureReporter } from './utils/wrapper';
export { normalizeFailure, parseStack, selectFrame, isInternalFrame, LIBRARY_ROOT } from './utils/stackFrames';
export type { StackFrame, NormalizedFailure, NormalizeOptions } from './utils/stackFrames';

export {
  resolveSessionConfig,
  createPreferenceStore,
  savePreferences,
  defaultLogName,
  ENV_LOG_LEVEL,
} from './config';
export type { SessionConfig, SessionConfigInput, SessionPreferences, PreferenceStore } from './config';
