/**
 * Error taxonomy for the console session
 */

/**
 * Invalid session configuration (log name, log level, bar width...).
 * Thrown at construction time and never recovered by the session.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Operator answer that a prompt could not accept.
 * Caught by the prompt loops, which re-prompt with the message as a hint.
 */
export class PromptValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptValidationError';
  }
}

/**
 * Operator closed the input stream (Ctrl+D, Ctrl+C in raw mode, piped EOF).
 * Never captured by the failure wrapper.
 */
export class InterruptError extends Error {
  constructor(message: string = 'Input closed by operator') {
    super(message);
    this.name = 'InterruptError';
  }
}

/**
 * Rethrown in place of a captured value that was not an Error (a thrown string, a plain object)
 */
export class UnhandledWorkFailure extends Error {
  constructor(
    message: string,
    public readonly kind: string,
    public readonly thrown: unknown
  ) {
    super(message);
    this.name = 'UnhandledWorkFailure';
  }
}

/**
 * Errors that must propagate untouched through every wrapper
 */
export function isInterrupt(error: unknown): boolean {
  if (error instanceof InterruptError) return true;
  return error instanceof Error && error.name === 'AbortError';
}
