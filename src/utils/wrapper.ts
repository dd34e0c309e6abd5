/**
 * Failure wrapper: run caller work, report anything it throws as one console line and one log line
 *
 * Caller contract: with the default `rethrow: false` a failed call returns `undefined`.
 * Work that can legitimately return `undefined` should either enable `rethrow` or use `onFailure`
 * to tell the two cases apart.
 */

import { isInterrupt, UnhandledWorkFailure } from './errors';
import { normalizeFailure, type NormalizedFailure, type NormalizeOptions } from './stackFrames';

export type FailureReporter = (failure: NormalizedFailure) => void;

export interface WrapOptions extends NormalizeOptions {
  /** Rethrow after reporting instead of returning undefined */
  rethrow?: boolean;
  onFailure?: (failure: NormalizedFailure) => void;
}

const REPORTED = Symbol.for('consolekit.failure.reported');

/**
 * Whether a wrapper already printed and logged this value
 */
export function isReported(error: unknown): boolean {
  return typeof error === 'object' && error !== null && REPORTED in error;
}

/**
 * Tag a value as reported. Frozen or sealed values cannot carry the tag.
 */
export function markReported(error: unknown): void {
  if (typeof error !== 'object' || error === null || !Object.isExtensible(error)) return;
  Object.defineProperty(error, REPORTED, { value: true, enumerable: false });
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Wrap a unit of work. The wrapped function takes the same arguments and `this`, and returns the
 * same value on success. Async work is awaited and its rejections are handled the same way.
 */
export function wrapWork<A extends unknown[], R>(
  report: FailureReporter,
  work: (...args: A) => Promise<R>,
  options?: WrapOptions
): (...args: A) => Promise<R | undefined>;
export function wrapWork<A extends unknown[], R>(
  report: FailureReporter,
  work: (...args: A) => R,
  options?: WrapOptions
): (...args: A) => R | undefined;
export function wrapWork<A extends unknown[]>(
  report: FailureReporter,
  work: (...args: A) => unknown,
  options: WrapOptions = {}
): (...args: A) => unknown {
  const handle = (error: unknown): undefined => {
    // Operator interrupts are not failures
    if (isInterrupt(error)) throw error;

    if (isReported(error)) {
      if (options.rethrow) throw error;
      return undefined;
    }

    const failure = normalizeFailure(error, options);
    markReported(error);
    report(failure);
    options.onFailure?.(failure);

    if (options.rethrow) {
      if (error instanceof Error) throw error;
      const replacement = new UnhandledWorkFailure(failure.summary, failure.kind, error);
      markReported(replacement);
      throw replacement;
    }
    return undefined;
  };

  return function wrapped(this: unknown, ...args: A): unknown {
    let result: unknown;
    try {
      result = Reflect.apply(work, this, args);
    } catch (error) {
      return handle(error);
    }

    if (isPromiseLike(result)) {
      return Promise.resolve(result).catch(handle);
    }
    return result;
  };
}
