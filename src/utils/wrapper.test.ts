import { describe, it, expect, vi } from 'vitest';
import { InterruptError, UnhandledWorkFailure } from './errors';
import type { NormalizedFailure } from './stackFrames';
import { isReported, markReported, wrapWork } from './wrapper';

function createReporter() {
  const failures: NormalizedFailure[] = [];
  const report = vi.fn((failure: NormalizedFailure) => {
    failures.push(failure);
  });
  return { failures, report };
}

describe('wrapWork', () => {
  it('should pass arguments and this through and return the result', () => {
    const { report } = createReporter();
    const counter = {
      base: 10,
      add: wrapWork(report, function (this: { base: number }, value: number) {
        return this.base + value;
      }),
    };

    expect(counter.add(5)).toBe(15);
    expect(report).not.toHaveBeenCalled();
  });

  it('should report a failure once and return undefined', () => {
    const { failures, report } = createReporter();
    const parse = wrapWork(report, (text: string) => JSON.parse(text) as unknown);

    expect(parse('{')).toBeUndefined();
    expect(report).toHaveBeenCalledTimes(1);
    expect(failures[0].kind).toBe('SyntaxError');
  });

  it('should rethrow the original error when asked', () => {
    const { report } = createReporter();
    const error = new Error('bad');
    const work = wrapWork(
      report,
      () => {
        throw error;
      },
      { rethrow: true }
    );

    expect(() => work()).toThrow(error);
    expect(report).toHaveBeenCalledTimes(1);
    expect(isReported(error)).toBe(true);
  });

  it('should report nested failures only once', () => {
    const { report } = createReporter();
    const inner = wrapWork(
      report,
      () => {
        throw new Error('deep');
      },
      { rethrow: true }
    );
    const outer = wrapWork(report, () => inner());

    expect(outer()).toBeUndefined();
    expect(report).toHaveBeenCalledTimes(1);
  });

  it('should handle rejected promises the same way', async () => {
    const { failures, report } = createReporter();
    const load = wrapWork(report, async (name: string) => {
      throw new RangeError(`missing ${name}`);
    });

    await expect(load('config')).resolves.toBeUndefined();
    expect(failures).toHaveLength(1);
    expect(failures[0].summary).toMatch(/^RangeError: missing config/);
  });

  it('should resolve with the value of successful async work', async () => {
    const { report } = createReporter();
    const double = wrapWork(report, async (value: number) => value * 2);
    await expect(double(21)).resolves.toBe(42);
  });

  it('should let interrupts through without reporting them', async () => {
    const { report } = createReporter();
    const interrupted = wrapWork(report, () => {
      throw new InterruptError();
    });
    const aborted = wrapWork(report, async () => {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      throw error;
    });

    expect(() => interrupted()).toThrow(InterruptError);
    await expect(aborted()).rejects.toThrow('The operation was aborted');
    expect(report).not.toHaveBeenCalled();
  });

  it('should rethrow non-error values as UnhandledWorkFailure', () => {
    const { report } = createReporter();
    const work = wrapWork(
      report,
      () => {
        throw 'oops';
      },
      { rethrow: true }
    );

    let caught: unknown;
    try {
      work();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnhandledWorkFailure);
    if (caught instanceof UnhandledWorkFailure) {
      expect(caught.kind).toBe('string');
      expect(caught.thrown).toBe('oops');
      expect(caught.message).toBe('string: oops');
    }
    expect(isReported(caught)).toBe(true);
  });

  it('should call onFailure with the normalized failure', () => {
    const { report } = createReporter();
    const onFailure = vi.fn();
    const work = wrapWork(
      report,
      () => {
        throw new Error('noted');
      },
      { onFailure }
    );

    work();
    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0][0]).toMatchObject({ kind: 'Error', message: 'noted' });
  });
});

describe('markReported', () => {
  it('should tag errors without making the tag enumerable', () => {
    const error = new Error('x');
    markReported(error);
    expect(isReported(error)).toBe(true);
    expect(Object.keys(error)).toEqual([]);
  });

  it('should leave frozen values and primitives alone', () => {
    const frozen = Object.freeze(new Error('x'));
    markReported(frozen);
    markReported('text');

    expect(isReported(frozen)).toBe(false);
    expect(isReported('text')).toBe(false);
  });
});
