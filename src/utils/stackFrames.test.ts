import { describe, it, expect } from 'vitest';
import { join } from 'path';
import {
  isInternalFrame,
  LIBRARY_ROOT,
  normalizeFailure,
  parseStack,
  selectFrame,
  type StackFrame,
} from './stackFrames';

function withStack(error: Error, ...frames: string[]): Error {
  error.stack = [`${error.name}: ${error.message}`, ...frames.map((frame) => `    at ${frame}`)].join('\n');
  return error;
}

function frameAt(file: string, functionName: string | null = 'fn'): StackFrame {
  return { functionName, file, line: 1, column: 1, raw: `at ${file}:1:1` };
}

describe('parseStack', () => {
  it('should parse named, anonymous and internal frames', () => {
    const frames = parseStack(
      [
        'Error: boom',
        '    at explode (/srv/app/src/task.js:10:5)',
        '    at /srv/app/src/main.js:3:14',
        '    at node:internal/main/run_main_module:28:49',
      ].join('\n')
    );

    expect(frames).toHaveLength(3);
    expect(frames[0]).toMatchObject({ functionName: 'explode', file: '/srv/app/src/task.js', line: 10, column: 5 });
    expect(frames[1]).toMatchObject({ functionName: null, file: '/srv/app/src/main.js', line: 3 });
    expect(frames[2].file).toBe('node:internal/main/run_main_module');
  });

  it('should drop the async marker and convert file URLs', () => {
    const [frame] = parseStack('Error: x\n    at async run (file:///srv/app/src/run.js:2:3)');
    expect(frame.functionName).toBe('run');
    expect(frame.file).toBe('/srv/app/src/run.js');
  });

  it('should return nothing for a missing stack', () => {
    expect(parseStack(undefined)).toEqual([]);
    expect(parseStack('Error: no frames')).toEqual([]);
  });
});

describe('isInternalFrame', () => {
  it('should treat runtime and dependency frames as internal', () => {
    expect(isInternalFrame(frameAt('node:fs'), [])).toBe(true);
    expect(isInternalFrame(frameAt('internal/process/task_queues'), [])).toBe(true);
    expect(isInternalFrame(frameAt('/srv/app/node_modules/dep/index.js'), [])).toBe(true);
    expect(isInternalFrame(frameAt('/srv/app/src/main.js'), [])).toBe(false);
  });

  it('should treat this package as internal by default', () => {
    expect(isInternalFrame(frameAt(join(LIBRARY_ROOT, 'renderer', 'VirtualConsole.ts')))).toBe(true);
  });
});

describe('selectFrame', () => {
  it('should pick the innermost caller frame', () => {
    const frames = [frameAt('/srv/app/lib/inner.js', 'inner'), frameAt('/srv/app/src/caller.js', 'caller')];
    expect(selectFrame(frames, { internalPaths: ['/srv/app/lib/'] })?.functionName).toBe('caller');
  });

  it('should fall back to the hinted frame, then the innermost one', () => {
    const frames = [frameAt('/srv/app/lib/a.js', 'a'), frameAt('/srv/app/lib/b.js', 'b')];
    const options = { internalPaths: ['/srv/app/lib/'] };

    expect(selectFrame(frames, { ...options, sourceHint: 'b.js' })?.functionName).toBe('b');
    expect(selectFrame(frames, options)?.functionName).toBe('a');
    expect(selectFrame([], options)).toBeNull();
  });
});

describe('normalizeFailure', () => {
  const options = { internalPaths: [], cwd: '/srv/app' };

  it('should build a one-line summary with the caller location', () => {
    const error = withStack(new Error('boom'), 'explode (/srv/app/src/task.js:10:5)');
    const failure = normalizeFailure(error, options);

    expect(failure.kind).toBe('Error');
    expect(failure.summary).toBe('Error: boom (at src/task.js:10 in explode)');
    expect(failure.logEntry).toBe(
      'Error: boom (at src/task.js:10 in explode) | trace: Error: boom\\n    at explode (/srv/app/src/task.js:10:5)'
    );
  });

  it('should use the error name as its kind', () => {
    const error = withStack(new TypeError('bad type'), '/srv/app/src/main.js:1:1');
    expect(normalizeFailure(error, options).summary).toBe('TypeError: bad type (at src/main.js:1 in <anonymous>)');
  });

  it('should keep absolute paths outside the working directory', () => {
    const error = withStack(new Error('far'), 'remote (/opt/tool/run.js:4:2)');
    expect(normalizeFailure(error, options).summary).toBe('Error: far (at /opt/tool/run.js:4 in remote)');
  });

  it('should keep the first message line in the summary and the rest in the trace', () => {
    const error = withStack(new Error('line one\n  line two'));
    const failure = normalizeFailure(error, options);

    expect(failure.message).toBe('line one');
    expect(failure.summary).toBe('Error: line one');
    expect(failure.trace).toBe('Error: line one\n  line two');
    expect(failure.logEntry).toBe('Error: line one | trace: Error: line one\\n  line two');
    expect(failure.frame).toBeNull();
  });

  it('should keep the remaining lines of a thrown string in the trace', () => {
    const failure = normalizeFailure('first\nsecond', options);
    expect(failure.summary).toBe('string: first');
    expect(failure.logEntry).toBe('string: first | trace: first\\nsecond');
  });

  it('should include the cause chain in the trace', () => {
    const inner = withStack(new Error('inner'), 'a (/srv/app/a.js:1:1)');
    const outer = withStack(new Error('outer', { cause: inner }), 'b (/srv/app/b.js:2:2)');
    const failure = normalizeFailure(outer, options);

    expect(failure.trace).toBe(
      'Error: outer\n    at b (/srv/app/b.js:2:2)\nCaused by: Error: inner\n    at a (/srv/app/a.js:1:1)'
    );
    expect(failure.frames).toHaveLength(1);
  });

  it('should describe thrown values that are not errors', () => {
    class Rejection {
      code = 7;
    }

    expect(normalizeFailure('oops', options).summary).toBe('string: oops');
    expect(normalizeFailure('oops', options).logEntry).toBe('string: oops');
    expect(normalizeFailure({ code: 7 }, options).summary).toBe('Object: {"code":7}');
    expect(normalizeFailure(new Rejection(), options).summary).toBe('Rejection: {"code":7}');
    expect(normalizeFailure(null, options).summary).toBe('null: null');
    expect(normalizeFailure(undefined, options).summary).toBe('undefined: undefined');
  });

  it('should locate a real throw site', () => {
    function explode(): never {
      throw new Error('real');
    }

    let caught: unknown;
    try {
      explode();
    } catch (error) {
      caught = error;
    }

    const failure = normalizeFailure(caught, { internalPaths: [] });
    expect(failure.frame?.functionName).toBe('explode');
    expect(failure.frame?.file).toContain('stackFrames.test');
  });
});
