/**
 * Stack trace parsing and failure normalization
 *
 * Frame selection rule: walk the V8 frames innermost first and take the first one that is not
 * a Node.js internal (`node:`, `internal/`), not under `node_modules`, and not inside any of the
 * `internalPaths` (this package's own `src/` by default). When every frame is excluded, take the
 * innermost frame whose file contains `sourceHint`, else the innermost frame.
 */

import { fileURLToPath } from 'url';
import { isAbsolute, relative } from 'path';

export interface StackFrame {
  functionName: string | null;
  file: string;
  line: number;
  column: number;
  raw: string;
}

export interface NormalizedFailure {
  kind: string;
  /** First line of the error message; the rest stays in the trace */
  message: string;
  /** Innermost frame in caller code, null when the value carried no stack */
  frame: StackFrame | null;
  frames: StackFrame[];
  /** Original multi-line trace, including causes */
  trace: string;
  /** `<kind>: <message> (at <file>:<line> in <function>)` */
  summary: string;
  /** Summary plus the flattened trace, on one line */
  logEntry: string;
}

export interface NormalizeOptions {
  internalPaths?: readonly string[];
  sourceHint?: string;
  /** Base for the relative file names in the summary */
  cwd?: string;
}

/** Directory holding this package's sources */
export const LIBRARY_ROOT = fileURLToPath(new URL('..', import.meta.url));

const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;
const INTERNAL_PREFIXES = ['node:', 'internal/'];
const NODE_MODULES = /[\\/]node_modules[\\/]/;
const MAX_CAUSE_DEPTH = 5;

function toFilePath(location: string): string {
  if (!location.startsWith('file://')) return location;
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}

/**
 * Parse the `at ...` lines of a V8 stack. Lines without a file position are skipped.
 */
export function parseStack(stack: string | undefined): StackFrame[] {
  if (!stack) return [];

  const frames: StackFrame[] = [];
  for (const raw of stack.split(/\r?\n/)) {
    const match = FRAME_PATTERN.exec(raw);
    if (!match) continue;
    const [, name, location, line, column] = match;
    const functionName = name ? name.replace(/^async /, '') : null;
    frames.push({
      functionName,
      file: toFilePath(location),
      line: Number(line),
      column: Number(column),
      raw: raw.trim(),
    });
  }
  return frames;
}

export function isInternalFrame(frame: StackFrame, internalPaths: readonly string[] = [LIBRARY_ROOT]): boolean {
  if (INTERNAL_PREFIXES.some((prefix) => frame.file.startsWith(prefix))) return true;
  if (NODE_MODULES.test(frame.file)) return true;
  return internalPaths.some((root) => frame.file.startsWith(root));
}

/**
 * Innermost frame that belongs to caller code
 */
export function selectFrame(frames: readonly StackFrame[], options: NormalizeOptions = {}): StackFrame | null {
  const internalPaths = options.internalPaths ?? [LIBRARY_ROOT];
  const own = frames.find((frame) => !isInternalFrame(frame, internalPaths));
  if (own) return own;

  const hint = options.sourceHint;
  if (hint) {
    const hinted = frames.find((frame) => frame.file.includes(hint));
    if (hinted) return hinted;
  }
  return frames[0] ?? null;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function kindOf(value: unknown): string {
  if (value instanceof Error) {
    return value.name || value.constructor.name || 'Error';
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
  }
  return typeof value;
}

function traceOf(value: unknown): string {
  const parts: string[] = [];
  let current: unknown = value;
  for (let depth = 0; depth <= MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    const text = current.stack ?? `${kindOf(current)}: ${current.message}`;
    parts.push(depth === 0 ? text : `Caused by: ${text}`);
    current = current.cause;
  }
  return parts.join('\n');
}

function displayPath(file: string, cwd: string): string {
  if (!isAbsolute(file)) return file;
  const rel = relative(cwd, file);
  return rel && !rel.startsWith('..') && !isAbsolute(rel) ? rel : file;
}

/**
 * Reduce any thrown value to a one-line summary and a one-line log entry
 */
export function normalizeFailure(value: unknown, options: NormalizeOptions = {}): NormalizedFailure {
  const kind = kindOf(value);
  const rawMessage = value instanceof Error ? value.message : stringify(value);
  const [firstLine = '', ...rest] = rawMessage.split(/\r?\n/);
  const message = firstLine.trim();
  const frames = value instanceof Error ? parseStack(value.stack) : [];
  const frame = selectFrame(frames, options);
  const trace = traceOf(value) || (rest.length > 0 ? rawMessage : '');

  const location = frame
    ? ` (at ${displayPath(frame.file, options.cwd ?? process.cwd())}:${frame.line} in ${frame.functionName ?? '<anonymous>'})`
    : '';
  const summary = `${kind}: ${message}${location}`;
  const logEntry = trace ? `${summary} | trace: ${trace.replace(/\r?\n/g, '\\n')}` : summary;

  return { kind, message, frame, frames, trace, summary, logEntry };
}
