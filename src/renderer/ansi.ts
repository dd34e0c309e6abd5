/**
 * ANSI escape codes for terminal control
 * Only the VT100 subset the virtual console relies on
 */

import stringWidth from 'string-width';

// Cursor control
export const cursor = {
  hide: '\x1b[?25l',
  show: '\x1b[?25h',
  home: '\x1b[H',

  // Move cursor to position (1-indexed)
  to: (row: number, col: number) => `\x1b[${row};${col}H`,

  // Save/restore position
  save: '\x1b[s',
  restore: '\x1b[u',
};

// Screen control
export const screen = {
  clear: '\x1b[2J',
  clearLine: '\x1b[2K',
};

// Text styles
export const style = {
  reset: '\x1b[0m',
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;?]*[a-zA-Z]/g;

/**
 * Strip ANSI codes from string (for length calculation)
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_PATTERN, '');
}

/**
 * Get visible width of string in terminal columns (excluding ANSI codes, wide characters count 2)
 */
export function visibleLength(str: string): number {
  return stringWidth(str);
}

/**
 * Truncate string to visible length, preserving ANSI codes.
 * A reset is appended when anything was cut so styles never bleed past the cut.
 */
export function truncate(str: string, maxLength: number, suffix = ''): string {
  const limit = Math.max(0, maxLength);
  if (visibleLength(str) <= limit) return str;

  const keep = Math.max(0, limit - visibleLength(suffix));
  let width = 0;
  let result = '';
  let inEscape = false;

  for (const char of str) {
    if (char === '\x1b') {
      inEscape = true;
      result += char;
    } else if (inEscape) {
      result += char;
      if (/[a-zA-Z]/.test(char)) {
        inEscape = false;
      }
    } else {
      const charWidth = stringWidth(char);
      if (width + charWidth > keep) break;
      result += char;
      width += charWidth;
    }
  }

  const hasEscapes = result.includes('\x1b');
  return result + (hasEscapes ? style.reset : '') + suffix.slice(0, limit);
}
