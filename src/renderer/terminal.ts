/**
 * Terminal backends for the virtual console
 *
 * Minimum capability set for styled output: VT100 absolute positioning (CSI row;col H),
 * erase line (CSI 2K), erase display (CSI 2J), cursor save/restore (CSI s / CSI u),
 * cursor show/hide (CSI ?25h / ?25l) and SGR colors. Anything else gets plain line output.
 */

import stringWidth from 'string-width';
import { stripAnsi } from './ansi';

export interface Terminal {
  /** Current width; re-queried on every access */
  readonly columns: number;
  /** Current height; re-queried on every access */
  readonly rows: number;
  /** False for pipes, files and TERM=dumb: no escape sequences are sent */
  readonly isStyled: boolean;
  write(data: string): void;
}

/**
 * The part of a tty.WriteStream the process terminal reads
 */
export interface OutputStream {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  write(data: string): unknown;
}

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;

/**
 * Check if a stream can take cursor movement and colors
 */
export function supportsStyling(stream: OutputStream, env: NodeJS.ProcessEnv = process.env): boolean {
  if (!stream.isTTY) return false;
  return (env.TERM ?? '').toLowerCase() !== 'dumb';
}

/**
 * Terminal over a process stream (stdout by default)
 */
export function createProcessTerminal(stream: OutputStream = process.stdout): Terminal {
  const isStyled = supportsStyling(stream);
  return {
    get columns() {
      return stream.columns || DEFAULT_COLUMNS;
    },
    get rows() {
      return stream.rows || DEFAULT_ROWS;
    },
    isStyled,
    write: (data: string) => {
      stream.write(data);
    },
  };
}

export interface MemoryTerminalOptions {
  columns?: number;
  rows?: number;
  styled?: boolean;
}

/**
 * In-process terminal that interprets the supported escape subset into a character grid.
 * Used by tests and by hosts that want to capture a session's screen.
 */
export class MemoryTerminal implements Terminal {
  columns: number;
  rows: number;
  readonly isStyled: boolean;
  /** Every byte written, escapes included */
  output = '';
  cursorVisible = true;

  private grid: string[][];
  private row = 0;
  private col = 0;
  private saved = { row: 0, col: 0 };

  constructor(options: MemoryTerminalOptions = {}) {
    this.columns = options.columns ?? DEFAULT_COLUMNS;
    this.rows = options.rows ?? DEFAULT_ROWS;
    this.isStyled = options.styled ?? true;
    this.grid = this.createGrid();
  }

  write(data: string): void {
    this.output += data;
    this.interpret(data);
  }

  /**
   * Simulate a window resize. Content is discarded, as most terminals leave it unreliable.
   */
  resize(columns: number, rows: number): void {
    this.columns = columns;
    this.rows = rows;
    this.grid = this.createGrid();
    this.row = Math.min(this.row, rows - 1);
    this.col = Math.min(this.col, columns - 1);
  }

  /**
   * Visible text of a row, trailing blanks removed
   */
  rowText(row: number): string {
    const cells = this.grid[row];
    return cells ? cells.join('').trimEnd() : '';
  }

  lines(): string[] {
    return this.grid.map((_, row) => this.rowText(row));
  }

  get cursorPosition(): { row: number; col: number } {
    return { row: this.row, col: this.col };
  }

  /**
   * Output with escapes removed (what a pipe would have received in unstyled mode)
   */
  get transcript(): string {
    return stripAnsi(this.output);
  }

  private createGrid(): string[][] {
    return Array.from({ length: this.rows }, () => Array<string>(this.columns).fill(' '));
  }

  private interpret(data: string): void {
    let i = 0;
    while (i < data.length) {
      if (data[i] === '\x1b' && data[i + 1] === '[') {
        let end = i + 2;
        while (end < data.length && !/[a-zA-Z]/.test(data[end])) end++;
        this.applySequence(data.slice(i + 2, end), data.charAt(end));
        i = end + 1;
        continue;
      }

      const char = String.fromCodePoint(data.codePointAt(i) ?? 0);
      if (char === '\n') {
        this.lineFeed();
      } else if (char === '\r') {
        this.col = 0;
      } else {
        this.put(char);
      }
      i += char.length;
    }
  }

  private applySequence(params: string, command: string): void {
    switch (command) {
      case 'H': {
        const [row = '1', col = '1'] = params.split(';');
        this.row = clamp((Number(row) || 1) - 1, 0, this.rows - 1);
        this.col = clamp((Number(col) || 1) - 1, 0, this.columns - 1);
        break;
      }
      case 'J':
        if (params === '2') this.grid = this.createGrid();
        break;
      case 'K':
        if (params === '2') this.grid[this.row]?.fill(' ');
        break;
      case 's':
        this.saved = { row: this.row, col: this.col };
        break;
      case 'u':
        this.row = this.saved.row;
        this.col = this.saved.col;
        break;
      case 'h':
      case 'l':
        if (params === '?25') this.cursorVisible = command === 'h';
        break;
      default:
        // SGR and anything else leave the grid untouched
        break;
    }
  }

  /**
   * Full-width characters take two cells (the second left empty); zero-width ones join the previous cell
   */
  private put(char: string): void {
    const cells = this.grid[this.row];
    const width = stringWidth(char);
    if (width === 0) {
      if (cells && this.col > 0 && this.col <= this.columns) cells[this.col - 1] += char;
      return;
    }
    if (cells && this.col + width <= this.columns) {
      cells[this.col] = char;
      if (width === 2) cells[this.col + 1] = '';
    }
    this.col += width;
  }

  private lineFeed(): void {
    this.col = 0;
    if (this.row < this.rows - 1) {
      this.row++;
      return;
    }
    this.grid.shift();
    this.grid.push(Array<string>(this.columns).fill(' '));
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}
