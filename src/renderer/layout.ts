/**
 * Layout math for the virtual console.
 * Pure functions: every width is passed in, nothing is read from the terminal here.
 */

import { visibleLength } from './ansi';

export const MIN_BAR_WIDTH = 1;
export const DEFAULT_BAR_WIDTH = 50;

const BAR_FILL = '#';
const BAR_EMPTY = '-';
/** Room kept for " [" + "]" + " 100%" */
const BAR_DECORATION = 8;

export interface Padding {
  left: number;
  right: number;
}

export interface ScreenLayout {
  width: number;
  height: number;
  titleRow: number;
  /** Bar rows that fit on screen; later bars are tracked but not painted */
  barRows: number;
  scrollTop: number;
  /** Inclusive */
  scrollBottom: number;
  capacity: number;
  promptRow: number;
}

/**
 * Padding that centers `textLength` columns in `width`.
 * Left is equal to right or one less; both are zero when the text does not fit.
 */
export function centerPadding(textLength: number, width: number): Padding {
  const free = Math.max(0, width - textLength);
  const left = Math.floor(free / 2);
  return { left, right: free - left };
}

/**
 * Pad a line with spaces so its visible text sits in the middle of `width`
 */
export function centerText(text: string, width: number): string {
  const { left, right } = centerPadding(visibleLength(text), width);
  return ' '.repeat(left) + text + ' '.repeat(right);
}

/**
 * Whole-number percentage in [0, 100]; a non-positive maximum counts as 0%
 */
export function progressPercent(current: number, maximum: number): number {
  if (!(maximum > 0) || !Number.isFinite(current)) return 0;
  const percent = Math.round((current / maximum) * 100);
  return Math.min(100, Math.max(0, percent));
}

/**
 * Inner bar width for a title on a terminal of `width` columns
 */
export function fitBarWidth(titleLength: number, width: number, preferred = DEFAULT_BAR_WIDTH): number {
  const room = width - titleLength - BAR_DECORATION;
  return Math.max(MIN_BAR_WIDTH, Math.min(preferred, room));
}

export interface BarParts {
  fill: string;
  empty: string;
}

/**
 * Split a bar of `barWidth` cells into filled and empty parts
 */
export function barParts(percent: number, barWidth: number): BarParts {
  const width = Math.max(MIN_BAR_WIDTH, barWidth);
  const filled = Math.min(width, Math.round((width * percent) / 100));
  return { fill: BAR_FILL.repeat(filled), empty: BAR_EMPTY.repeat(width - filled) };
}

/**
 * Plain progress bar, e.g. `[####------] 42%`
 */
export function formatProgressBar(percent: number, barWidth: number): string {
  const { fill, empty } = barParts(percent, barWidth);
  return `[${fill}${empty}] ${percent}%`;
}

/**
 * Row assignment for the current terminal size.
 * Row 0 is the title, bars follow, then the scrolling region, then the prompt row.
 * The last row stays blank: the newline a cooked-mode terminal echoes after an answer lands
 * there instead of scrolling the whole screen.
 */
export function computeLayout(width: number, height: number, barCount: number): ScreenLayout {
  const rows = Math.max(1, height);
  const promptRow = Math.max(0, rows - 2);
  const barRows = Math.max(0, Math.min(barCount, rows - 4));
  const scrollTop = 1 + barRows;
  const scrollBottom = Math.max(scrollTop, promptRow - 1);
  return {
    width: Math.max(1, width),
    height: rows,
    titleRow: 0,
    barRows,
    scrollTop,
    scrollBottom,
    capacity: scrollBottom - scrollTop + 1,
    promptRow,
  };
}
