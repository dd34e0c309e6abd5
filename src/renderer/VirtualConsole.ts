/**
 * Virtual console: pinned title, progress and prompt rows over a plain terminal
 *
 * The terminal is never allowed to scroll on its own. Styled output is written with absolute
 * positioning only; when the scrolling region is full its history is shifted in memory and the
 * region is repainted in place, followed by every reserved row. Reserved rows therefore keep
 * their offsets regardless of how much text has gone through the region.
 */

import { cursor, screen, style, truncate, visibleLength } from './ansi';
import {
  barParts,
  centerText,
  computeLayout,
  DEFAULT_BAR_WIDTH,
  fitBarWidth,
  progressPercent,
  type ScreenLayout,
} from './layout';
import type { ConsoleStyles } from './styles';
import type { Terminal } from './terminal';

export interface ProgressState {
  readonly title: string;
  current: number;
  maximum: number;
  /** Percentage last painted; null until the bar is painted for the first time */
  percent: number | null;
  /** Screen row assigned on first use (1-based below the title row) */
  readonly row: number;
  complete: boolean;
}

export interface VirtualConsoleOptions {
  barWidth?: number;
  /** Low-latency calls paint once every this many calls */
  lowLatencyInterval?: number;
}

export interface PaintOptions {
  lowLatency?: boolean;
}

const DEFAULT_LOW_LATENCY_INTERVAL = 100;

function singleLine(text: string): string {
  return text.replace(/\r?\n/g, ' ');
}

export class VirtualConsole {
  private title: string | null = null;
  private readonly bars = new Map<string, ProgressState>();
  private history: string[] = [];
  private prompt: string | null = null;
  private lastSize: { width: number; height: number } | null = null;
  private lowLatencyIndex = 0;
  private readonly barWidth: number;
  private readonly lowLatencyInterval: number;

  constructor(
    private readonly terminal: Terminal,
    private readonly styles: ConsoleStyles,
    options: VirtualConsoleOptions = {}
  ) {
    this.barWidth = options.barWidth ?? DEFAULT_BAR_WIDTH;
    this.lowLatencyInterval = options.lowLatencyInterval ?? DEFAULT_LOW_LATENCY_INTERVAL;
  }

  get mainTitle(): string | null {
    return this.title;
  }

  /**
   * Lines currently held by the scrolling region, oldest first
   */
  get scrollback(): readonly string[] {
    return [...this.history];
  }

  get progressCount(): number {
    return this.bars.size;
  }

  /**
   * Row the next scrolled line lands on
   */
  get scrollRow(): number {
    const layout = this.layout();
    return this.history.length < layout.capacity ? layout.scrollTop + this.history.length : layout.scrollBottom;
  }

  progress(title: string): Readonly<ProgressState> | undefined {
    const state = this.bars.get(title);
    return state ? { ...state } : undefined;
  }

  /**
   * Layout for the terminal's size right now
   */
  layout(): ScreenLayout {
    return computeLayout(this.terminal.columns, this.terminal.rows, this.bars.size);
  }

  setMainTitle(text: string | null): void {
    this.title = text === null ? null : singleLine(text);

    if (!this.terminal.isStyled) {
      if (this.title !== null) this.terminal.write(`${this.title}\n`);
      return;
    }

    const layout = this.begin();
    this.paint((out) => this.paintTitle(out, layout));
  }

  advanceScroll(text: string, options: PaintOptions = {}): void {
    if (options.lowLatency && this.skipLowLatency()) return;

    const lines = text.split(/\r?\n/);

    if (!this.terminal.isStyled) {
      this.history.push(...lines);
      this.trimHistory(this.layout().capacity);
      this.terminal.write(lines.map((line) => `${line}\n`).join(''));
      return;
    }

    const layout = this.begin();
    this.paint((out) => {
      let overflow = false;
      for (const line of lines) {
        if (!overflow && this.history.length < layout.capacity) {
          this.paintRow(out, layout, layout.scrollTop + this.history.length, line);
        } else {
          overflow = true;
        }
        this.history.push(line);
      }

      if (overflow) {
        this.trimHistory(layout.capacity);
        this.paintScrollRegion(out, layout);
        this.paintReserved(out, layout);
      }
    });
  }

  renderProgress(title: string, current: number, maximum: number, options: PaintOptions = {}): Readonly<ProgressState> {
    const key = singleLine(title);
    let state = this.bars.get(key);
    const isNew = state === undefined;

    if (!state) {
      state = { title: key, current, maximum, percent: null, row: 1 + this.bars.size, complete: false };
      this.bars.set(key, state);
    } else if (current < state.current) {
      state.complete = false;
    }

    state.current = current;
    state.maximum = maximum;
    const completes = maximum > 0 && current >= maximum && !state.complete;
    if (completes) state.complete = true;

    // A completing update is always painted so a throttled bar never stops short of 100%
    if (options.lowLatency && !completes && this.skipLowLatency()) {
      return { ...state };
    }

    const percent = progressPercent(current, maximum);

    if (!this.terminal.isStyled) {
      if (state.percent !== percent) {
        this.terminal.write(`${this.formatBar(state, percent, this.terminal.columns, false)}\n`);
      }
      state.percent = percent;
      return { ...state };
    }

    const layout = this.begin();
    const bar = state;
    this.paint((out) => {
      if (isNew && bar.row <= layout.barRows) {
        // The region just lost a row to the new bar
        this.trimHistory(layout.capacity);
        this.paintScrollRegion(out, layout);
      }
      this.paintBar(out, layout, bar, percent);
    });
    return { ...state };
  }

  /**
   * Paint a prompt on the prompt row and leave the cursor right after it
   */
  renderPrompt(text: string): void {
    this.prompt = singleLine(text);

    if (!this.terminal.isStyled) {
      this.terminal.write(`${this.prompt} `);
      return;
    }

    const layout = this.begin();
    this.terminal.write(this.promptSequence(layout));
  }

  clearPrompt(): void {
    this.prompt = null;
    if (!this.terminal.isStyled) return;

    const layout = this.begin();
    const gutter = layout.height - 1;
    const out = [cursor.to(gutter + 1, 1), screen.clearLine, cursor.to(layout.promptRow + 1, 1), screen.clearLine];
    this.terminal.write(style.reset + out.join(''));
  }

  /**
   * Erase the terminal and forget the title, every bar and the scrollback
   */
  clear(): void {
    this.title = null;
    this.bars.clear();
    this.history = [];
    this.prompt = null;
    this.lowLatencyIndex = 0;

    const layout = this.layout();
    this.lastSize = { width: layout.width, height: layout.height };
    if (this.terminal.isStyled) {
      this.terminal.write(style.reset + screen.clear + cursor.home);
    }
  }

  /**
   * Repaint every region from state
   */
  redraw(): void {
    if (!this.terminal.isStyled) return;
    const layout = this.layout();
    this.lastSize = { width: layout.width, height: layout.height };
    this.repaintAll(layout);
  }

  /**
   * Re-query the size and repaint everything when it changed since the last paint
   */
  private begin(): ScreenLayout {
    const layout = this.layout();
    const resized =
      this.lastSize !== null && (this.lastSize.width !== layout.width || this.lastSize.height !== layout.height);
    this.lastSize = { width: layout.width, height: layout.height };
    if (resized) {
      this.repaintAll(layout);
    }
    return layout;
  }

  private repaintAll(layout: ScreenLayout): void {
    this.trimHistory(layout.capacity);
    this.terminal.write(style.reset + screen.clear);
    this.paint((out) => {
      this.paintScrollRegion(out, layout);
      this.paintReserved(out, layout);
    });
    if (this.prompt !== null) {
      this.terminal.write(this.promptSequence(layout));
    }
  }

  /**
   * Collect a frame and flush it with the cursor hidden, saved and restored.
   * The restore is written even when building the frame throws.
   */
  private paint(build: (out: string[]) => void): void {
    const out: string[] = [cursor.hide, cursor.save];
    try {
      build(out);
    } finally {
      out.push(style.reset, cursor.restore, cursor.show);
      this.terminal.write(out.join(''));
    }
  }

  private paintRow(out: string[], layout: ScreenLayout, row: number, text: string): void {
    out.push(cursor.to(row + 1, 1), screen.clearLine, truncate(text, layout.width), style.reset);
  }

  private paintTitle(out: string[], layout: ScreenLayout): void {
    if (this.title === null) {
      out.push(cursor.to(layout.titleRow + 1, 1), screen.clearLine);
      return;
    }
    const text = truncate(this.title, layout.width);
    this.paintRow(out, layout, layout.titleRow, this.styles.window(centerText(text, layout.width)));
  }

  private paintBar(out: string[], layout: ScreenLayout, state: ProgressState, percent: number): void {
    state.percent = percent;
    if (state.row > layout.barRows) return;
    this.paintRow(out, layout, state.row, this.formatBar(state, percent, layout.width, true));
  }

  private paintScrollRegion(out: string[], layout: ScreenLayout): void {
    for (let offset = 0; offset < layout.capacity; offset++) {
      this.paintRow(out, layout, layout.scrollTop + offset, this.history[offset] ?? '');
    }
  }

  private paintReserved(out: string[], layout: ScreenLayout): void {
    this.paintTitle(out, layout);
    for (const state of this.bars.values()) {
      this.paintBar(out, layout, state, progressPercent(state.current, state.maximum));
    }
  }

  private formatBar(state: ProgressState, percent: number, width: number, colored: boolean): string {
    const barWidth = fitBarWidth(visibleLength(state.title), width, this.barWidth);
    const { fill, empty } = barParts(percent, barWidth);
    const painted = colored ? this.styles.gradient(fill, percent) : fill;
    return `${state.title} [${painted}${empty}] ${percent}%`;
  }

  private promptSequence(layout: ScreenLayout): string {
    const text = truncate(this.prompt ?? '', Math.max(0, layout.width - 1));
    return style.reset + cursor.to(layout.promptRow + 1, 1) + screen.clearLine + text + ' ' + cursor.show;
  }

  private trimHistory(capacity: number): void {
    if (this.history.length > capacity) {
      this.history = this.history.slice(this.history.length - capacity);
    }
  }

  /**
   * Throttle shared by every low-latency call: the first call paints, then every Nth
   */
  private skipLowLatency(): boolean {
    const skip = this.lowLatencyIndex !== 0;
    this.lowLatencyIndex = (this.lowLatencyIndex + 1) % this.lowLatencyInterval;
    return skip;
  }
}
