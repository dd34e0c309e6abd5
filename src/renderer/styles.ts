/**
 * Severity styles and inline text helpers, built on chalk
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type Stylizer = (text: string) => string;

export interface ConsoleStyles {
  readonly enabled: boolean;
  /** Title bar: reversed video */
  window: Stylizer;
  warn: Stylizer;
  error: Stylizer;
  notice: Stylizer;
  bold: Stylizer;
  underline: Stylizer;
  /** `[HH:MM] ` prefix of leveled messages */
  timestamp: Stylizer;
  /** Progress fill colored from red (0%) to green (100%) */
  gradient: (text: string, percent: number) => string;
}

const identity: Stylizer = (text) => text;

/**
 * Color channel values for a percentage on the red-to-green ramp.
 * Out-of-range values come back blue so bad input is visible on screen.
 */
export function gradientColor(percent: number): [number, number, number] {
  if (percent > 100 || percent < 0) {
    return [0, 0, 200];
  }
  return [Math.round(2.55 * (100 - percent)), Math.round(2.55 * percent), 0];
}

/**
 * Create the style set for a terminal. Unstyled terminals get identity functions.
 */
export function createStyles(enabled: boolean): ConsoleStyles {
  if (!enabled) {
    return {
      enabled: false,
      window: identity,
      warn: identity,
      error: identity,
      notice: identity,
      bold: identity,
      underline: identity,
      timestamp: (text) => `[${text}] `,
      gradient: identity,
    };
  }

  // A styled terminal gets colors even when chalk's own detection looked at another stream
  const paint: ChalkInstance = new Chalk({ level: chalk.level === 0 ? 1 : chalk.level });

  return {
    enabled: true,
    window: (text) => paint.inverse(text),
    warn: (text) => paint.yellow(text),
    error: (text) => paint.red.bgWhite(text),
    notice: (text) => paint.white(text),
    bold: (text) => paint.bold(text),
    underline: (text) => paint.underline(text),
    timestamp: (text) => paint.green('[') + paint.cyan(text) + paint.green('] '),
    gradient: (text, percent) => {
      const [red, green, blue] = gradientColor(percent);
      return paint.rgb(red, green, blue)(text);
    },
  };
}
