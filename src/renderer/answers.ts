/**
 * Answer parsing for yes/no and list prompts
 */

import { PromptValidationError } from '../utils/errors';

export const YES_ANSWERS: ReadonlySet<string> = new Set(['y', 'yes']);
export const NO_ANSWERS: ReadonlySet<string> = new Set(['n', 'no']);

/**
 * Parse a yes/no answer (case-insensitive, surrounding blanks ignored).
 * An empty answer falls back to `defaultAnswer` when one is given.
 */
export function parseYesNo(answer: string, defaultAnswer?: boolean): boolean {
  const token = answer.trim().toLowerCase();
  if (YES_ANSWERS.has(token)) return true;
  if (NO_ANSWERS.has(token)) return false;
  if (token === '' && defaultAnswer !== undefined) return defaultAnswer;
  throw new PromptValidationError('Please answer y or n.');
}

/**
 * Hint shown after the question, capitalizing the default when there is one
 */
export function yesNoHint(defaultAnswer?: boolean): string {
  if (defaultAnswer === true) return '[Y/n]';
  if (defaultAnswer === false) return '[y/N]';
  return '[y/n]';
}

/**
 * Resolve a list answer to the option text.
 * A whole number selects by 1-based position; anything else must equal an option exactly.
 */
export function parseListChoice(answer: string, options: readonly string[]): string {
  const token = answer.trim();
  const outOfRange = `Please enter a number between 1 and ${options.length}.`;

  if (/^\d+$/.test(token)) {
    const index = Number(token);
    const option = options[index - 1];
    if (index >= 1 && option !== undefined) return option;
    throw new PromptValidationError(outOfRange);
  }

  const match = options.find((option) => option === answer || option === token);
  if (match !== undefined) return match;
  throw new PromptValidationError(outOfRange);
}

/**
 * Numbered rendering of a list, 1-indexed
 */
export function formatOptions(options: readonly string[]): string[] {
  const width = String(options.length).length;
  return options.map((option, index) => `  ${String(index + 1).padStart(width)}) ${option}`);
}
