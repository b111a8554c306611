/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing terminal output, plus the
 * formatters used to render items, intervals and session results.
 *
 * Colors are dropped when the NO_COLOR environment variable is set
 * (https://no-color.org), which also keeps test output plain.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatItemStatus } from './terminal';
 *
 * console.log(bold('Interval Drill'));
 * console.log(formatItemStatus(item));
 * ```
 */

import { summarizeHistory, type Item } from '../../core/models';
import type { SessionSummary } from '../../core/session';

// =============================================================================
// Text Styles and Colors
// =============================================================================

function colorEnabled(): boolean {
  return !process.env.NO_COLOR;
}

function style(code: number, s: string): string {
  return colorEnabled() ? `\x1b[${code}m${s}\x1b[0m` : s;
}

/**
 * Makes text bold/bright in the terminal.
 * Use for emphasis on headings or key values.
 */
export const bold = (s: string): string => style(1, s);

/**
 * Makes text dim/faded in the terminal.
 * Use for secondary information like hints and timestamps.
 */
export const dim = (s: string): string => style(2, s);

/** Colors text green. Use for success messages. */
export const green = (s: string): string => style(32, s);

/** Colors text yellow. Use for warnings and counts needing attention. */
export const yellow = (s: string): string => style(33, s);

/** Colors text red. Use for errors. */
export const red = (s: string): string => style(31, s);

/** Colors text cyan. Use for the question and answer being reviewed. */
export const cyan = (s: string): string => style(36, s);

// =============================================================================
// Semantic Formatters
// =============================================================================

/** Number of past outcomes shown in an item's status line */
const STATUS_HISTORY_LENGTH = 5;

/**
 * Formats the status line shown above an item: recalled/total reviews and
 * the last five outcomes, newest first, as `o` (recalled) or `x` (forgot),
 * padded with `-`.
 *
 * @example
 * // history: correct, incorrect, correct (oldest first)
 * formatItemStatus(item);
 * // "2/3 oxo--"
 */
export function formatItemStatus(item: Pick<Item, 'history'>): string {
  const { recalled, total } = summarizeHistory(item);
  const marks = item.history
    .slice(-STATUS_HISTORY_LENGTH)
    .reverse()
    .map((record) => (record.outcome === 'correct' ? 'o' : 'x'))
    .join('')
    .padEnd(STATUS_HISTORY_LENGTH, '-');
  return `${recalled}/${total} ${marks}`;
}

/**
 * Formats an interval for humans: hours below a day, days (one decimal)
 * from there on.
 *
 * @example
 * formatHours(13);   // "13h"
 * formatHours(99);   // "4.1d"
 * formatHours(2160); // "90d"
 */
export function formatHours(hours: number): string {
  if (hours < 24) {
    return `${hours}h`;
  }
  return `${Number((hours / 24).toFixed(1))}d`;
}

/**
 * Formats a Date as local `YYYY-MM-DD HH:mm`.
 */
export function formatDateTime(date: Date): string {
  const pad = (n: number): string => n.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/**
 * Formats a horizontal separator line for visual section breaks.
 *
 * @param width - Width of the separator in characters (default: 50)
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Prints a blank line for visual spacing.
 */
export function printBlankLine(): void {
  console.log();
}

/**
 * Prints the banner shown before the first item of a session.
 *
 * @param dueCount - Number of items due when the session starts
 * @param decks - Decks being reviewed; empty means all decks
 */
export function printSessionBanner(dueCount: number, decks: readonly string[]): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Interval Drill - Review Session'));
  console.log(formatSeparator(60));
  console.log(`  Decks: ${green(decks.length > 0 ? decks.join(', ') : 'all')}`);
  console.log(`  Items due: ${yellow(dueCount.toString())}`);
  console.log(formatSeparator(60));
  printBlankLine();
}

/**
 * Prints the result of a session that ran out of due items.
 */
export function printSessionComplete(summary: SessionSummary): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(green(bold('  Session Complete!')));
  console.log(
    `  Reviewed ${yellow(summary.reviewed.toString())} item(s): ` +
      `${summary.correct} recalled, ${summary.incorrect} forgot.`
  );
  console.log(formatSeparator(60));
  printBlankLine();
}

/**
 * Prints the result of a session the operator quit.
 */
export function printSessionAbandoned(summary: SessionSummary): void {
  printBlankLine();
  console.log(
    yellow(`Session ended early after ${summary.reviewed} review(s). Your progress has been saved.`)
  );
  console.log(dim('Items you did not reach are still due.'));
  printBlankLine();
}

/**
 * Prints when the next item falls due, or a hint when there are no items.
 */
export function printNextReview(nextDueAt: Date | null): void {
  if (nextDueAt === null) {
    console.log(dim('No items scheduled. Use the `add` command to import some.'));
    return;
  }
  console.log(`Next review scheduled for ${bold(formatDateTime(nextDueAt))}.`);
}
