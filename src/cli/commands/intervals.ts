/**
 * Prints the interval table in use, one step per line.
 *
 * Triggered by the `--show-intervals` flag so the effect of
 * `--param-reviews` and `--param-hours` can be checked before reviewing.
 */

import type { IntervalTable } from '../../core/scheduling';
import { bold, dim, formatHours, formatSeparator } from '../utils/terminal';

export function printIntervals(table: IntervalTable): void {
  console.log(bold(`Interval table (${table.length} step(s)):`));
  console.log(formatSeparator(30));
  table.toHours().forEach((hours, step) => {
    console.log(`  ${step.toString().padStart(3)}  ${hours.toString().padStart(6)}h  ${dim(formatHours(hours))}`);
  });
  console.log(formatSeparator(30));
}
