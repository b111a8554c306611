/**
 * Interval Table - Review Spacing Sequence
 *
 * The interval table is the ordered list of waiting times between reviews.
 * An item at step `k` is next due `durationAt(k)` after its last review.
 * The first entry is always 0 so a freshly imported or forgotten item is due
 * immediately, and entries never decrease.
 *
 * Tables are built either from an explicit list of hours or from two growth
 * parameters:
 *
 *     t(n) = floor(exp(n * ln(hours + 1) / reviews) - 1)    for n = 0..reviews
 *
 * where `hours` is the longest interval and `reviews` is the number of
 * consecutive correct reviews needed to reach it. Consecutive equal values
 * are collapsed so every step lengthens the interval. With the defaults
 * (20 reviews, 2160 hours) this yields DEFAULT_INTERVAL_HOURS exactly.
 *
 * A table is immutable once built. Changing the parameters after items have
 * accumulated steps is allowed, but it changes what those steps mean.
 */

import { IndexOutOfRangeError, IntervalTableConfigError } from '../errors';

/** Milliseconds in one hour */
export const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Default spacing in hours, from "due now" up to 90 days.
 */
export const DEFAULT_INTERVAL_HOURS: readonly number[] = [
  0, 1, 2, 3, 5, 9, 13, 20, 30, 45, 67, 99, 146, 214, 315, 464, 682, 1001, 1471, 2160,
];

/**
 * Parameters of the exponential growth curve.
 */
export interface IntervalGrowthParams {
  /**
   * Number of consecutive correct reviews after which the interval reaches
   * `hours`. Must be a positive integer.
   * Default: 20
   */
  reviews: number;

  /**
   * Longest interval between two reviews of the same item, in hours.
   * Must be a non-negative integer.
   * Default: 2160 (90 days)
   */
  hours: number;
}

export const DEFAULT_GROWTH_PARAMS: IntervalGrowthParams = {
  reviews: 20,
  hours: 2160,
};

// Absorbs rounding in exp/log so that exact integers such as the final
// `hours` entry are not floored to the integer below.
const ROUNDING_SLACK = 1e-6;

/**
 * Computes the growth curve in whole hours, collapsing repeated values.
 *
 * @example
 * ```typescript
 * computeIntervalHours({ reviews: 5, hours: 24 });
 * // [0, 2, 5, 12, 24]
 * ```
 */
export function computeIntervalHours(params: IntervalGrowthParams): number[] {
  const { reviews, hours } = params;

  if (!Number.isInteger(reviews) || reviews < 1) {
    throw new IntervalTableConfigError(
      `reviews must be a positive integer, got ${reviews}`
    );
  }
  if (!Number.isInteger(hours) || hours < 0) {
    throw new IntervalTableConfigError(
      `hours must be a non-negative integer, got ${hours}`
    );
  }

  const growth = Math.log(hours + 1) / reviews;
  const result: number[] = [];

  for (let n = 0; n <= reviews; n++) {
    const value = Math.floor(Math.exp(n * growth) - 1 + ROUNDING_SLACK);
    if (result.length === 0 || result[result.length - 1] !== value) {
      result.push(value);
    }
  }

  return result;
}

/**
 * Immutable, bounds-checked sequence of review intervals.
 *
 * @example
 * ```typescript
 * const table = IntervalTable.default();
 * table.length;            // 20
 * table.hoursAt(1);        // 1
 * table.durationAt(1);     // 3_600_000
 * table.durationAt(20);    // throws IndexOutOfRangeError
 * ```
 */
export class IntervalTable {
  private readonly hours: readonly number[];

  private constructor(hours: readonly number[]) {
    this.hours = Object.freeze([...hours]);
  }

  /**
   * Builds a table from an explicit list of hours.
   *
   * @throws {IntervalTableConfigError} if the list is empty, does not start
   *   at 0, or has a negative, non-finite or decreasing entry
   */
  static fromHours(hours: readonly number[]): IntervalTable {
    if (hours.length === 0) {
      throw new IntervalTableConfigError('An interval table needs at least one step');
    }
    if (hours[0] !== 0) {
      throw new IntervalTableConfigError(
        `The first interval must be 0 so new items are due immediately, got ${hours[0]}`
      );
    }

    for (let i = 1; i < hours.length; i++) {
      const value = hours[i];
      if (!Number.isFinite(value) || value < 0) {
        throw new IntervalTableConfigError(
          `Interval at step ${i} must be a non-negative number, got ${value}`
        );
      }
      if (value < hours[i - 1]) {
        throw new IntervalTableConfigError(
          `Intervals must not decrease: step ${i} (${value}h) is shorter than step ${i - 1} (${hours[i - 1]}h)`
        );
      }
    }

    return new IntervalTable(hours);
  }

  /**
   * Builds a table from the growth curve, filling unspecified parameters
   * from DEFAULT_GROWTH_PARAMS.
   */
  static fromGrowth(params: Partial<IntervalGrowthParams> = {}): IntervalTable {
    return IntervalTable.fromHours(
      computeIntervalHours({ ...DEFAULT_GROWTH_PARAMS, ...params })
    );
  }

  /** The table built from DEFAULT_INTERVAL_HOURS. */
  static default(): IntervalTable {
    return IntervalTable.fromHours(DEFAULT_INTERVAL_HOURS);
  }

  /** Number of steps; always at least 1. */
  get length(): number {
    return this.hours.length;
  }

  /** Index of the longest interval. */
  get lastStep(): number {
    return this.hours.length - 1;
  }

  /**
   * Waiting time for the given step, in milliseconds.
   *
   * @throws {IndexOutOfRangeError} if `step` is not an integer in `[0, length)`
   */
  durationAt(step: number): number {
    return this.hoursAt(step) * MS_PER_HOUR;
  }

  /**
   * Waiting time for the given step, in hours.
   *
   * @throws {IndexOutOfRangeError} if `step` is not an integer in `[0, length)`
   */
  hoursAt(step: number): number {
    if (!Number.isInteger(step) || step < 0 || step >= this.hours.length) {
      throw new IndexOutOfRangeError(step, this.hours.length);
    }
    return this.hours[step];
  }

  /** A copy of every interval, in hours. */
  toHours(): number[] {
    return [...this.hours];
  }
}
