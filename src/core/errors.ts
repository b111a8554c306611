/**
 * Error Types for Interval Drill
 *
 * Every failure the core and storage layers can produce has its own Error
 * subclass so callers can branch with `instanceof` rather than matching on
 * message text. The CLI entry point is the only place that turns these into
 * process exit codes.
 *
 * - IndexOutOfRangeError: an interval table was asked for a step it does not have
 * - IntervalTableConfigError: an interval table was built from invalid parameters
 * - ItemNotFoundError: a review referenced an item the scheduler does not manage
 * - ImportFormatError: an import file could not be read or a record was malformed
 * - PersistenceError: the item store could not be opened, read or written
 * - SpeechError: the text-to-speech command failed
 */

/**
 * Raised when `IntervalTable.durationAt` is called with a step outside
 * `[0, length)`. The scheduler clamps steps, so this signals a broken invariant.
 */
export class IndexOutOfRangeError extends Error {
  public readonly step: number;
  public readonly length: number;

  constructor(step: number, length: number) {
    super(`Step ${step} is outside the interval table range [0, ${length})`);
    this.name = 'IndexOutOfRangeError';
    this.step = step;
    this.length = length;
  }
}

/**
 * Raised when an interval table is constructed from an empty, negative,
 * decreasing or otherwise unusable set of durations or growth parameters.
 */
export class IntervalTableConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntervalTableConfigError';
  }
}

/**
 * Raised when `Scheduler.review` receives an item that is not part of the
 * collection it manages. The collection is left untouched.
 */
export class ItemNotFoundError extends Error {
  public readonly itemId: string;

  constructor(itemId: string) {
    super(`Item '${itemId}' is not part of the managed collection`);
    this.name = 'ItemNotFoundError';
    this.itemId = itemId;
  }
}

/**
 * Raised when an import file cannot be read, or when one of its records does
 * not split into exactly a question and an answer.
 *
 * `line` is 1-based and refers to the line on which the bad record starts;
 * it is absent when the whole file could not be read.
 */
export class ImportFormatError extends Error {
  public readonly source: string;
  public readonly line?: number;

  constructor(message: string, source: string, line?: number) {
    const location = line === undefined ? source : `${source}:${line}`;
    super(`${location}: ${message}`);
    this.name = 'ImportFormatError';
    this.source = source;
    this.line = line;
  }
}

/**
 * Raised when loading or saving items fails. The original driver error is
 * kept as `cause`.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Raised when the configured text-to-speech command cannot be started or
 * exits with a non-zero status.
 */
export class SpeechError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpeechError';
  }
}
