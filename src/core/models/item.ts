/**
 * Item Domain Types
 *
 * An Item is one question/answer pair tracked for repeated review. Its
 * content never changes after import; its scheduling fields (`step`,
 * `dueAt`, `lastReviewedAt`, `history`) change only through
 * `Scheduler.review`.
 *
 * This module contains only types and pure helpers with no runtime
 * dependencies, forming the contract between the scheduler, the session
 * runner, the storage layer and the CLI.
 */

/** The deck items land in when an import does not name one. */
export const DEFAULT_DECK = 'default';

/**
 * The operator's judgment of a single review.
 *
 * - 'correct': the answer was recalled; the item advances one step
 * - 'incorrect': the answer was forgotten; the item resets to step 0
 */
export type ReviewOutcome = 'correct' | 'incorrect';

/**
 * One entry in an item's review history.
 */
export interface ReviewRecord {
  /** When the review happened */
  reviewedAt: Date;
  /** What the operator reported */
  outcome: ReviewOutcome;
}

/**
 * A question/answer pair as read from an import file, before it becomes an Item.
 */
export interface QuestionAnswerPair {
  question: string;
  answer: string;
}

/**
 * A reviewable question/answer pair and its position in the interval table.
 *
 * @example
 * ```typescript
 * const item: Item = {
 *   id: 'item_3f1c…',
 *   deck: 'default',
 *   question: '2+2',
 *   answer: '4',
 *   step: 1,
 *   dueAt: new Date('2024-01-15T11:00:00Z'),
 *   lastReviewedAt: new Date('2024-01-15T10:00:00Z'),
 *   history: [{ reviewedAt: new Date('2024-01-15T10:00:00Z'), outcome: 'correct' }],
 *   createdAt: new Date('2024-01-15T09:30:00Z'),
 * };
 * ```
 */
export interface Item {
  /** Unique identifier, prefixed with `item_` */
  readonly id: string;

  /** Name of the deck the item was imported into */
  readonly deck: string;

  /** Prompt shown to the operator */
  readonly question: string;

  /** Expected answer revealed after the prompt */
  readonly answer: string;

  /**
   * Index into the interval table. Always within `[0, table.length)`;
   * 0 for a new or just-forgotten item.
   */
  step: number;

  /**
   * Earliest time the item is eligible for review again. Equal to
   * `createdAt` for a never-reviewed item, and to
   * `lastReviewedAt + table.durationAt(step)` afterwards.
   */
  dueAt: Date;

  /** Time of the most recent review, or null if never reviewed */
  lastReviewedAt: Date | null;

  /** Every review, oldest first */
  history: ReviewRecord[];

  /** When the item was imported */
  readonly createdAt: Date;
}

/**
 * Review counts derived from an item's history.
 */
export interface HistorySummary {
  recalled: number;
  forgot: number;
  total: number;
}

/**
 * Counts how many times an item has been recalled and forgotten.
 */
export function summarizeHistory(item: Pick<Item, 'history'>): HistorySummary {
  let recalled = 0;
  for (const record of item.history) {
    if (record.outcome === 'correct') {
      recalled++;
    }
  }
  return {
    recalled,
    forgot: item.history.length - recalled,
    total: item.history.length,
  };
}
