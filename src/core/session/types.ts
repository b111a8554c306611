/**
 * Review Session Types
 *
 * The review session is the loop that walks due items, asks the operator
 * for a judgment and records it. Presentation and persistence are supplied
 * by the caller through the interfaces below so the loop itself has no
 * terminal or database code.
 */

import type { Item, ReviewOutcome } from '../models';
import type { Scheduler } from '../scheduling/scheduler';

/**
 * What the operator decided for one presented item.
 */
export type ReviewDecision = ReviewOutcome | 'quit';

/**
 * Shows an item and collects the operator's judgment.
 */
export interface ReviewPresenter {
  /**
   * @param item - The item to present; valid only for the duration of the call
   * @returns 'correct' or 'incorrect', or 'quit' to end the session early
   */
  present(item: Item): Promise<ReviewDecision>;
}

/**
 * Where reviewed items are written back.
 */
export interface ReviewedItemStore {
  save(item: Item): Promise<void>;
}

/**
 * Injectable services required by the ReviewSession.
 */
export interface ReviewSessionDependencies {
  /** Scheduler owning the loaded collection */
  scheduler: Scheduler;
  /** Asks the operator about each item */
  presenter: ReviewPresenter;
  /** Persists an item right after it is reviewed */
  store: ReviewedItemStore;
  /** Source of the current time (defaults to `() => new Date()`) */
  clock?: () => Date;
}

/**
 * Outcome of a finished or abandoned session.
 */
export interface SessionSummary {
  /** Number of reviews recorded, counting repeats of the same item */
  reviewed: number;
  /** Reviews judged 'correct' */
  correct: number;
  /** Reviews judged 'incorrect' */
  incorrect: number;
  /** Whether the operator quit before the due items ran out */
  quit: boolean;
  /** Earliest upcoming due time after the session, or null with no items */
  nextDueAt: Date | null;
}
