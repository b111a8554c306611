/**
 * Scheduler - Due Selection and Review Transitions
 *
 * The scheduler owns the in-memory item collection for a session and is the
 * only place item scheduling fields change. Each item is a small state
 * machine whose states are the steps of the interval table:
 *
 * - a new item starts at step 0 and is due at its creation time
 * - 'correct' moves it to `min(step + 1, lastStep)`, so the last step is a
 *   plateau an item can stay on indefinitely
 * - 'incorrect' sends it back to step 0, due again immediately
 *
 * After either outcome `lastReviewedAt = now` and
 * `dueAt = now + table.durationAt(step)`.
 *
 * The scheduler never reads the clock itself; callers pass `now` so one
 * timestamp can be used for a whole pass over the due items.
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_DECK,
  type Item,
  type QuestionAnswerPair,
  type ReviewOutcome,
} from '../models';
import { ItemNotFoundError } from '../errors';
import type { IntervalTable } from './interval-table';

/**
 * Options for `Scheduler.addItems`.
 */
export interface AddItemsOptions {
  /** Creation time shared by the whole batch (defaults to the current time) */
  now?: Date;
  /** Deck the new items belong to (defaults to DEFAULT_DECK) */
  deck?: string;
}

function generateItemId(): string {
  return `item_${randomUUID()}`;
}

/**
 * Selects due items and applies review outcomes over a managed collection.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler(IntervalTable.default(), await itemRepo.findAll());
 *
 * const now = new Date();
 * for (const item of scheduler.dueItems(now)) {
 *   scheduler.review(item, 'correct', now);
 * }
 * ```
 */
export class Scheduler {
  /** Items in insertion order */
  private readonly collection: Item[] = [];

  /** Lookup used to check that a reviewed item is the managed instance */
  private readonly byId = new Map<string, Item>();

  /**
   * @param table - Interval table used for every transition; never mutated
   * @param items - Previously persisted items, in their original insertion order.
   *   An item whose step is at or past the end of the table (saved under a
   *   longer table) is moved to the last step; its `dueAt` is kept.
   */
  constructor(
    private readonly table: IntervalTable,
    items: Iterable<Item> = []
  ) {
    for (const item of items) {
      item.step = Math.min(item.step, this.table.lastStep);
      this.track(item);
    }
  }

  /** The interval table this scheduler advances items through. */
  get intervals(): IntervalTable {
    return this.table;
  }

  /** Every managed item, in insertion order. */
  get items(): readonly Item[] {
    return this.collection;
  }

  /**
   * Yields every item with `dueAt <= now`, earliest first, ties in insertion
   * order.
   *
   * The selection is taken when iteration starts, so reviews made while
   * iterating do not re-add an item to the current pass; calling again gives
   * a fresh selection reflecting those reviews.
   */
  *dueItems(now: Date): Generator<Item, void, undefined> {
    const cutoff = now.getTime();
    // Array.prototype.sort is stable, which keeps insertion order for ties
    const due = this.collection
      .filter((item) => item.dueAt.getTime() <= cutoff)
      .sort((a, b) => a.dueAt.getTime() - b.dueAt.getTime());

    yield* due;
  }

  /**
   * Number of items due at `now`.
   */
  countDue(now: Date): number {
    const cutoff = now.getTime();
    return this.collection.filter((item) => item.dueAt.getTime() <= cutoff).length;
  }

  /**
   * Earliest `dueAt` across the collection, or null when it is empty.
   */
  nextDueAt(): Date | null {
    let earliest: Date | null = null;
    for (const item of this.collection) {
      if (earliest === null || item.dueAt.getTime() < earliest.getTime()) {
        earliest = item.dueAt;
      }
    }
    return earliest;
  }

  /**
   * Applies a review outcome to an item.
   *
   * All fields are computed before any is written, so a failure leaves the
   * item and the collection untouched.
   *
   * @throws {ItemNotFoundError} if `item` is not the instance this scheduler manages
   */
  review(item: Item, outcome: ReviewOutcome, now: Date): void {
    if (this.byId.get(item.id) !== item) {
      throw new ItemNotFoundError(item.id);
    }

    const step =
      outcome === 'correct' ? Math.min(item.step + 1, this.table.lastStep) : 0;
    const dueAt = new Date(now.getTime() + this.table.durationAt(step));
    const reviewedAt = new Date(now.getTime());

    item.step = step;
    item.lastReviewedAt = reviewedAt;
    item.dueAt = dueAt;
    item.history.push({ reviewedAt, outcome });
  }

  /**
   * Creates one new item per pair, all at step 0 and due at the same instant.
   * Duplicate pairs are kept as independent items.
   *
   * @returns The created items, in input order
   */
  addItems(pairs: Iterable<QuestionAnswerPair>, options: AddItemsOptions = {}): Item[] {
    const createdAt = options.now ?? new Date();
    const deck = options.deck ?? DEFAULT_DECK;

    const created: Item[] = [];
    for (const pair of pairs) {
      const item: Item = {
        id: generateItemId(),
        deck,
        question: pair.question,
        answer: pair.answer,
        step: 0,
        dueAt: new Date(createdAt.getTime()),
        lastReviewedAt: null,
        history: [],
        createdAt: new Date(createdAt.getTime()),
      };
      created.push(item);
    }

    for (const item of created) {
      this.track(item);
    }
    return created;
  }

  private track(item: Item): void {
    this.collection.push(item);
    this.byId.set(item.id, item);
  }
}
