/**
 * Item Repository Implementation
 *
 * Data access for Item entities. Handles the mapping between the flat
 * `items` table (epoch-millisecond timestamps, JSON review history) and the
 * Item domain model (Date objects, ReviewRecord array).
 *
 * Every failure is rethrown as a PersistenceError with the driver error as
 * its cause. Multi-row writes run in a single SQLite transaction, and the
 * database file is rewritten after each successful write, so an interrupted
 * import or save leaves the previous state intact.
 */

import { eq, inArray, sql } from 'drizzle-orm';
import { persistDatabase, type AppDatabase } from '../db';
import { items, type ItemRow, type NewItemRow } from '../schema';
import type { Item } from '@/core/models';
import { PersistenceError } from '@/core/errors';
import type { Repository } from './base';

/**
 * Rows per INSERT statement, keeping well under SQLite's bound-parameter limit.
 */
const INSERT_BATCH_SIZE = 100;

/**
 * Options for `ItemRepository.findAll`.
 */
export interface FindItemsOptions {
  /** Only return items in these decks; all decks when empty or absent */
  decks?: readonly string[];
}

/**
 * Item and due counts for one deck.
 */
export interface DeckSummary {
  deck: string;
  itemCount: number;
  dueCount: number;
}

/**
 * Maps a database row to an Item domain model.
 */
function mapToDomain(row: ItemRow): Item {
  return {
    id: row.id,
    deck: row.deck,
    question: row.question,
    answer: row.answer,
    step: row.step,
    // Drizzle's timestamp_ms mode already returns Date objects
    dueAt: row.dueAt,
    lastReviewedAt: row.lastReviewedAt,
    history: row.reviewHistory.map((record) => ({
      reviewedAt: new Date(record.reviewedAt),
      outcome: record.outcome,
    })),
    createdAt: row.createdAt,
  };
}

/**
 * Maps an Item to the values written to its row.
 */
function mapToRow(item: Item): NewItemRow {
  return {
    id: item.id,
    deck: item.deck,
    question: item.question,
    answer: item.answer,
    step: item.step,
    dueAt: item.dueAt,
    lastReviewedAt: item.lastReviewedAt,
    reviewHistory: item.history.map((record) => ({
      reviewedAt: record.reviewedAt.getTime(),
      outcome: record.outcome,
    })),
    createdAt: item.createdAt,
  };
}

/**
 * Runs a storage operation, converting any failure into a PersistenceError.
 */
function guard<T>(action: string, operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`Failed to ${action}`, { cause: error });
  }
}

/**
 * Repository for Item entity data access operations.
 *
 * @example
 * ```typescript
 * const repo = new ItemRepository(db);
 *
 * // Load the collection for a session
 * const collection = await repo.findAll({ decks: ['spanish'] });
 *
 * // Persist an item after reviewing it
 * scheduler.review(item, 'correct', new Date());
 * await repo.save(item);
 * ```
 */
export class ItemRepository implements Repository<Item> {
  /**
   * @param db - The Drizzle database instance to use for queries
   */
  constructor(private readonly db: AppDatabase) {}

  /**
   * Retrieves an item by its unique identifier.
   */
  async findById(id: string): Promise<Item | null> {
    return guard(`load item '${id}'`, () => {
      const row = this.db.orm.select().from(items).where(eq(items.id, id)).get();
      return row ? mapToDomain(row) : null;
    });
  }

  /**
   * Retrieves items in insertion order, optionally limited to some decks.
   */
  async findAll(options: FindItemsOptions = {}): Promise<Item[]> {
    const decks = options.decks ?? [];

    return guard('load items', () => {
      const query = this.db.orm.select().from(items);
      const rows =
        decks.length > 0
          ? query.where(inArray(items.deck, [...decks])).orderBy(sql`rowid`).all()
          : query.orderBy(sql`rowid`).all();
      return rows.map(mapToDomain);
    });
  }

  /**
   * Stores new items in one transaction.
   */
  async insertMany(entities: readonly Item[]): Promise<void> {
    if (entities.length === 0) {
      return;
    }

    guard(`insert ${entities.length} item(s)`, () => {
      this.db.orm.transaction((tx) => {
        for (let start = 0; start < entities.length; start += INSERT_BATCH_SIZE) {
          const batch = entities.slice(start, start + INSERT_BATCH_SIZE).map(mapToRow);
          tx.insert(items).values(batch).run();
        }
      });
      persistDatabase(this.db);
    });
  }

  /**
   * Writes the scheduling state of one item.
   *
   * @throws {PersistenceError} if the item has never been stored
   */
  async save(entity: Item): Promise<void> {
    guard(`save item '${entity.id}'`, () => {
      this.db.orm.update(items).set(mapToRow(entity)).where(eq(items.id, entity.id)).run();

      if (this.db.sqlite.getRowsModified() === 0) {
        throw new PersistenceError(`Item '${entity.id}' does not exist in the database`);
      }
      persistDatabase(this.db);
    });
  }

  /**
   * Lists every deck with its item count and the number of items due at `asOf`.
   */
  async listDecks(asOf: Date = new Date()): Promise<DeckSummary[]> {
    return guard('list decks', () =>
      this.db.orm
        .select({
          deck: items.deck,
          itemCount: sql<number>`count(*)`.mapWith(Number),
          dueCount: sql<number>`sum(case when ${items.dueAt} <= ${asOf.getTime()} then 1 else 0 end)`.mapWith(Number),
        })
        .from(items)
        .groupBy(items.deck)
        .orderBy(items.deck)
        .all()
    );
  }
}
