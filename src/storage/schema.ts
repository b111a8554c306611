/**
 * Database Schema Definitions for Interval Drill
 *
 * Drizzle ORM table definitions for SQLite. The matching DDL that creates
 * the tables lives in `schema.sql` and is applied when a database is opened.
 *
 * All timestamps are stored as milliseconds since epoch (integer) so that a
 * save/load round trip reproduces every Date exactly.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Stored form of one review, with the timestamp as epoch milliseconds.
 */
export interface DbReviewRecord {
  reviewedAt: number;
  outcome: 'correct' | 'incorrect';
}

/**
 * Items Table
 *
 * One row per question/answer pair. Rows are never deleted by the
 * scheduler; insertion order (SQLite rowid) is the tie-breaker when two
 * items fall due at the same instant.
 */
export const items = sqliteTable(
  'items',
  {
    // Unique identifier, prefixed with 'item_'
    id: text('id').primaryKey(),

    // Deck the item was imported into
    deck: text('deck').notNull().default('default'),

    question: text('question').notNull(),

    answer: text('answer').notNull(),

    // Index into the interval table
    step: integer('step').notNull().default(0),

    // Earliest time the item may be reviewed again
    dueAt: integer('due_at', { mode: 'timestamp_ms' }).notNull(),

    // Time of the most recent review; null until the first review
    lastReviewedAt: integer('last_reviewed_at', { mode: 'timestamp_ms' }),

    // Every review, oldest first
    reviewHistory: text('review_history', { mode: 'json' })
      .$type<DbReviewRecord[]>()
      .notNull()
      .default([]),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    index('items_deck_idx').on(table.deck),
    index('items_due_at_idx').on(table.dueAt),
  ]
);

// Type exports for use in repositories
export type ItemRow = typeof items.$inferSelect;
export type NewItemRow = typeof items.$inferInsert;
