/**
 * Storage Module - Barrel Export
 *
 * This file serves as the public API for the storage module.
 * It re-exports the schema, types, and database utilities.
 *
 * Usage:
 *   import { createDatabase, ItemRepository } from '@/storage';
 *   const repo = new ItemRepository(await createDatabase(path));
 */

// Database connection factory
export { createDatabase, persistDatabase, closeDatabase, IN_MEMORY } from './db';
export type { AppDatabase } from './db';

// Table definitions and inferred row types
export { items } from './schema';
export type { ItemRow, NewItemRow, DbReviewRecord } from './schema';

export { ItemRepository } from './repositories';
export type { FindItemsOptions, DeckSummary, Repository } from './repositories';
