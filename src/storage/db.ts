/**
 * Database Connection Factory for Interval Drill
 *
 * Opens a SQLite database with sql.js (SQLite compiled to WebAssembly)
 * wrapped with Drizzle ORM, and makes sure the schema exists.
 *
 * sql.js keeps the whole database in memory. `createDatabase` loads the
 * file when it is opened, and `persistDatabase` writes it back after every
 * change: the image is written to a temporary file beside the database and
 * renamed over it, so the file on disk is always either the old or the new
 * collection.
 *
 * Usage:
 *   import { createDatabase, closeDatabase } from '@/storage/db';
 *
 *   const db = await createDatabase('/home/me/.config/interval-drill/interval-drill.db');
 *   // ...
 *   closeDatabase(db);
 *
 *   const testDb = await createDatabase(':memory:'); // in-memory for tests
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname } from 'node:path';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic } from 'sql.js';
import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js';
import * as schema from './schema';
import { applySchema } from './migrate';
import { PersistenceError } from '../core/errors';

/** Path that selects a private in-memory database. */
export const IN_MEMORY = ':memory:';

/**
 * An open database: the Drizzle ORM instance used for queries, the raw
 * sql.js connection, and the file it is saved to.
 */
export interface AppDatabase {
  readonly orm: SQLJsDatabase<typeof schema>;
  readonly sqlite: SqlJsDatabase;
  /** File path, or IN_MEMORY when nothing is written to disk */
  readonly path: string;
}

// =============================================================================
// sql.js Loader
// =============================================================================

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

/**
 * Initializes sql.js once per process. The WebAssembly binary is the one
 * shipped inside the sql.js package.
 */
function getSqlJs(): Promise<SqlJsStatic> {
  if (sqlJsPromise === null) {
    const wasmPath = createRequire(import.meta.url).resolve('sql.js/dist/sql-wasm.wasm');
    sqlJsPromise = initSqlJs({ locateFile: () => wasmPath }).catch((error: unknown) => {
      // Reset so the next call retries instead of returning a stale rejection
      sqlJsPromise = null;
      throw error;
    });
  }
  return sqlJsPromise;
}

// =============================================================================
// Connection Lifecycle
// =============================================================================

/**
 * Opens (creating if needed) the SQLite database at `dbPath`.
 *
 * This factory function:
 * 1. Creates the parent directory of a file database
 * 2. Loads the file into memory, or starts an empty database
 * 3. Applies the schema
 * 4. Wraps the connection with Drizzle ORM for type-safe queries
 *
 * A new file is only written once something is stored.
 *
 * @param dbPath - Path to the database file, or ':memory:'
 * @throws {PersistenceError} if the database cannot be opened or initialized
 */
export async function createDatabase(dbPath: string = IN_MEMORY): Promise<AppDatabase> {
  try {
    const SQL = await getSqlJs();

    let sqlite: SqlJsDatabase;
    if (dbPath === IN_MEMORY) {
      sqlite = new SQL.Database();
    } else {
      mkdirSync(dirname(dbPath), { recursive: true });
      sqlite = existsSync(dbPath) ? new SQL.Database(readFileSync(dbPath)) : new SQL.Database();
    }

    try {
      applySchema(sqlite);
    } catch (error) {
      sqlite.close();
      throw error;
    }

    return { orm: drizzle(sqlite, { schema }), sqlite, path: dbPath };
  } catch (error) {
    throw new PersistenceError(`Cannot open database at '${dbPath}'`, { cause: error });
  }
}

/**
 * Writes the in-memory database to its file, replacing the previous
 * contents atomically. Does nothing for an in-memory database.
 *
 * @throws {PersistenceError} if the file cannot be written
 */
export function persistDatabase(db: AppDatabase): void {
  if (db.path === IN_MEMORY) {
    return;
  }

  const tempPath = `${db.path}.${process.pid}.tmp`;
  try {
    writeFileSync(tempPath, db.sqlite.export());
    renameSync(tempPath, db.path);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw new PersistenceError(`Cannot save database to '${db.path}'`, { cause: error });
  }
}

/**
 * Closes the underlying SQLite connection. Unsaved changes are discarded.
 */
export function closeDatabase(db: AppDatabase): void {
  db.sqlite.close();
}
