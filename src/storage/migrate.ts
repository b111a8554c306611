/**
 * Schema Bootstrap for Interval Drill
 *
 * Applies `schema.sql` to an open SQLite connection. Every statement uses
 * IF NOT EXISTS, so this runs on each connection and only creates what is
 * missing.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Database } from 'sql.js';

const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

let cachedSchemaSql: string | null = null;

function loadSchemaSql(): string {
  if (cachedSchemaSql === null) {
    cachedSchemaSql = readFileSync(SCHEMA_PATH, 'utf8');
  }
  return cachedSchemaSql;
}

/**
 * Creates any missing tables and indexes.
 *
 * @param sqlite - Raw sql.js connection
 */
export function applySchema(sqlite: Database): void {
  sqlite.exec(loadSchemaSql());
}

/**
 * Lists user tables, excluding SQLite internals. Used to verify the bootstrap.
 */
export function listTables(sqlite: Database): string[] {
  const [result] = sqlite.exec(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
  );
  return result ? result.values.map(([name]) => String(name)) : [];
}
