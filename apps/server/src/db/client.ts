/**
 * Database client for the embedded SQLite store
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import * as schema from './schema.js';

export const DB_FILENAME = 'spherebridge.db';

export type GatewayDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: GatewayDatabase;
  sqlite: DatabaseType;
  close: () => void;
}

/**
 * Open (or create) the store.
 *
 * @param location - Data directory, or ':memory:' for an ephemeral database
 */
export function openDatabase(location: string): DatabaseHandle {
  let filename = location;
  if (location !== ':memory:') {
    mkdirSync(location, { recursive: true });
    filename = join(location, DB_FILENAME);
  }

  const sqlite = new Database(filename);
  sqlite.pragma('journal_mode = WAL');
  // FULL fsyncs on every commit so an acknowledged put survives power loss
  sqlite.pragma('synchronous = FULL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.exec(schema.CREATE_TABLES_SQL);

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
