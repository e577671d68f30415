import SQLite from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type SynchronousMode = 'FULL' | 'NORMAL';

export interface DbClientOptions {
  synchronous?: SynchronousMode;
  busyTimeoutMs?: number;
}

/**
 * Opens a better-sqlite3 connection and wraps it in a Drizzle client.
 *
 * Returns both the raw `sqlite` handle (for pragmas, DDL and lifecycle)
 * and the typed `db` instance (for queries).
 *
 * WAL lets readers proceed while a write is in flight and never exposes
 * uncommitted rows. In-memory databases ignore the journal mode.
 */
export function createDbClient(path: string, options: DbClientOptions = {}) {
  const sqlite = new SQLite(path);

  try {
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma(`synchronous = ${options.synchronous ?? 'FULL'}`);
    sqlite.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  } catch (err) {
    sqlite.close();
    throw err;
  }

  const db = drizzle(sqlite, { schema });

  return { sqlite, db };
}

export type Database = BetterSQLite3Database<typeof schema>;
