import type SQLite from 'better-sqlite3';

/**
 * Creates the `invocations` table and its indexes if they are absent.
 *
 * Lightweight runtime migration: the store may be deleted between runs
 * and is recreated here on the next initialization. Mirrors schema.ts,
 * plus a CHECK that ties `error_detail` to `status`.
 */
export function ensureSchema(sqlite: SQLite.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS invocations (
      id              INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp       TEXT    NOT NULL,
      request_id      TEXT,
      session_id      TEXT,
      client_name     TEXT,
      client_version  TEXT,
      operation_name  TEXT    NOT NULL CHECK (length(operation_name) > 0),
      arguments       TEXT    NOT NULL DEFAULT '{}',
      status          TEXT    NOT NULL CHECK (status IN ('success', 'error')),
      error_detail    TEXT,
      duration_ms     REAL    NOT NULL CHECK (duration_ms >= 0),
      CHECK (
        (status = 'success' AND error_detail IS NULL)
        OR (status = 'error' AND length(error_detail) > 0)
      )
    );
    CREATE INDEX IF NOT EXISTS idx_invocations_timestamp      ON invocations (timestamp);
    CREATE INDEX IF NOT EXISTS idx_invocations_session_id     ON invocations (session_id);
    CREATE INDEX IF NOT EXISTS idx_invocations_operation_name ON invocations (operation_name);
    CREATE INDEX IF NOT EXISTS idx_invocations_client_name    ON invocations (client_name);
  `);
}
