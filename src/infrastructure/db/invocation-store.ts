import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type SQLite from 'better-sqlite3';
import { eq, and, gte, lte, desc, asc, count, countDistinct, min, max, sql, type SQL } from 'drizzle-orm';
import type {
  InvocationEvent,
  InvocationFilters,
  InvocationSummary,
  NewInvocation,
  OperationStats,
} from '../../domain/index.js';
import { AuditReadError, AuditWriteError, ratio, roundMs } from '../../domain/index.js';
import { createDbClient } from './client.js';
import type { Database, SynchronousMode } from './client.js';
import { ensureSchema } from './migrate.js';
import { invocations } from './schema.js';
import type { InvocationRow } from './schema.js';

/** Upper bound on rows returned by a single scan. */
export const MAX_SCAN_LIMIT = 1000;

/**
 * Append-only invocation log.
 *
 * `append` is the only mutation. `scan` returns newest first by `id`.
 */
export interface InvocationStore {
  append(event: NewInvocation): Promise<number>;
  scan(filters: InvocationFilters, limit?: number): Promise<InvocationEvent[]>;
  aggregate(): Promise<InvocationSummary>;
  close(): Promise<void>;
}

export interface SqliteStoreOptions {
  path: string;
  synchronous?: SynchronousMode;
  busyTimeoutMs?: number;
}

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return MAX_SCAN_LIMIT;
  return Math.min(Math.max(Math.floor(limit), 1), MAX_SCAN_LIMIT);
}

function errorCount(): SQL<number> {
  return sql<number>`coalesce(sum(case when ${invocations.status} = 'error' then 1 else 0 end), 0)`.mapWith(Number);
}

function toInvocationEvent(row: InvocationRow): InvocationEvent {
  const base = {
    id: row.id,
    timestamp: row.timestamp,
    request_id: row.request_id,
    session_id: row.session_id,
    client_name: row.client_name,
    client_version: row.client_version,
    operation_name: row.operation_name,
    arguments: row.arguments,
    duration_ms: row.duration_ms,
  };

  if (row.status === 'error') {
    return { ...base, status: 'error', error_detail: row.error_detail ?? 'Unknown error' };
  }
  return { ...base, status: 'success', error_detail: null };
}

/**
 * SQLite-backed invocation store.
 *
 * better-sqlite3 runs statements synchronously on one connection, so
 * appends from concurrent callers are serialized and each receives the
 * next AUTOINCREMENT id. Every statement is its own transaction.
 */
export class SqliteInvocationStore implements InvocationStore {
  constructor(
    private readonly sqlite: SQLite.Database,
    private readonly db: Database,
  ) {}

  async append(event: NewInvocation): Promise<number> {
    try {
      const result = this.db
        .insert(invocations)
        .values({
          timestamp: event.timestamp,
          request_id: event.request_id,
          session_id: event.session_id,
          client_name: event.client_name,
          client_version: event.client_version,
          operation_name: event.operation_name,
          arguments: event.arguments,
          status: event.status,
          error_detail: event.error_detail,
          duration_ms: event.duration_ms,
        })
        .run();

      return Number(result.lastInsertRowid);
    } catch (err: unknown) {
      throw new AuditWriteError(
        `Failed to append invocation of ${event.operation_name}`,
        { cause: err },
      );
    }
  }

  async scan(filters: InvocationFilters, limit?: number): Promise<InvocationEvent[]> {
    const conditions: SQL[] = [];

    if (filters.operation_name !== undefined) {
      conditions.push(eq(invocations.operation_name, filters.operation_name));
    }
    if (filters.session_id !== undefined) {
      conditions.push(eq(invocations.session_id, filters.session_id));
    }
    if (filters.client_name !== undefined) {
      conditions.push(eq(invocations.client_name, filters.client_name));
    }
    if (filters.since !== undefined) {
      conditions.push(gte(invocations.timestamp, filters.since));
    }
    if (filters.until !== undefined) {
      conditions.push(lte(invocations.timestamp, filters.until));
    }
    if (filters.errors_only === true) {
      conditions.push(eq(invocations.status, 'error'));
    }

    const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

    try {
      const rows = this.db
        .select()
        .from(invocations)
        .where(whereClause)
        .orderBy(desc(invocations.id))
        .limit(clampLimit(limit))
        .all();

      return rows.map(toInvocationEvent);
    } catch (err: unknown) {
      throw new AuditReadError('Failed to scan invocations', { cause: err });
    }
  }

  /**
   * Totals and per-operation breakdown, read inside one transaction so
   * both views come from the same snapshot.
   */
  async aggregate(): Promise<InvocationSummary> {
    try {
      return this.db.transaction((tx) => {
        const overall = tx
          .select({
            total: count(),
            error_count: errorCount(),
            avg_duration_ms: sql<number>`coalesce(avg(${invocations.duration_ms}), 0)`.mapWith(Number),
            max_duration_ms: sql<number>`coalesce(max(${invocations.duration_ms}), 0)`.mapWith(Number),
            unique_operations: countDistinct(invocations.operation_name),
            unique_sessions: countDistinct(invocations.session_id),
            unique_clients: countDistinct(invocations.client_name),
            first_invocation_at: min(invocations.timestamp),
            last_invocation_at: max(invocations.timestamp),
          })
          .from(invocations)
          .get();

        const rows = tx
          .select({
            operation_name: invocations.operation_name,
            count: count(),
            error_count: errorCount(),
            avg_duration_ms: sql<number>`avg(${invocations.duration_ms})`.mapWith(Number),
            max_duration_ms: sql<number>`max(${invocations.duration_ms})`.mapWith(Number),
          })
          .from(invocations)
          .groupBy(invocations.operation_name)
          .orderBy(desc(count()), asc(invocations.operation_name))
          .all();

        const perOperation: OperationStats[] = rows.map((r) => ({
          operation_name: r.operation_name,
          count: r.count,
          error_count: r.error_count,
          error_rate: ratio(r.error_count, r.count),
          avg_duration_ms: roundMs(r.avg_duration_ms),
          max_duration_ms: roundMs(r.max_duration_ms),
        }));

        const total = overall?.total ?? 0;
        const errors = overall?.error_count ?? 0;

        return {
          total,
          error_count: errors,
          error_rate: ratio(errors, total),
          avg_duration_ms: roundMs(overall?.avg_duration_ms ?? 0),
          max_duration_ms: roundMs(overall?.max_duration_ms ?? 0),
          unique_operations: overall?.unique_operations ?? 0,
          unique_sessions: overall?.unique_sessions ?? 0,
          unique_clients: overall?.unique_clients ?? 0,
          first_invocation_at: overall?.first_invocation_at ?? null,
          last_invocation_at: overall?.last_invocation_at ?? null,
          per_operation: perOperation,
        };
      });
    } catch (err: unknown) {
      throw new AuditReadError('Failed to aggregate invocations', { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }
}

/**
 * Opens (creating if needed) the SQLite file and ensures the schema.
 *
 * The parent directory is created first so a fresh or reset data
 * directory does not fail the first write.
 */
export async function openSqliteInvocationStore(
  options: SqliteStoreOptions,
): Promise<SqliteInvocationStore> {
  if (options.path !== ':memory:') {
    await mkdir(dirname(resolve(options.path)), { recursive: true });
  }

  const { sqlite, db } = createDbClient(options.path, {
    synchronous: options.synchronous,
    busyTimeoutMs: options.busyTimeoutMs,
  });

  try {
    ensureSchema(sqlite);
  } catch (err: unknown) {
    sqlite.close();
    throw err;
  }

  return new SqliteInvocationStore(sqlite, db);
}
