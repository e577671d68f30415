import { sqliteTable, integer, text, real, index } from 'drizzle-orm/sqlite-core';

/**
 * Drizzle schema for the `invocations` table.
 *
 * `id` uses AUTOINCREMENT so ids are never reused, even after the
 * highest row is removed by an external retention job.
 * `arguments` is opaque JSON text and is not indexed.
 */
export const invocations = sqliteTable('invocations', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  timestamp: text('timestamp').notNull(),
  request_id: text('request_id'),
  session_id: text('session_id'),
  client_name: text('client_name'),
  client_version: text('client_version'),
  operation_name: text('operation_name').notNull(),
  arguments: text('arguments').notNull().default('{}'),
  status: text('status', { enum: ['success', 'error'] }).notNull(),
  error_detail: text('error_detail'),
  duration_ms: real('duration_ms').notNull(),
}, (table) => [
  index('idx_invocations_timestamp').on(table.timestamp),
  index('idx_invocations_session_id').on(table.session_id),
  index('idx_invocations_operation_name').on(table.operation_name),
  index('idx_invocations_client_name').on(table.client_name),
]);

export type InvocationRow = typeof invocations.$inferSelect;
