import type { z } from 'zod';
import type { InvocationEvent, InvocationFilters, InvocationSummary } from '../domain/index.js';
import { QueryValidationError } from '../domain/index.js';
import type { InvocationStore } from '../infrastructure/db/index.js';
import {
  recentQuerySchema,
  searchQuerySchema,
  toQueryIssues,
} from './invocation-query-schema.js';

export const DEFAULT_RECENT_LIMIT = 50;
export const DEFAULT_SEARCH_LIMIT = 100;

export interface InvocationPage {
  data: InvocationEvent[];
  pagination: { limit: number; count: number };
}

export interface ParsedSearch {
  filters: InvocationFilters;
  limit: number;
}

function validate<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new QueryValidationError(toQueryIssues(parsed.error));
  }
  return parsed.data;
}

/** Validates "recent events" input. Throws QueryValidationError. */
export function parseRecentQuery(raw: unknown): number {
  return validate(recentQuerySchema, raw).limit ?? DEFAULT_RECENT_LIMIT;
}

/**
 * Validates "filtered query" input. Throws QueryValidationError.
 * Only supplied predicates end up in `filters`.
 */
export function parseSearchQuery(raw: unknown): ParsedSearch {
  const q = validate(searchQuerySchema, raw);

  const filters: InvocationFilters = {};
  if (q.operation_name !== undefined) filters.operation_name = q.operation_name;
  if (q.session_id !== undefined) filters.session_id = q.session_id;
  if (q.client_name !== undefined) filters.client_name = q.client_name;
  if (q.since !== undefined) filters.since = q.since;
  if (q.until !== undefined) filters.until = q.until;
  if (q.errors_only === true) filters.errors_only = true;

  return { filters, limit: q.limit ?? DEFAULT_SEARCH_LIMIT };
}

/**
 * Use case: the N most recent invocations (highest ids first).
 * Defaults to 50, capped at the store's maximum.
 */
export async function listRecentInvocations(
  store: InvocationStore,
  raw: unknown = {},
): Promise<InvocationPage> {
  const limit = parseRecentQuery(raw);
  const data = await store.scan({}, limit);

  return { data, pagination: { limit, count: data.length } };
}

/**
 * Use case: filtered invocation list, newest first.
 * Input is validated before the store is touched.
 */
export async function searchInvocations(
  store: InvocationStore,
  raw: unknown = {},
): Promise<InvocationPage> {
  const { filters, limit } = parseSearchQuery(raw);
  const data = await store.scan(filters, limit);

  return { data, pagination: { limit, count: data.length } };
}

/** Use case: totals, error rate and per-operation latency. */
export async function summarizeInvocations(store: InvocationStore): Promise<InvocationSummary> {
  return store.aggregate();
}
