/**
 * Core domain types for the invocation audit log.
 *
 * An invocation event is one immutable record of a single operation call
 * and its terminal outcome. These types carry no framework dependencies.
 */

export type InvocationStatus = 'success' | 'error';

/** Terminal outcome observed by the dispatcher. */
export type InvocationOutcome =
  | { readonly status: 'success' }
  | { readonly status: 'error'; readonly message: string };

/** `error_detail` is present exactly when the invocation failed. */
export type InvocationResult =
  | { readonly status: 'success'; readonly error_detail: null }
  | { readonly status: 'error'; readonly error_detail: string };

interface InvocationFields {
  readonly timestamp: string; // ISO-8601, UTC
  readonly request_id: string | null;
  readonly session_id: string | null;
  readonly client_name: string | null;
  readonly client_version: string | null;
  readonly operation_name: string;
  /** JSON-serialized argument mapping. Opaque to the store. */
  readonly arguments: string;
  readonly duration_ms: number;
}

/** An event about to be appended; `id` is assigned by the store. */
export type NewInvocation = InvocationFields & InvocationResult;

/**
 * Canonical persisted event.
 *
 * `id` is strictly increasing in insertion order and is the total order
 * used for "most recent N" queries. `timestamp` may not be monotonic.
 */
export type InvocationEvent = { readonly id: number } & NewInvocation;

/** Scan predicates. All present predicates combine with AND. */
export interface InvocationFilters {
  operation_name?: string;
  session_id?: string;
  client_name?: string;
  since?: string; // ISO-8601, inclusive
  until?: string; // ISO-8601, inclusive
  errors_only?: boolean;
}

export interface OperationStats {
  operation_name: string;
  count: number;
  error_count: number;
  error_rate: number;
  avg_duration_ms: number;
  max_duration_ms: number;
}

export interface InvocationSummary {
  total: number;
  error_count: number;
  error_rate: number;
  avg_duration_ms: number;
  max_duration_ms: number;
  unique_operations: number;
  unique_sessions: number;
  unique_clients: number;
  first_invocation_at: string | null;
  last_invocation_at: string | null;
  per_operation: OperationStats[];
}

/** Ratio rounded to 4 decimals; 0 when the denominator is 0. */
export function ratio(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return parseFloat((numerator / denominator).toFixed(4));
}

/** Milliseconds rounded to one decimal. */
export function roundMs(value: number): number {
  return Math.round(value * 10) / 10;
}
