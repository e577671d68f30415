import { vi } from 'vitest';
import type { NewInvocation } from '../src/domain/index.js';
import type { InvocationStore } from '../src/infrastructure/db/index.js';

let counter = 0;

/**
 * Factory for invocation events with sensible defaults.
 * Pass `error` to build a failed invocation.
 */
export function makeInvocation(
  overrides: Partial<Omit<NewInvocation, 'status' | 'error_detail'>> & { error?: string } = {},
): NewInvocation {
  counter++;
  const { error, ...fields } = overrides;
  const base = {
    timestamp: fields.timestamp ?? new Date(Date.UTC(2026, 2, 1, 12, 0, counter % 60)).toISOString(),
    request_id: fields.request_id ?? `req-${counter}`,
    session_id: fields.session_id === undefined ? 'session-1' : fields.session_id,
    client_name: fields.client_name === undefined ? 'test-client' : fields.client_name,
    client_version: fields.client_version ?? null,
    operation_name: fields.operation_name ?? 'get_employee_skills',
    arguments: fields.arguments ?? '{"employee_id":"EMP000001"}',
    duration_ms: fields.duration_ms ?? 10,
  };

  if (error !== undefined) {
    return { ...base, status: 'error', error_detail: error };
  }
  return { ...base, status: 'success', error_detail: null };
}

/** In-process stand-in for the audit store. */
export function fakeStore(overrides: Partial<InvocationStore> = {}): InvocationStore {
  return {
    append: vi.fn().mockResolvedValue(1),
    scan: vi.fn().mockResolvedValue([]),
    aggregate: vi.fn().mockResolvedValue({}),
    close: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}
