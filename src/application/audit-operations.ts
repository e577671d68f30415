import { z } from 'zod';
import type { InvocationStore } from '../infrastructure/db/index.js';
import { defineOperation } from './operation.js';
import type { OperationDefinition } from './operation.js';
import {
  listRecentInvocations,
  searchInvocations,
  summarizeInvocations,
} from './query-invocations.js';

/** Arguments are validated by the query engine, not here. */
const passThrough = z.record(z.string(), z.unknown());

/**
 * Introspective operations over the audit log itself.
 * Never audited, so reading the log does not add to it.
 */
export function createAuditOperations(store: InvocationStore): OperationDefinition[] {
  return [
    defineOperation({
      name: 'audit_recent_invocations',
      description: 'Most recent recorded invocations, newest first.',
      params: passThrough,
      audited: false,
      handler: (a) => listRecentInvocations(store, a),
    }),
    defineOperation({
      name: 'audit_search_invocations',
      description: 'Recorded invocations filtered by operation, session, client, time range or errors.',
      params: passThrough,
      audited: false,
      handler: (a) => searchInvocations(store, a),
    }),
    defineOperation({
      name: 'audit_summary',
      description: 'Invocation totals, error rate and per-operation latency.',
      params: z.object({}),
      audited: false,
      handler: () => summarizeInvocations(store),
    }),
  ];
}
