export { AuditRecorder } from './audit-recorder.js';
export type { AuditRecorderOptions, RecordInput, RecordResult } from './audit-recorder.js';
export { redactArguments, REDACTED } from './redact-arguments.js';
export {
  listRecentInvocations,
  searchInvocations,
  summarizeInvocations,
  parseRecentQuery,
  parseSearchQuery,
  DEFAULT_RECENT_LIMIT,
  DEFAULT_SEARCH_LIMIT,
} from './query-invocations.js';
export type { InvocationPage, ParsedSearch } from './query-invocations.js';
export { recentQuerySchema, searchQuerySchema } from './invocation-query-schema.js';
export {
  defineOperation,
  UnknownOperationError,
  OperationInputError,
} from './operation.js';
export type { OperationDefinition, OperationDescriptor } from './operation.js';
export { createTalentOperations } from './talent-operations.js';
export { createAuditOperations } from './audit-operations.js';
export { OperationDispatcher } from './dispatcher.js';
export type { CallerContext } from './dispatcher.js';
