export type {
  InvocationStatus,
  InvocationOutcome,
  InvocationResult,
  NewInvocation,
  InvocationEvent,
  InvocationFilters,
  OperationStats,
  InvocationSummary,
} from './invocation.js';
export { ratio, roundMs } from './invocation.js';
export {
  AuditError,
  AuditInitError,
  AuditWriteError,
  AuditWriteTimeoutError,
  AuditReadError,
  QueryValidationError,
} from './errors.js';
export type { QueryIssue } from './errors.js';
