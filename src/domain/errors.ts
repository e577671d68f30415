/**
 * Error taxonomy for the audit subsystem.
 *
 * Write-path errors are contained by the recorder. Read-path and
 * initialization errors reach the caller that asked for audit data.
 */
export abstract class AuditError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The store could not be opened or its schema could not be created. Retryable. */
export class AuditInitError extends AuditError {
  readonly code = 'AUDIT_INIT_FAILED';
}

/** An append failed after the store was initialized. */
export class AuditWriteError extends AuditError {
  readonly code = 'AUDIT_WRITE_FAILED';
}

/** An append did not settle within the recorder's write budget. */
export class AuditWriteTimeoutError extends AuditError {
  readonly code = 'AUDIT_WRITE_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`Audit write did not complete within ${timeoutMs}ms`);
  }
}

/** Storage failure during scan or aggregate. Retryable. */
export class AuditReadError extends AuditError {
  readonly code = 'AUDIT_READ_FAILED';
}

export interface QueryIssue {
  parameter: string;
  message: string;
}

/** Malformed filter input on the read path. Raised before the store is touched. */
export class QueryValidationError extends AuditError {
  readonly code = 'QUERY_VALIDATION_FAILED';

  constructor(readonly issues: QueryIssue[]) {
    super(
      `Invalid query parameters: ${issues.map((i) => `${i.parameter}: ${i.message}`).join('; ')}`,
    );
  }
}
