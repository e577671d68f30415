import type { BaseLogger } from 'pino';
import type { InvocationOutcome, NewInvocation } from '../domain/index.js';
import { AuditWriteTimeoutError } from '../domain/index.js';
import type { InvocationStore } from '../infrastructure/db/index.js';
import { redactArguments } from './redact-arguments.js';

const DEFAULT_WRITE_TIMEOUT_MS = 2_000;
const UNKNOWN_ERROR = 'Unknown error';

export interface RecordInput {
  operation_name: string;
  arguments: Record<string, unknown>;
  outcome: InvocationOutcome;
  duration_ms: number;
  request_id?: string | null;
  session_id?: string | null;
  client_name?: string | null;
  client_version?: string | null;
}

export type RecordResult =
  | { status: 'recorded'; id: number }
  | { status: 'skipped' }
  | { status: 'failed'; error: Error };

export interface AuditRecorderOptions {
  /** Upper bound on how long `record` waits for the store. */
  writeTimeoutMs?: number;
  /** Operations that are never recorded. */
  excludedOperations?: Iterable<string>;
  now?: () => Date;
}

/** Rejects with AuditWriteTimeoutError if `promise` has not settled in `ms`. */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AuditWriteTimeoutError(ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Write path of the audit log.
 *
 * `record` never rejects: whatever goes wrong (store not initializable,
 * failed insert, unserializable arguments, slow disk) is logged and
 * returned as `{ status: 'failed' }`. The audited operation's own
 * result is never affected.
 */
export class AuditRecorder {
  private readonly writeTimeoutMs: number;
  private readonly excluded: ReadonlySet<string>;
  private readonly now: () => Date;

  constructor(
    private readonly store: InvocationStore,
    private readonly log: BaseLogger,
    options: AuditRecorderOptions = {},
  ) {
    this.writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
    this.excluded = new Set(options.excludedOperations ?? []);
    this.now = options.now ?? (() => new Date());
  }

  isExcluded(operationName: string): boolean {
    return this.excluded.has(operationName);
  }

  async record(input: RecordInput): Promise<RecordResult> {
    if (this.isExcluded(input.operation_name)) {
      return { status: 'skipped' };
    }

    try {
      const event = this.toNewInvocation(input);
      const id = await withTimeout(this.store.append(event), this.writeTimeoutMs);

      this.log.debug({ id, operation_name: input.operation_name }, 'Audit record written');
      return { status: 'recorded', id };
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error(
        { err: error, operation_name: input.operation_name },
        'Failed to write audit record',
      );
      return { status: 'failed', error };
    }
  }

  private toNewInvocation(input: RecordInput): NewInvocation {
    const base = {
      timestamp: this.now().toISOString(),
      request_id: input.request_id ?? null,
      session_id: input.session_id ?? null,
      client_name: input.client_name ?? null,
      client_version: input.client_version ?? null,
      operation_name: input.operation_name,
      arguments: JSON.stringify(redactArguments(input.arguments)),
      duration_ms: Number.isFinite(input.duration_ms) ? Math.max(input.duration_ms, 0) : 0,
    };

    if (input.outcome.status === 'error') {
      const message = input.outcome.message.trim();
      return { ...base, status: 'error', error_detail: message.length > 0 ? message : UNKNOWN_ERROR };
    }
    return { ...base, status: 'success', error_detail: null };
  }
}
