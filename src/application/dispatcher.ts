import type { BaseLogger } from 'pino';
import type { InvocationOutcome } from '../domain/index.js';
import type { AuditRecorder, RecordResult } from './audit-recorder.js';
import { UnknownOperationError } from './operation.js';
import type { OperationDefinition, OperationDescriptor } from './operation.js';

/** Who is calling, as reported by the transport. */
export interface CallerContext {
  request_id?: string | null;
  session_id?: string | null;
  client_name?: string | null;
  client_version?: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Routes an operation name to its definition and audits the call.
 *
 * The audit write is started after the operation settles and is not
 * awaited: the caller gets the operation's own result (or error) as
 * soon as it is available. `drain()` waits for writes still in flight.
 */
export class OperationDispatcher {
  private readonly operations = new Map<string, OperationDefinition>();
  private readonly pending = new Set<Promise<RecordResult>>();

  constructor(
    private readonly recorder: AuditRecorder,
    private readonly log: BaseLogger,
    operations: Iterable<OperationDefinition>,
  ) {
    for (const operation of operations) {
      if (this.operations.has(operation.name)) {
        throw new Error(`Duplicate operation name: ${operation.name}`);
      }
      this.operations.set(operation.name, operation);
    }
  }

  list(): OperationDescriptor[] {
    return [...this.operations.values()].map((op) => ({
      name: op.name,
      description: op.description,
      audited: op.audited,
    }));
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  async invoke(name: string, args: unknown, caller: CallerContext = {}): Promise<unknown> {
    const operation = this.operations.get(name);
    if (operation === undefined) {
      throw new UnknownOperationError(name);
    }

    const startedAt = performance.now();

    try {
      const result = await operation.run(args);
      this.audit(operation, args, caller, { status: 'success' }, startedAt);
      return result;
    } catch (err: unknown) {
      this.log.debug({ err, operation_name: name }, 'Operation failed');
      this.audit(operation, args, caller, { status: 'error', message: errorMessage(err) }, startedAt);
      throw err;
    }
  }

  /** Resolves once every audit write started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get pendingWrites(): number {
    return this.pending.size;
  }

  private audit(
    operation: OperationDefinition,
    args: unknown,
    caller: CallerContext,
    outcome: InvocationOutcome,
    startedAt: number,
  ): void {
    if (!operation.audited) return;

    // record() never rejects; failures are logged inside the recorder.
    const write = this.recorder.record({
      operation_name: operation.name,
      arguments: isRecord(args) ? args : {},
      outcome,
      duration_ms: performance.now() - startedAt,
      request_id: caller.request_id,
      session_id: caller.session_id,
      client_name: caller.client_name,
      client_version: caller.client_version,
    });

    this.pending.add(write);
    void write.finally(() => this.pending.delete(write));
  }
}
