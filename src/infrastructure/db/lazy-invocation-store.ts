import type {
  InvocationEvent,
  InvocationFilters,
  InvocationSummary,
  NewInvocation,
} from '../../domain/index.js';
import { AuditInitError } from '../../domain/index.js';
import type { InvocationStore } from './invocation-store.js';

export type StoreOpener = () => Promise<InvocationStore>;

/**
 * Invocation store that opens its backing store on first use.
 *
 * There is no startup hook: the first caller may be a write, a scan or
 * an aggregate. All of them go through `ensureReady()`, which shares a
 * single in-flight open among concurrent callers. A failed attempt is
 * forgotten so the next call retries from scratch.
 *
 * `close()` is terminal: later calls reject with AuditInitError instead
 * of opening a handle nobody will close. `reset()` releases the handle
 * and allows a reopen.
 */
export class LazyInvocationStore implements InvocationStore {
  private ready: Promise<InvocationStore> | null = null;
  private closed = false;

  constructor(private readonly open: StoreOpener) {}

  ensureReady(): Promise<InvocationStore> {
    if (this.closed) {
      return Promise.reject(new AuditInitError('Audit store closed'));
    }
    if (this.ready === null) {
      const attempt = Promise.resolve().then(this.open).catch((err: unknown) => {
        if (this.ready === attempt) {
          this.ready = null;
        }
        throw err instanceof AuditInitError
          ? err
          : new AuditInitError('Failed to initialize audit store', { cause: err });
      });
      this.ready = attempt;
    }
    return this.ready;
  }

  /** True once an open attempt has been started and not discarded. */
  get initialized(): boolean {
    return this.ready !== null;
  }

  async append(event: NewInvocation): Promise<number> {
    const store = await this.ensureReady();
    return store.append(event);
  }

  async scan(filters: InvocationFilters, limit?: number): Promise<InvocationEvent[]> {
    const store = await this.ensureReady();
    return store.scan(filters, limit);
  }

  async aggregate(): Promise<InvocationSummary> {
    const store = await this.ensureReady();
    return store.aggregate();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Closes the backing store if one was opened. No call reopens it afterwards. */
  async close(): Promise<void> {
    this.closed = true;
    await this.release();
  }

  /** Closes the backing store if one was opened. The next call reopens it. */
  async reset(): Promise<void> {
    await this.release();
  }

  /** An open attempt that failed is not an error here. */
  private async release(): Promise<void> {
    const pending = this.ready;
    if (pending === null) return;
    this.ready = null;

    const store = await pending.catch(() => null);
    if (store !== null) {
      await store.close();
    }
  }
}
