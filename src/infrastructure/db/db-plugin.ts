import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { SynchronousMode } from './client.js';
import { openSqliteInvocationStore } from './invocation-store.js';
import { LazyInvocationStore } from './lazy-invocation-store.js';
import type { StoreOpener } from './lazy-invocation-store.js';

export interface DbPluginOptions {
  path: string;
  synchronous?: SynchronousMode;
  /** Replaces the SQLite opener, e.g. to inject a failing store. */
  open?: StoreOpener;
}

/**
 * Fastify plugin that owns the audit store.
 *
 * Decorates `fastify.auditStore` with a lazy store: nothing touches the
 * disk until the first write or read. Closes the store on shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const open: StoreOpener = opts.open ?? (async () => {
    const store = await openSqliteInvocationStore({
      path: opts.path,
      synchronous: opts.synchronous,
    });
    fastify.log.info({ path: opts.path }, 'Audit store ready');
    return store;
  });

  const auditStore = new LazyInvocationStore(open);

  fastify.decorate('auditStore', auditStore);

  fastify.addHook('onClose', async () => {
    await auditStore.close();
    fastify.log.info('Audit store closed');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.auditStore` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    auditStore: LazyInvocationStore;
  }
}
