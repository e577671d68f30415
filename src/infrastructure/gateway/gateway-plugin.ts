import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import {
  AuditRecorder,
  OperationDispatcher,
  createAuditOperations,
  createTalentOperations,
} from '../../application/index.js';
import type { UpstreamClient } from '../upstream/index.js';

export interface GatewayPluginOptions {
  upstream: UpstreamClient;
  writeTimeoutMs?: number;
  excludedOperations?: string[];
}

/**
 * Fastify plugin that wires the recorder and dispatcher onto the audit store.
 *
 * Decorates `fastify.dispatcher`. Pending audit writes are drained in
 * `preClose`, before the store plugin closes the database.
 */
async function gatewayPlugin(fastify: FastifyInstance, opts: GatewayPluginOptions): Promise<void> {
  const recorder = new AuditRecorder(fastify.auditStore, fastify.log, {
    writeTimeoutMs: opts.writeTimeoutMs,
    excludedOperations: opts.excludedOperations,
  });

  const dispatcher = new OperationDispatcher(recorder, fastify.log, [
    ...createTalentOperations(opts.upstream),
    ...createAuditOperations(fastify.auditStore),
  ]);

  fastify.decorate('dispatcher', dispatcher);

  fastify.addHook('preClose', async () => {
    if (dispatcher.pendingWrites > 0) {
      fastify.log.info({ pending: dispatcher.pendingWrites }, 'Draining audit writes');
    }
    await dispatcher.drain();
  });

  fastify.log.info(
    { operations: dispatcher.list().length, excluded: opts.excludedOperations ?? [] },
    'Gateway ready',
  );
}

export default fp(gatewayPlugin, {
  name: 'gateway',
  dependencies: ['db'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    dispatcher: OperationDispatcher;
  }
}
