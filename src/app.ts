import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { dbPlugin, gatewayPlugin, createUpstreamClient } from './infrastructure/index.js';
import type { StoreOpener, UpstreamClient } from './infrastructure/index.js';
import type { Settings } from './infrastructure/config/index.js';
import { auditRoutes, operationRoutes } from './interfaces/http/index.js';

export interface BuildAppOptions {
  settings: Settings;
  /** Overrides the HTTP upstream, e.g. with an in-process stub. */
  upstream?: UpstreamClient;
  /** Overrides the SQLite store opener. */
  openStore?: StoreOpener;
}

/**
 * Builds the Fastify app without listening.
 *
 * Order:
 * 1) Audit store (lazy: nothing is opened yet)
 * 2) Recorder + dispatcher
 * 3) HTTP routes
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { settings } = options;

  const fastify = Fastify({
    logger: {
      level: settings.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, {
    path: settings.audit.dbPath,
    synchronous: settings.audit.synchronous,
    open: options.openStore,
  });

  await fastify.register(gatewayPlugin, {
    upstream: options.upstream ?? createUpstreamClient(settings.upstream),
    writeTimeoutMs: settings.audit.writeTimeoutMs,
    excludedOperations: settings.audit.excludedOperations,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  fastify.get('/health', async () => ({ status: 'ok' }));

  await fastify.register(operationRoutes);
  await fastify.register(auditRoutes);

  return fastify;
}
