import { buildApp } from './app.js';
import { loadSettings } from './infrastructure/config/index.js';

/**
 * Process entry: load settings, build the app, listen.
 * SIGINT / SIGTERM close Fastify, which drains pending audit writes
 * and closes the audit store.
 */
async function main(): Promise<void> {
  const settings = loadSettings();
  const fastify = await buildApp({ settings });

  let closing = false;
  const shutdown = (signal: string): void => {
    if (closing) return;
    closing = true;
    fastify.log.info({ signal }, 'Shutting down gateway...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: settings.host,
    port: settings.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
