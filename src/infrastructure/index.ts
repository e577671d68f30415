export {
  dbPlugin,
  invocations,
  createDbClient,
  ensureSchema,
  openSqliteInvocationStore,
  SqliteInvocationStore,
  LazyInvocationStore,
  MAX_SCAN_LIMIT,
} from './db/index.js';
export type {
  Database,
  DbPluginOptions,
  InvocationStore,
  StoreOpener,
  SqliteStoreOptions,
  SynchronousMode,
} from './db/index.js';
export { gatewayPlugin } from './gateway/index.js';
export type { GatewayPluginOptions } from './gateway/index.js';
export { createUpstreamClient, UpstreamError } from './upstream/index.js';
export type { UpstreamClient, QueryParams } from './upstream/index.js';
