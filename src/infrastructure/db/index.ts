export { invocations } from './schema.js';
export type { InvocationRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SynchronousMode } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  MAX_SCAN_LIMIT,
  SqliteInvocationStore,
  openSqliteInvocationStore,
} from './invocation-store.js';
export type { InvocationStore, SqliteStoreOptions } from './invocation-store.js';
export { LazyInvocationStore } from './lazy-invocation-store.js';
export type { StoreOpener } from './lazy-invocation-store.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
