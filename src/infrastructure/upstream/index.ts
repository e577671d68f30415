export { createUpstreamClient, buildUrl, UpstreamError } from './upstream-client.js';
export type { UpstreamClient, UpstreamClientOptions, QueryParams } from './upstream-client.js';
