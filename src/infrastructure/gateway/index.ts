export { default as gatewayPlugin } from './gateway-plugin.js';
export type { GatewayPluginOptions } from './gateway-plugin.js';
