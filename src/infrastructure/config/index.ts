export { loadSettings, ConfigError } from './settings.js';
export type { Settings, LogLevel } from './settings.js';
