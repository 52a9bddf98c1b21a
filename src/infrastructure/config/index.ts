export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH } from './load-config.js';
export type { RelayConfig } from './load-config.js';
