export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH } from './config/index.js';
export type { RelayConfig } from './config/index.js';
export { Dispatcher } from './dispatcher/index.js';
export type { DispatcherOptions, BackoffOptions, Sink, DispatcherStats } from './dispatcher/index.js';
export { RedisStreamSink, toRedisOptions, isPermanentReply, unsupportedSinkKeys } from './redis/index.js';
export type { RedisFactory } from './redis/index.js';
export { StatsdClient, createMetrics, formatMetric, METRIC_PREFIX } from './metrics/index.js';
export { SyslogListener, LineSplitter } from './listener/index.js';
export type { SyslogListenerOptions, ListenerTls, ListenerStats } from './listener/index.js';
