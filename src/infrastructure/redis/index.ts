export { RedisStreamSink, toRedisOptions, isPermanentReply, unsupportedSinkKeys } from './stream-sink.js';
export type { RedisFactory } from './stream-sink.js';
