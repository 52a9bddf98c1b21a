import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { Logger } from 'pino';
import type { DispatchEnvelope } from '../../domain/index.js';
import { sinkConfSchema } from '../../application/index.js';
import type { SinkConf } from '../../application/index.js';
import type { Sink } from '../dispatcher/index.js';

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_PORT = 6379;

// Error replies that clear up on their own (server loading, failover, memory)
const TRANSIENT_REPLIES = ['LOADING', 'BUSY', 'TRYAGAIN', 'CLUSTERDOWN', 'MASTERDOWN', 'READONLY', 'NOREPLICAS', 'OOM'];

/**
 * Whether `err` is a Redis error reply that retrying the same command can
 * never fix, such as `WRONGTYPE` on a key that is not a stream. Connection
 * failures and transient replies are not permanent.
 */
export function isPermanentReply(err: unknown): boolean {
  if (!(err instanceof Error) || err.name !== 'ReplyError') return false;
  const code = err.message.split(' ', 1)[0] ?? '';
  return !TRANSIENT_REPLIES.includes(code);
}

/**
 * Translates the configured sink settings into ioredis options.
 *
 * `bootstrap.servers` (a `host:port` list) is honoured for its first
 * entry; explicit `host` / `port` win over it. ioredis' own reconnect
 * and offline queue are disabled: the dispatcher owns reconnection, so
 * a broken session must fail fast rather than buffer silently.
 */
export function toRedisOptions(conf: SinkConf): RedisOptions {
  const [bootstrapHost, bootstrapPort] = parseBootstrap(conf['bootstrap.servers']);

  return {
    host: conf.host ?? bootstrapHost ?? DEFAULT_HOST,
    port: conf.port ?? bootstrapPort ?? DEFAULT_PORT,
    username: conf.username,
    password: conf.password,
    db: conf.db,
    connectTimeout: conf.connectTimeout,
    tls: conf.tls ? {} : undefined,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    retryStrategy: () => null,
  };
}

/** Keys of `conf` the Redis client has no use for. */
export function unsupportedSinkKeys(conf: SinkConf): string[] {
  const known = new Set(Object.keys(sinkConfSchema.shape));
  return Object.keys(conf).filter((key) => !known.has(key));
}

function parseBootstrap(servers: string | undefined): [string | undefined, number | undefined] {
  const first = servers?.split(',')[0]?.trim();
  if (!first) return [undefined, undefined];

  const colon = first.lastIndexOf(':');
  if (colon === -1) return [first, undefined];

  const port = Number(first.slice(colon + 1));
  return [first.slice(0, colon), Number.isInteger(port) ? port : undefined];
}

/** Factory seam so tests can hand in a stand-in client. */
export type RedisFactory = (options: RedisOptions) => Redis;

/**
 * Redis Streams sink: a topic is a stream key and each envelope becomes
 * one `XADD` entry with a single `payload` field.
 *
 * With `maxlen` set, streams are trimmed approximately (`MAXLEN ~ n`) on
 * every append.
 */
export class RedisStreamSink implements Sink {
  readonly name = 'redis-streams';
  private readonly options: RedisOptions;
  private readonly maxlen: number | undefined;
  private readonly log: Logger;
  private readonly createClient: RedisFactory;
  private redis: Redis | null = null;

  constructor(conf: SinkConf, log: Logger, createClient: RedisFactory = (options) => new Redis(options)) {
    this.options = toRedisOptions(conf);
    this.maxlen = conf.maxlen;
    this.log = log;
    this.createClient = createClient;

    const ignored = unsupportedSinkKeys(conf);
    if (ignored.length > 0) {
      log.warn({ keys: ignored }, 'Ignoring unsupported sink settings');
    }
  }

  async connect(): Promise<void> {
    if (this.redis !== null) return;

    const redis = this.createClient(this.options);
    // Errors surface through rejected commands; keep ioredis from
    // reporting them as unhandled 'error' events.
    redis.on('error', (err: Error) => {
      this.log.debug({ err }, 'Redis connection error');
    });

    try {
      await redis.connect();
    } catch (err: unknown) {
      redis.disconnect();
      throw err;
    }
    this.redis = redis;
    this.log.info({ host: this.options.host, port: this.options.port }, 'Redis connected');
  }

  async send(envelope: DispatchEnvelope): Promise<void> {
    const redis = this.redis;
    if (redis === null) {
      throw new Error('Redis sink is not connected');
    }

    if (this.maxlen !== undefined) {
      await redis.xadd(envelope.topic, 'MAXLEN', '~', this.maxlen, '*', 'payload', envelope.payload);
    } else {
      await redis.xadd(envelope.topic, '*', 'payload', envelope.payload);
    }
  }

  isPermanent(err: unknown): boolean {
    return isPermanentReply(err);
  }

  async disconnect(): Promise<void> {
    const redis = this.redis;
    this.redis = null;
    if (redis === null) return;

    try {
      await redis.quit();
    } catch (err: unknown) {
      this.log.debug({ err }, 'Redis quit failed, dropping connection');
      redis.disconnect();
    }
  }
}
