import dgram from 'node:dgram';
import type { Logger } from 'pino';
import type { Metrics } from '../../application/index.js';
import { NOOP_METRICS } from '../../application/index.js';

export const METRIC_PREFIX = 'logrelay';

type MetricType = 'c' | 'g' | 'ms';

/** One StatsD datagram line, e.g. `logrelay.lines:1|c`. */
export function formatMetric(prefix: string, name: string, value: number, type: MetricType): string {
  return `${prefix}.${name}:${value}|${type}`;
}

/** Splits `host:port`; the schema has already validated the shape. */
export function parseStatsdTarget(target: string): { host: string; port: number } {
  const colon = target.lastIndexOf(':');
  return { host: target.slice(0, colon), port: Number(target.slice(colon + 1)) };
}

/**
 * Fire-and-forget StatsD client over UDP.
 *
 * One datagram per sample; send errors are logged at debug and never
 * reach the caller.
 */
export class StatsdClient implements Metrics {
  private socket: dgram.Socket | null;
  private readonly host: string;
  private readonly port: number;
  private readonly prefix: string;
  private readonly log: Logger;

  constructor(target: string, log: Logger, prefix: string = METRIC_PREFIX) {
    const { host, port } = parseStatsdTarget(target);
    this.host = host;
    this.port = port;
    this.prefix = prefix;
    this.log = log;
    this.socket = dgram.createSocket('udp4');
    this.socket.on('error', (err) => {
      this.log.debug({ err }, 'StatsD socket error');
    });
    // Metrics must never keep the process alive on shutdown
    this.socket.unref();
  }

  increment(name: string, value: number = 1): void {
    this.send(formatMetric(this.prefix, name, value, 'c'));
  }

  gauge(name: string, value: number): void {
    this.send(formatMetric(this.prefix, name, value, 'g'));
  }

  timing(name: string, ms: number): void {
    this.send(formatMetric(this.prefix, name, Math.round(ms), 'ms'));
  }

  close(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.close();
  }

  private send(line: string): void {
    if (this.socket === null) return;
    this.socket.send(line, this.port, this.host, (err) => {
      if (err) this.log.debug({ err, line }, 'StatsD send failed');
    });
  }
}

/**
 * Builds the metrics emitter for the configured collector, or a no-op
 * emitter when none is configured.
 */
export function createMetrics(target: string | undefined, log: Logger): Metrics & { close(): void } {
  if (target === undefined) {
    return { ...NOOP_METRICS, close: () => undefined };
  }
  log.info({ target }, 'StatsD metrics enabled');
  return new StatsdClient(target, log);
}
