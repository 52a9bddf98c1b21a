import { readFileSync } from 'node:fs';
import type { Logger } from 'pino';
import { RuleSet, createLinePipeline } from './application/index.js';
import type { RelayConfig } from './infrastructure/index.js';
import {
  Dispatcher,
  RedisStreamSink,
  SyslogListener,
  createMetrics,
} from './infrastructure/index.js';
import { createStatusServer } from './interfaces/http/index.js';
import { VERSION } from './version.js';

export interface Daemon {
  close(): Promise<void>;
}

/** The parts `shutdown()` stops, in the shape the daemon wires them. */
export interface DaemonParts {
  readonly listener: Pick<SyslogListener, 'stopAccepting' | 'close'>;
  readonly dispatcher: Pick<Dispatcher, 'close'>;
  readonly status: { close(): PromiseLike<unknown> };
  readonly metrics: { close(): void };
}

/**
 * Ordered shutdown:
 * 1) stop accepting connections
 * 2) close the dispatcher, which starts its drain deadline, so
 *    connections blocked in `submit` are released even with the sink down
 * 3) wait for the listener's in-flight lines, then the dispatcher drain
 * 4) status server, metrics
 */
export async function shutdown(parts: DaemonParts, log: Logger): Promise<void> {
  parts.listener.stopAccepting();
  const dispatcherClosed = parts.dispatcher.close();

  await parts.listener.close();
  await dispatcherClosed;
  await parts.status.close();
  parts.metrics.close();
  log.info('Shutdown complete');
}

/**
 * Wires the daemon together and starts listening.
 *
 * Order:
 * 1) TLS material (fail before anything is started)
 * 2) Metrics, rule set, sink + dispatcher
 * 3) Status server
 * 4) Syslog listener, last, so nothing is accepted before the
 *    dispatcher can take it
 */
export async function startDaemon(config: RelayConfig, log: Logger): Promise<Daemon> {
  const { global } = config;
  const startedAt = Date.now();

  const tlsMaterial = global.listen.tls
    ? { cert: readFileSync(global.listen.tls.cert), key: readFileSync(global.listen.tls.key) }
    : undefined;

  const metrics = createMetrics(global.metrics.statsd, log.child({ component: 'metrics' }));

  const ruleSet = new RuleSet(config.rules, {
    defaultTopic: global.kafka.topic,
    version: VERSION,
  });
  log.info({ rules: ruleSet.size, defaultTopic: ruleSet.defaultTopic, version: VERSION }, 'Rules loaded');

  const sink = new RedisStreamSink(global.kafka.conf, log.child({ component: 'sink' }));
  const dispatcher = new Dispatcher({
    sink,
    capacity: global.kafka.buffer,
    log: log.child({ component: 'dispatcher' }),
    metrics,
  });
  dispatcher.start();

  const listener = new SyslogListener({
    address: global.listen.address,
    port: global.listen.port,
    tls: tlsMaterial,
    onLine: createLinePipeline({
      ruleSet,
      dispatcher,
      metrics,
      log: log.child({ component: 'pipeline' }),
    }),
    log: log.child({ component: 'listener' }),
    metrics,
  });

  const status = createStatusServer(
    {
      getStatus: () => ({
        version: VERSION,
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
        rules: ruleSet.size,
        defaultTopic: ruleSet.defaultTopic,
        listener: listener.stats(),
        dispatcher: dispatcher.stats(),
      }),
      isHealthy: () => dispatcher.isConnected,
    },
    log.level,
  );

  await status.listen({ host: global.status.address, port: global.status.port });
  await listener.listen();

  return {
    close: () => shutdown({ listener, dispatcher, status, metrics }, log),
  };
}
