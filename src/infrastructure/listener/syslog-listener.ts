import net from 'node:net';
import tls from 'node:tls';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';
import type { Logger } from 'pino';
import { DispatcherClosedError } from '../../domain/index.js';
import type { LineHandler, Metrics } from '../../application/index.js';
import { NOOP_METRICS } from '../../application/index.js';
import { LineSplitter } from './line-splitter.js';

export interface ListenerTls {
  readonly cert: Buffer;
  readonly key: Buffer;
}

export interface SyslogListenerOptions {
  readonly address: string;
  readonly port: number;
  /** PEM material; plaintext TCP when absent. */
  readonly tls?: ListenerTls;
  readonly onLine: LineHandler;
  readonly log: Logger;
  readonly metrics?: Metrics;
  readonly maxLineBytes?: number;
}

export interface ListenerStats {
  readonly connectionsTotal: number;
  readonly connectionsActive: number;
}

interface Connection {
  readonly id: number;
  readonly peer: string;
  readonly stream: Duplex;
  readonly splitter: LineSplitter;
  /** Tail of this connection's processing chain. Never rejects. */
  pending: Promise<void>;
}

/**
 * Newline-delimited syslog listener over TCP or TLS.
 *
 * Each connection gets its own sequential processing chain. While a
 * chunk's lines are being handled the socket is paused, so a blocked
 * dispatcher throttles the sender through TCP flow control instead of
 * lines piling up in memory.
 *
 * `stopAccepting()` refuses new connections. `close()` also waits for
 * every connection's in-flight lines, then tears the sockets down.
 * In-flight lines may be waiting on the dispatcher, so it must already
 * be closing (or able to drain) for `close()` to finish.
 */
export class SyslogListener {
  private readonly options: SyslogListenerOptions;
  private readonly log: Logger;
  private readonly metrics: Metrics;
  private readonly connections = new Set<Connection>();
  private server: net.Server | null = null;
  private serverClosed: Promise<void> = Promise.resolve();
  private nextId = 1;
  private total = 0;
  private closing = false;

  constructor(options: SyslogListenerOptions) {
    this.options = options;
    this.log = options.log;
    this.metrics = options.metrics ?? NOOP_METRICS;
  }

  /** Binds the listener and resolves with the bound address. */
  listen(): Promise<AddressInfo> {
    const onConnection = (socket: net.Socket): void => {
      this.attach(socket, `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`);
    };

    const { tls: material } = this.options;
    let server: net.Server;
    if (material) {
      const secure = tls.createServer({ cert: material.cert, key: material.key }, onConnection);
      secure.on('tlsClientError', (err: Error) => {
        this.log.warn({ err }, 'TLS handshake failed');
      });
      server = secure;
    } else {
      server = net.createServer(onConnection);
    }

    this.server = server;

    return new Promise<AddressInfo>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.address, () => {
        server.off('error', reject);
        server.on('error', (err: Error) => {
          this.log.error({ err }, 'Listener error');
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Listener bound to unexpected address: ${String(address)}`));
          return;
        }
        this.log.info(
          { address: address.address, port: address.port, tls: material !== undefined },
          'Listening for syslog',
        );
        resolve(address);
      });
    });
  }

  /** Takes ownership of an accepted stream (a socket or any Duplex). */
  attach(stream: Duplex, peer: string): void {
    if (this.closing) {
      stream.destroy();
      return;
    }

    const connection: Connection = {
      id: this.nextId++,
      peer,
      stream,
      splitter: new LineSplitter(this.options.maxLineBytes),
      pending: Promise.resolve(),
    };

    this.connections.add(connection);
    this.total++;
    this.metrics.increment('connections');
    this.log.debug({ connectionId: connection.id, peer }, 'Connection accepted');

    stream.on('data', (chunk: Buffer) => {
      this.enqueue(connection, connection.splitter.push(chunk));
    });

    stream.on('end', () => {
      this.enqueue(connection, connection.splitter.flush());
    });

    stream.on('error', (err: Error) => {
      this.log.debug({ err, connectionId: connection.id, peer }, 'Connection error');
    });

    stream.on('close', () => {
      connection.pending = connection.pending.then(() => {
        this.connections.delete(connection);
        this.log.debug({ connectionId: connection.id, peer }, 'Connection closed');
      });
    });
  }

  stats(): ListenerStats {
    return {
      connectionsTotal: this.total,
      connectionsActive: this.connections.size,
    };
  }

  /** Resolves once every line received so far has been handled. */
  async drained(): Promise<void> {
    await Promise.all([...this.connections].map((c) => c.pending));
  }

  /** Stops accepting connections; existing ones keep being served. */
  stopAccepting(): void {
    if (this.closing) return;
    this.closing = true;

    const server = this.server;
    if (server === null) return;
    this.serverClosed = new Promise<void>((resolve) => {
      server.close((err?: Error) => {
        if (err) this.log.debug({ err }, 'Listener was not running');
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    this.stopAccepting();
    await this.drained();

    for (const connection of this.connections) {
      connection.stream.destroy();
    }
    this.connections.clear();

    await this.serverClosed;
    this.log.info({ connectionsTotal: this.total }, 'Listener closed');
  }

  private enqueue(connection: Connection, lines: Buffer[]): void {
    if (lines.length === 0) return;

    const { stream } = connection;
    stream.pause();
    connection.pending = connection.pending
      .then(() => this.processLines(connection, lines))
      .then(() => {
        if (!stream.destroyed && !this.closing) stream.resume();
      });
  }

  private async processLines(connection: Connection, lines: readonly Buffer[]): Promise<void> {
    for (const [index, line] of lines.entries()) {
      try {
        await this.options.onLine(line);
      } catch (err: unknown) {
        if (err instanceof DispatcherClosedError) {
          const rejected = lines.length - index;
          this.metrics.increment('lines.rejected', rejected);
          this.log.warn(
            { connectionId: connection.id, peer: connection.peer, rejected },
            'Dispatcher closed, lines not accepted',
          );
          return;
        }
        this.metrics.increment('lines.rejected');
        this.log.error({ err, connectionId: connection.id, peer: connection.peer }, 'Failed to process line');
      }
    }
  }
}
