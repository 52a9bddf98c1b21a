import type { Logger } from 'pino';
import type { DispatchEnvelope, EnvelopeSubmitter } from '../../domain/index.js';
import { DispatcherClosedError } from '../../domain/index.js';
import type { Metrics } from '../../application/index.js';
import { NOOP_METRICS } from '../../application/index.js';
import type { DispatcherStats, Sink } from './types.js';

const DEFAULT_INITIAL_BACKOFF_MS = 100;
const DEFAULT_MAX_BACKOFF_MS = 5_000;
const DEFAULT_DRAIN_TIMEOUT_MS = 30_000;

export interface BackoffOptions {
  readonly initialMs?: number;
  readonly maxMs?: number;
}

export interface DispatcherOptions {
  readonly sink: Sink;
  /** Hard cap on envelopes held (queued + in flight). */
  readonly capacity: number;
  readonly log: Logger;
  readonly metrics?: Metrics;
  readonly backoff?: BackoffOptions;
  /** How long `close()` waits for the buffer to drain. */
  readonly drainTimeoutMs?: number;
}

type Delivery = 'sent' | 'refused' | 'abandoned';

interface Waiter {
  readonly envelope: DispatchEnvelope;
  readonly resolve: () => void;
  readonly reject: (err: Error) => void;
}

/**
 * Bounded, backpressured hand-off between the pipeline and the sink.
 *
 * - `submit()` resolves once the envelope is admitted. While the buffer
 *   is full, submitters wait in FIFO order; nothing is dropped and the
 *   buffer never grows past `capacity`.
 * - A single drain loop owns the sink session and delivers envelopes one
 *   at a time, in admission order. A failed send disconnects, backs off
 *   exponentially (bounded), reconnects and retries the same envelope.
 *   An envelope the broker refuses outright is counted lost and skipped.
 *   Sink errors never reach submitters.
 * - `close()` refuses new submissions, lets already-waiting submitters
 *   in as slots free, drains the buffer, then disconnects the sink.
 */
export class Dispatcher implements EnvelopeSubmitter {
  private readonly sink: Sink;
  private readonly capacity: number;
  private readonly log: Logger;
  private readonly metrics: Metrics;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly drainTimeoutMs: number;

  private readonly queue: DispatchEnvelope[] = [];
  private readonly waiters: Waiter[] = [];
  private inFlight = 0;
  private sent = 0;
  private retries = 0;
  private lost = 0;
  private connected = false;
  private closed = false;
  private abandoned = false;

  private wake: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: DispatcherOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Dispatcher capacity must be a positive integer, got ${options.capacity}`);
    }
    this.sink = options.sink;
    this.capacity = options.capacity;
    this.log = options.log;
    this.metrics = options.metrics ?? NOOP_METRICS;
    this.initialBackoffMs = options.backoff?.initialMs ?? DEFAULT_INITIAL_BACKOFF_MS;
    this.maxBackoffMs = options.backoff?.maxMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
  }

  /** Starts the drain loop. Idempotent. */
  start(): void {
    if (this.loop !== null) return;
    this.loop = this.run().catch((err: unknown) => {
      this.log.error({ err, sink: this.sink.name }, 'Dispatcher drain loop crashed');
    });
  }

  /**
   * Admits an envelope, waiting for a free slot while the buffer is full.
   * Rejects immediately with `DispatcherClosedError` after `close()`.
   */
  submit(envelope: DispatchEnvelope): Promise<void> {
    if (this.closed) {
      return Promise.reject(new DispatcherClosedError());
    }

    if (this.waiters.length === 0 && this.held < this.capacity) {
      this.admit(envelope);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ envelope, resolve, reject });
    });
  }

  /** Whether the sink session is currently established. */
  get isConnected(): boolean {
    return this.connected;
  }

  stats(): DispatcherStats {
    return {
      capacity: this.capacity,
      buffered: this.held,
      inFlight: this.inFlight,
      waiting: this.waiters.length,
      sent: this.sent,
      retries: this.retries,
      lost: this.lost,
      connected: this.connected,
      closed: this.closed,
    };
  }

  /** Drains and shuts down. Safe to call more than once. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  /* ------------------------------------------------------------------ */
  /*  Admission                                                         */
  /* ------------------------------------------------------------------ */

  private get held(): number {
    return this.queue.length + this.inFlight;
  }

  private admit(envelope: DispatchEnvelope): void {
    this.queue.push(envelope);
    this.metrics.gauge('dispatch.buffered', this.held);
    this.notify();
  }

  private admitWaiters(): void {
    while (this.held < this.capacity) {
      const waiter = this.waiters.shift();
      if (waiter === undefined) return;
      this.admit(waiter.envelope);
      waiter.resolve();
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /* ------------------------------------------------------------------ */
  /*  Drain loop                                                        */
  /* ------------------------------------------------------------------ */

  private async run(): Promise<void> {
    for (;;) {
      const envelope = this.queue.shift();

      if (envelope === undefined) {
        if (this.closed || this.abandoned) return;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }

      this.inFlight = 1;
      const outcome = await this.deliver(envelope);
      this.inFlight = 0;
      if (outcome === 'abandoned') return;

      this.metrics.gauge('dispatch.buffered', this.held);
      this.admitWaiters();
    }
  }

  /**
   * Sends one envelope, reconnecting and retrying until it succeeds or
   * the broker refuses it. `abandoned` once shutdown gave up on the buffer.
   */
  private async deliver(envelope: DispatchEnvelope): Promise<Delivery> {
    for (let attempt = 0; ; attempt++) {
      if (this.abandoned) return 'abandoned';

      try {
        if (!this.connected) {
          await this.sink.connect();
          this.connected = true;
          this.log.info({ sink: this.sink.name }, 'Sink connected');
        }
        await this.sink.send(envelope);
        // Already counted lost by abandon()
        if (this.abandoned) return 'abandoned';
        this.sent++;
        this.metrics.increment('dispatch.sent');
        return 'sent';
      } catch (err: unknown) {
        if (this.abandoned) return 'abandoned';
        if (this.connected && this.sink.isPermanent(err)) {
          this.lost++;
          this.metrics.increment('dispatch.lost');
          this.log.error(
            { err, sink: this.sink.name, topic: envelope.topic, attempt },
            'Sink refused envelope, dropping it',
          );
          return 'refused';
        }

        this.retries++;
        this.metrics.increment('dispatch.retries');
        const delayMs = this.backoffFor(attempt);
        this.log.warn(
          { err, sink: this.sink.name, topic: envelope.topic, attempt, delayMs },
          'Sink delivery failed, reconnecting',
        );
        await this.resetConnection();
        await sleep(delayMs);
      }
    }
  }

  private backoffFor(attempt: number): number {
    return Math.min(this.initialBackoffMs * 2 ** attempt, this.maxBackoffMs);
  }

  private async resetConnection(): Promise<void> {
    this.connected = false;
    try {
      await this.sink.disconnect();
    } catch (err: unknown) {
      this.log.debug({ err, sink: this.sink.name }, 'Sink disconnect failed');
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Shutdown                                                          */
  /* ------------------------------------------------------------------ */

  private async shutdown(): Promise<void> {
    this.closed = true;
    this.log.info(
      { buffered: this.held, waiting: this.waiters.length, sink: this.sink.name },
      'Dispatcher closing, draining buffer',
    );
    this.notify();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.drainTimeoutMs);
    });
    const drained = (this.loop ?? Promise.resolve()).then(() => 'drained' as const);

    const outcome = await Promise.race([drained, deadline]);
    clearTimeout(timer);

    if (outcome === 'timeout' || this.held > 0 || this.waiters.length > 0) {
      this.abandon();
    }

    await this.resetConnection();
    this.log.info({ sent: this.sent, lost: this.lost, sink: this.sink.name }, 'Dispatcher closed');
  }

  /**
   * Gives up on whatever is still buffered once the drain deadline passed.
   * Buffered envelopes are reported lost; blocked submitters are rejected
   * so their callers can account for the loss themselves.
   */
  private abandon(): void {
    this.abandoned = true;
    const lost = this.held;
    this.lost += lost;
    this.queue.length = 0;
    this.inFlight = 0;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new DispatcherClosedError());
    }

    if (lost > 0) {
      this.metrics.increment('dispatch.lost', lost);
      this.log.error({ lost, sink: this.sink.name }, 'Drain deadline passed, undelivered envelopes lost');
    }
    this.notify();
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
