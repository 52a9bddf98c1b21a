import type { DispatchEnvelope } from '../../domain/index.js';

/**
 * The external delivery target behind the dispatcher.
 *
 * The dispatcher owns exactly one session: it calls `connect()` before
 * the first send and again after any failure, having called
 * `disconnect()` on the broken session first.
 */
export interface Sink {
  readonly name: string;
  connect(): Promise<void>;
  send(envelope: DispatchEnvelope): Promise<void>;
  disconnect(): Promise<void>;
  /**
   * True when the broker refused this envelope outright, so resending it
   * can never succeed. Anything else is treated as a broken session.
   */
  isPermanent(err: unknown): boolean;
}

export interface DispatcherStats {
  readonly capacity: number;
  /** Envelopes held: queued plus in flight. Never exceeds `capacity`. */
  readonly buffered: number;
  readonly inFlight: number;
  /** Submitters currently blocked waiting for a slot. */
  readonly waiting: number;
  readonly sent: number;
  readonly retries: number;
  readonly lost: number;
  readonly connected: boolean;
  readonly closed: boolean;
}
