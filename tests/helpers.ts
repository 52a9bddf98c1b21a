import { vi } from 'vitest';
import type { Logger } from 'pino';
import { LogRecord } from '../src/domain/index.js';
import type { DispatchEnvelope, RecordFields } from '../src/domain/index.js';
import type { Metrics } from '../src/application/index.js';
import type { Sink } from '../src/infrastructure/index.js';

/** Fixed clock for deterministic `{{iso8601}}` rendering. */
export const FIXED_NOW = new Date('2024-01-01T00:00:00Z');

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export function fakeMetrics() {
  return {
    increment: vi.fn(),
    gauge: vi.fn(),
    timing: vi.fn(),
  } satisfies Metrics;
}

/** Record whose `msg` is `msg`, plus any extra header fields. */
export function makeRecord(msg: string, fields: Omit<RecordFields, 'msg'> = {}): LogRecord {
  return new LogRecord(msg, { ...fields, msg });
}

export function envelope(topic: string, payload: string): DispatchEnvelope {
  return { topic, payload: Buffer.from(payload) };
}

/** Lets pending promise callbacks and I/O callbacks run. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** A broker refusal that resending cannot fix. */
export class RefusedError extends Error {
  constructor(topic: string) {
    super(`WRONGTYPE ${topic} holds the wrong kind of value`);
    this.name = 'RefusedError';
  }
}

/**
 * In-process sink. `pause()` holds every send until `resume()`;
 * `failNext` makes that many sends throw; sends to a topic in
 * `refusedTopics` always throw a `RefusedError`.
 */
export class FakeSink implements Sink {
  readonly name = 'fake';
  readonly delivered: DispatchEnvelope[] = [];
  connects = 0;
  disconnects = 0;
  failNext = 0;
  readonly refusedTopics = new Set<string>();
  private gate: Promise<void> | null = null;
  private release: (() => void) | null = null;

  pause(): void {
    this.gate = new Promise((resolve) => {
      this.release = resolve;
    });
  }

  resume(): void {
    const release = this.release;
    this.gate = null;
    this.release = null;
    release?.();
  }

  async connect(): Promise<void> {
    this.connects++;
  }

  async send(envelope: DispatchEnvelope): Promise<void> {
    if (this.gate !== null) await this.gate;
    if (this.refusedTopics.has(envelope.topic)) {
      throw new RefusedError(envelope.topic);
    }
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('broker unavailable');
    }
    this.delivered.push(envelope);
  }

  async disconnect(): Promise<void> {
    this.disconnects++;
  }

  isPermanent(err: unknown): boolean {
    return err instanceof RefusedError;
  }

  topics(): string[] {
    return this.delivered.map((e) => e.topic);
  }
}
