import { describe, it, expect, beforeEach } from 'vitest';
import { Dispatcher } from '../../src/infrastructure/index.js';
import { DispatcherClosedError } from '../../src/domain/index.js';
import { FakeSink, envelope, fakeLogger, fakeMetrics, tick } from '../helpers.js';

describe('Dispatcher', () => {
  let sink: FakeSink;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    sink = new FakeSink();
    log = fakeLogger();
  });

  function dispatcher(capacity: number, drainTimeoutMs?: number): Dispatcher {
    const d = new Dispatcher({
      sink,
      capacity,
      log,
      backoff: { initialMs: 1, maxMs: 4 },
      drainTimeoutMs,
    });
    d.start();
    return d;
  }

  it('rejects a capacity below one', () => {
    expect(() => new Dispatcher({ sink, capacity: 0, log })).toThrow(RangeError);
  });

  it('blocks the submitter once the buffer is full', async () => {
    sink.pause();
    const d = dispatcher(2);

    await d.submit(envelope('logs', 'a'));
    await d.submit(envelope('logs', 'b'));

    let admitted = false;
    const third = d.submit(envelope('logs', 'c')).then(() => {
      admitted = true;
    });
    await tick();

    expect(admitted).toBe(false);
    expect(d.stats()).toMatchObject({ buffered: 2, waiting: 1 });

    sink.resume();
    await third;
    expect(admitted).toBe(true);

    await d.close();
    expect(sink.delivered.map((e) => e.payload.toString())).toEqual(['a', 'b', 'c']);
  });

  it('never holds more than its capacity', async () => {
    sink.pause();
    const d = dispatcher(3);

    const submissions = ['a', 'b', 'c', 'd', 'e'].map((p) => d.submit(envelope('logs', p)));
    await tick();

    expect(d.stats().buffered).toBe(3);
    expect(d.stats().waiting).toBe(2);

    sink.resume();
    await Promise.all(submissions);
    await d.close();
    expect(sink.delivered).toHaveLength(5);
  });

  it('reconnects and retries a failed send without reordering', async () => {
    sink.failNext = 2;
    const d = dispatcher(4);

    await d.submit(envelope('first', 'a'));
    await d.submit(envelope('second', 'b'));
    await d.close();

    expect(sink.topics()).toEqual(['first', 'second']);
    expect(sink.connects).toBe(3);
    expect(sink.disconnects).toBe(3);
    expect(d.stats()).toMatchObject({ sent: 2, retries: 2, lost: 0 });
    expect(log.warn).toHaveBeenCalledTimes(2);
  });

  it('reports the connection state', async () => {
    const d = dispatcher(1);
    expect(d.isConnected).toBe(false);

    await d.submit(envelope('logs', 'a'));
    await tick();
    expect(d.isConnected).toBe(true);

    await d.close();
    expect(d.isConnected).toBe(false);
  });

  it('rejects submissions after close', async () => {
    const d = dispatcher(1);
    await d.close();

    await expect(d.submit(envelope('logs', 'a'))).rejects.toBeInstanceOf(DispatcherClosedError);
    expect(d.stats().closed).toBe(true);
  });

  it('drains buffered envelopes on close', async () => {
    sink.pause();
    const d = dispatcher(4);
    await d.submit(envelope('logs', 'a'));
    await d.submit(envelope('logs', 'b'));

    const closing = d.close();
    sink.resume();
    await closing;

    expect(sink.delivered).toHaveLength(2);
    expect(d.stats().lost).toBe(0);
  });

  it('gives up after the drain timeout and rejects blocked submitters', async () => {
    sink.pause();
    const metrics = fakeMetrics();
    const d = new Dispatcher({ sink, capacity: 1, log, metrics, drainTimeoutMs: 20 });
    d.start();

    await d.submit(envelope('logs', 'a'));
    const blocked = expect(d.submit(envelope('logs', 'b'))).rejects.toBeInstanceOf(DispatcherClosedError);

    await d.close();
    await blocked;

    expect(d.stats()).toMatchObject({ lost: 1, sent: 0, waiting: 0, buffered: 0, inFlight: 0 });
    expect(metrics.increment).toHaveBeenCalledWith('dispatch.lost', 1);
  });

  it('does not count an abandoned envelope as sent when its send completes late', async () => {
    sink.pause();
    const d = new Dispatcher({ sink, capacity: 1, log, drainTimeoutMs: 20 });
    d.start();
    await d.submit(envelope('logs', 'a'));

    await d.close();
    sink.resume();
    await tick();

    expect(d.stats()).toMatchObject({ lost: 1, sent: 0, buffered: 0 });
  });

  it('drops an envelope the broker refuses and keeps delivering the rest', async () => {
    sink.refusedTopics.add('bad');
    const metrics = fakeMetrics();
    const d = new Dispatcher({ sink, capacity: 2, log, metrics, backoff: { initialMs: 1, maxMs: 4 } });
    d.start();

    await Promise.all([
      d.submit(envelope('bad', 'x')),
      d.submit(envelope('good', 'a')),
      d.submit(envelope('good', 'b')),
    ]);
    await d.close();

    expect(sink.topics()).toEqual(['good', 'good']);
    expect(d.stats()).toMatchObject({ sent: 2, lost: 1, retries: 0 });
    expect(metrics.increment).toHaveBeenCalledWith('dispatch.lost');
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ topic: 'bad' }),
      'Sink refused envelope, dropping it',
    );
  });

  it('returns the same promise from repeated close calls', async () => {
    const d = dispatcher(1);
    const closing = d.close();

    expect(d.close()).toBe(closing);
    await closing;
  });
});
