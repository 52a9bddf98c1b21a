import { describe, it, expect, vi, beforeEach } from 'vitest';

const socket = vi.hoisted(() => ({
  on: vi.fn(),
  unref: vi.fn(),
  send: vi.fn(),
  close: vi.fn(),
}));

vi.mock('node:dgram', () => ({
  default: { createSocket: vi.fn(() => socket) },
}));

import { StatsdClient, createMetrics, formatMetric, parseStatsdTarget } from '../../src/infrastructure/metrics/index.js';
import { fakeLogger } from '../helpers.js';

describe('formatMetric', () => {
  it('builds a prefixed StatsD line', () => {
    expect(formatMetric('logrelay', 'lines', 1, 'c')).toBe('logrelay.lines:1|c');
    expect(formatMetric('logrelay', 'dispatch.buffered', 12, 'g')).toBe('logrelay.dispatch.buffered:12|g');
  });
});

describe('parseStatsdTarget', () => {
  it('splits host and port', () => {
    expect(parseStatsdTarget('metrics.local:8125')).toEqual({ host: 'metrics.local', port: 8125 });
  });
});

describe('StatsdClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sends one datagram per sample', () => {
    const client = new StatsdClient('metrics.local:8125', fakeLogger());

    client.increment('lines');
    client.increment('rules.matched', 3);
    client.gauge('dispatch.buffered', 7);
    client.timing('evaluate', 12.6);

    expect(socket.send.mock.calls.map((call) => call.slice(0, 3))).toEqual([
      ['logrelay.lines:1|c', 8125, 'metrics.local'],
      ['logrelay.rules.matched:3|c', 8125, 'metrics.local'],
      ['logrelay.dispatch.buffered:7|g', 8125, 'metrics.local'],
      ['logrelay.evaluate:13|ms', 8125, 'metrics.local'],
    ]);
  });

  it('does not keep the process alive', () => {
    new StatsdClient('metrics.local:8125', fakeLogger());
    expect(socket.unref).toHaveBeenCalledTimes(1);
  });

  it('stops sending once closed', () => {
    const client = new StatsdClient('metrics.local:8125', fakeLogger());

    client.close();
    client.increment('lines');

    expect(socket.close).toHaveBeenCalledTimes(1);
    expect(socket.send).not.toHaveBeenCalled();
  });
});

describe('createMetrics', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('is a no-op without a target', () => {
    const metrics = createMetrics(undefined, fakeLogger());

    metrics.increment('lines');
    metrics.close();

    expect(socket.send).not.toHaveBeenCalled();
  });

  it('builds a StatsD client for a target', () => {
    expect(createMetrics('metrics.local:8125', fakeLogger())).toBeInstanceOf(StatsdClient);
  });
});
