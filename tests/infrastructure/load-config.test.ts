import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig, parseConfig } from '../../src/infrastructure/index.js';
import { ConfigError } from '../../src/domain/index.js';

const GLOBAL = `
global:
  listen:
    port: 1514
  status:
    port: 8080
  kafka:
    topic: logs
`;

function issuesOf(text: string) {
  try {
    parseConfig(text);
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('parseConfig', () => {
  it('parses settings and compiles rules', () => {
    const config = parseConfig(`${GLOBAL}
rules:
  - jmespath: meta.topic
    actions:
      - type: merge
        json:
          meta:
            relay:
              version: '{{version}}'
      - type: stop
  - regex: '.*'
    field: hostname
    actions:
      - type: forward
        topic: 'hosts.{{hostname}}'
`);

    expect(config.global.listen).toEqual({ address: '127.0.0.1', port: 1514 });
    expect(config.global.kafka).toEqual({ buffer: 1024, conf: {}, topic: 'logs' });
    expect(config.rules).toHaveLength(2);
    expect(config.rules[0]?.matcher.kind).toBe('query');
    expect(config.rules[0]?.actions.map((a) => a.type)).toEqual(['merge', 'stop']);
    expect(config.rules[1]?.matcher.field).toBe('hostname');
  });

  it('reads broker settings with dotted keys', () => {
    const config = parseConfig(`
global:
  listen: { port: 1514 }
  status: { port: 8080 }
  kafka:
    topic: logs
    buffer: 16
    conf:
      bootstrap.servers: 'redis-a:6380'
      maxlen: 10000
`);

    expect(config.global.kafka.buffer).toBe(16);
    expect(config.global.kafka.conf).toEqual({ 'bootstrap.servers': 'redis-a:6380', maxlen: 10000 });
  });

  it('reports YAML syntax errors', () => {
    expect(() => parseConfig('global: [')).toThrow(/YAML syntax error/);
  });

  it('reports an empty document', () => {
    expect(issuesOf('')).toEqual([{ path: 'global', message: 'Required' }]);
  });

  it('reports schema issues by dotted path', () => {
    const issues = issuesOf(`
global:
  listen: { port: 1514 }
  status: { port: 8080 }
  kafka: {}
`);

    expect(issues.map((i) => i.path)).toEqual(['global.kafka.topic']);
  });

  it('reports a rule with both matchers', () => {
    const issues = issuesOf(`${GLOBAL}
rules:
  - jmespath: a
    regex: b
`);

    expect(issues).toEqual([{ path: 'rules.0', message: 'Exactly one of "jmespath" or "regex" is required' }]);
  });

  it('reports rule compile errors', () => {
    const issues = issuesOf(`${GLOBAL}
rules:
  - regex: '.*'
    actions:
      - type: replace
        template: '{{unknown}}'
`);

    expect(issues).toEqual([{ path: 'rules.0.actions.0', message: 'Unknown placeholder {{unknown}}' }]);
  });
});

describe('loadConfig', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('loads a file from disk', () => {
    dir = mkdtempSync(join(tmpdir(), 'logrelay-'));
    const file = join(dir, 'logrelay.yml');
    writeFileSync(file, GLOBAL);

    expect(loadConfig(file).global.kafka.topic).toBe('logs');
  });

  it('accepts the sample configuration', () => {
    const config = loadConfig(fileURLToPath(new URL('../../logrelay.yml', import.meta.url)));

    expect(config.rules).toHaveLength(4);
    expect(config.global.metrics.statsd).toBe('localhost:8125');
  });

  it('fails on a missing file', () => {
    expect(() => loadConfig('/nonexistent/logrelay.yml')).toThrow(/Cannot read/);
  });
});
