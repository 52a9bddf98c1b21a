import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { parseCli, runRuleTest } from '../src/cli.js';
import { rules } from './application/rules.js';

describe('parseCli', () => {
  it('reads short and long flags', () => {
    expect(parseCli(['-c', 'relay.yml', '--test', 'sample.log'])).toEqual({
      configPath: 'relay.yml',
      testFile: 'sample.log',
    });
  });

  it('leaves unset flags undefined', () => {
    expect(parseCli([])).toEqual({ configPath: undefined, testFile: undefined });
  });

  it('rejects unknown flags', () => {
    expect(() => parseCli(['--verbose'])).toThrow();
  });
});

describe('runRuleTest', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('writes a report for each matching line', async () => {
    dir = mkdtempSync(join(tmpdir(), 'logrelay-'));
    const file = join(dir, 'sample.log');
    writeFileSync(file, 'ok\ndisk error\n{"a":1}\n');
    const output: string[] = [];

    const matched = await runRuleTest(file, rules({ regex: 'error' }, { jmespath: 'a' }), (text) => {
      output.push(text);
    });

    expect(matched).toBe(2);
    expect(output).toEqual([
      'Line 2 matches on:\n\t - [0] pattern error',
      'Line 3 matches on:\n\t - [1] query a',
    ]);
  });

  it('fails on a missing file', async () => {
    await expect(runRuleTest('/nonexistent/sample.log', [], () => undefined)).rejects.toThrow();
  });
});
