import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { parseArgs } from 'node:util';
import type { Rule } from './domain/index.js';
import { formatReport, testRules } from './application/index.js';

export interface CliOptions {
  /** `-c/--config`: configuration file. */
  readonly configPath: string | undefined;
  /** `-t/--test`: log file to dry-run against the rules. */
  readonly testFile: string | undefined;
}

/** Parses command-line flags; unknown flags throw. */
export function parseCli(argv: readonly string[]): CliOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      config: { type: 'string', short: 'c' },
      test: { type: 'string', short: 't' },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    configPath: values.config,
    testFile: values.test,
  };
}

/**
 * Dry-runs every line of `filePath` against the rules, writing a report
 * for each line that matched. Returns the number of matching lines.
 */
export async function runRuleTest(
  filePath: string,
  rules: readonly Rule[],
  write: (text: string) => void,
): Promise<number> {
  const handle = await open(filePath, 'r');
  const lines = createInterface({ input: handle.createReadStream(), crlfDelay: Infinity });

  let matched = 0;
  try {
    for await (const report of testRules(lines, rules)) {
      write(formatReport(report));
      matched++;
    }
  } finally {
    lines.close();
    await handle.close();
  }
  return matched;
}
