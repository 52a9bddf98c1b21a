import type { Rule } from '../domain/index.js';
import { toRecord } from './pipeline.js';

/** A rule that matched a tested line. */
export interface RuleHit {
  readonly index: number;
  readonly kind: 'query' | 'pattern';
  readonly source: string;
}

export interface LineReport {
  readonly lineNumber: number;
  readonly hits: readonly RuleHit[];
}

/**
 * Dry-runs every matcher against each line, without applying actions,
 * and yields a report for each line that at least one rule matches.
 *
 * Unlike live evaluation, a stop does not hide later rules: the point is
 * to show every rule a line would trip.
 */
export async function* testRules(
  lines: AsyncIterable<string> | Iterable<string>,
  rules: readonly Rule[],
): AsyncGenerator<LineReport> {
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    const { record } = toRecord(Buffer.from(line, 'utf8'));
    const hits: RuleHit[] = [];

    for (const [index, rule] of rules.entries()) {
      if (rule.matcher.evaluate(record).matched) {
        hits.push({ index, kind: rule.matcher.kind, source: rule.matcher.source });
      }
    }

    if (hits.length > 0) {
      yield { lineNumber, hits };
    }
  }
}

/** Human-readable form of a report, one rule per line. */
export function formatReport(report: LineReport): string {
  const lines = [`Line ${report.lineNumber} matches on:`];
  for (const hit of report.hits) {
    lines.push(`\t - [${hit.index}] ${hit.kind} ${hit.source}`);
  }
  return lines.join('\n');
}
