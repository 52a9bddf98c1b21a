import type { Logger } from 'pino';
import type { EnvelopeSubmitter } from '../domain/index.js';
import { LogRecord, toEnvelope } from '../domain/index.js';
import type { Metrics } from './metrics.js';
import type { RuleSet } from './rule-set.js';
import { parseSyslogLine } from './syslog-parser.js';

export interface PipelineDeps {
  readonly ruleSet: RuleSet;
  readonly dispatcher: EnvelopeSubmitter;
  readonly metrics: Metrics;
  readonly log: Logger;
}

/** Processes one inbound line through to dispatcher admission. */
export type LineHandler = (line: Buffer) => Promise<void>;

/**
 * Builds a record from a raw line. RFC 5424 lines get their header
 * fields; anything else is routed with the whole line as `msg`.
 */
export function toRecord(line: Buffer): { record: LogRecord; syslog: boolean } {
  const text = line.toString('utf8');
  const fields = parseSyslogLine(text);
  return {
    record: new LogRecord(line, fields ?? { msg: text }),
    syslog: fields !== undefined,
  };
}

/**
 * Per-line hot path:
 * 1. parse the line into a record
 * 2. evaluate the rule set (mutates the record, resolves the topic)
 * 3. submit the envelope; this resolves once admitted, blocks while the
 *    dispatcher buffer is full
 *
 * A rejected submission (dispatcher closed) propagates to the caller,
 * which owns accounting for the lost line.
 */
export function createLinePipeline(deps: PipelineDeps): LineHandler {
  const { ruleSet, dispatcher, metrics, log } = deps;

  return async (line: Buffer): Promise<void> => {
    const { record, syslog } = toRecord(line);
    metrics.increment('lines');
    if (!syslog) {
      metrics.increment('lines.unparsed');
    }

    const evaluation = ruleSet.evaluateDetailed(record);
    if (evaluation.matchedRules.length > 0) {
      metrics.increment('rules.matched', evaluation.matchedRules.length);
    }
    if (evaluation.stopped) {
      metrics.increment('records.stopped');
    }

    log.debug(
      { topic: evaluation.topic, matchedRules: evaluation.matchedRules, stopped: evaluation.stopped },
      'Record evaluated',
    );

    await dispatcher.submit(toEnvelope(record, evaluation.topic));
  };
}
