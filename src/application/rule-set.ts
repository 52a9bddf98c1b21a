import type { LogRecord, Rule } from '../domain/index.js';

export interface RuleSetOptions {
  /** Topic for records no forward action routed elsewhere. */
  readonly defaultTopic: string;
  /** Build version exposed to templates as `{{version}}`. */
  readonly version: string;
  /** Clock for `{{iso8601}}`; injectable for deterministic tests. */
  readonly now?: () => Date;
}

/** Outcome of one evaluation pass over a record. */
export interface Evaluation {
  readonly topic: string;
  /** Indices (into the rule list) of every rule whose matcher matched. */
  readonly matchedRules: readonly number[];
  /** True when a stop action ended evaluation early. */
  readonly stopped: boolean;
}

/**
 * Ordered rule list plus the default topic; owns the evaluation loop.
 *
 * Immutable after construction, so one instance is shared by every
 * connection. All per-record state lives on the `LogRecord`.
 *
 * Evaluation:
 * 1. Rules run top to bottom; a terminated record ends the loop.
 * 2. A non-matching rule is skipped.
 * 3. A matching rule applies its actions in order; a stop ends them.
 * 4. The topic is the one a forward action set, else the default.
 *
 * "matched" and "terminated" stay separate: a rule may merge without
 * stopping, letting later rules match and contribute too.
 */
export class RuleSet {
  private readonly rules: readonly Rule[];
  private readonly options: Required<RuleSetOptions>;

  constructor(rules: readonly Rule[], options: RuleSetOptions) {
    this.rules = [...rules];
    this.options = {
      defaultTopic: options.defaultTopic,
      version: options.version,
      now: options.now ?? (() => new Date()),
    };
  }

  get size(): number {
    return this.rules.length;
  }

  get defaultTopic(): string {
    return this.options.defaultTopic;
  }

  /** The compiled rules, in evaluation order. */
  list(): readonly Rule[] {
    return this.rules;
  }

  /** Evaluates the record and returns its destination topic. */
  evaluate(record: LogRecord): string {
    return this.evaluateDetailed(record).topic;
  }

  /** Same pass as `evaluate()`, also reporting which rules matched. */
  evaluateDetailed(record: LogRecord): Evaluation {
    const matchedRules: number[] = [];

    for (const [index, rule] of this.rules.entries()) {
      if (record.terminated) break;

      const result = rule.matcher.evaluate(record);
      if (!result.matched) continue;

      matchedRules.push(index);
      const context = {
        captures: result.captures,
        version: this.options.version,
        now: this.options.now,
      };

      for (const action of rule.actions) {
        action.apply(record, context);
        if (record.terminated) break;
      }
    }

    const topic = record.destinationTopic ?? this.options.defaultTopic;
    record.destinationTopic = topic;

    return {
      topic,
      matchedRules,
      stopped: record.terminated,
    };
  }
}
