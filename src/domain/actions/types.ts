import type { LogRecord } from '../record.js';
import type { Captures } from '../matchers/types.js';
import type { VariableLookup } from '../template.js';
import { formatIso8601 } from '../template.js';

export type ActionType = 'merge' | 'stop' | 'forward' | 'replace';

/**
 * Run-time values available while a matched rule's actions execute.
 * `now` is read at the moment an action runs.
 */
export interface ActionContext {
  readonly captures: Captures;
  readonly version: string;
  readonly now: () => Date;
}

/**
 * An effect applied to a matched record.
 *
 * Actions only ever touch the record they are given; they hold no
 * mutable state of their own and are shared across connections.
 */
export interface Action {
  readonly type: ActionType;
  /** Placeholder names referenced by this action's templates. */
  readonly variables: readonly string[];
  apply(record: LogRecord, context: ActionContext): void;
}

/**
 * Placeholder lookup for one action execution.
 *
 * Precedence: built-ins (`version`, `iso8601`), then matcher captures,
 * then record fields. The timestamp is taken once per execution so every
 * `{{iso8601}}` in one template renders identically.
 */
export function createVariableLookup(record: LogRecord, context: ActionContext): VariableLookup {
  let iso8601: string | undefined;
  return (name: string): string | undefined => {
    switch (name) {
      case 'version':
        return context.version;
      case 'iso8601':
        iso8601 ??= formatIso8601(context.now());
        return iso8601;
      default:
        return context.captures[name] ?? record.field(name);
    }
  };
}
