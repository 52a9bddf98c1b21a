import type { JsonValue } from '../json.js';
import type { LogRecord } from '../record.js';
import { PAYLOAD_FIELD } from '../record.js';
import { compileFragment } from '../template.js';
import { deepMerge } from './deep-merge.js';
import type { Action, ActionContext } from './types.js';
import { createVariableLookup } from './types.js';

/**
 * Merge action: expands the template fragment and deep-merges it into
 * the record's structured view.
 *
 * The base is the current structured view, else the parsed `msg` when
 * it is valid JSON, else a fresh empty object.
 */
export function createMergeAction(json: JsonValue): Action {
  const fragment = compileFragment(json);

  return {
    type: 'merge',
    variables: fragment.variables,

    apply(record: LogRecord, context: ActionContext): void {
      const expanded = fragment.expand(createVariableLookup(record, context));
      const base = record.structuredField(PAYLOAD_FIELD) ?? {};
      record.structured = deepMerge(base, expanded);
    },
  };
}
