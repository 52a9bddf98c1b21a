import type { LogRecord } from '../record.js';
import { compileTemplate } from '../template.js';
import type { Action, ActionContext } from './types.js';
import { createVariableLookup } from './types.js';

/** Replace action: the rendered template becomes the outgoing payload. */
export function createReplaceAction(source: string): Action {
  const template = compileTemplate(source);

  return {
    type: 'replace',
    variables: template.variables,

    apply(record: LogRecord, context: ActionContext): void {
      record.replacement = template.render(createVariableLookup(record, context));
    },
  };
}
