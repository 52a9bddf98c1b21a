import type { LogRecord } from '../record.js';
import { compileTemplate } from '../template.js';
import type { Action, ActionContext } from './types.js';
import { createVariableLookup } from './types.js';

/**
 * Forward action: routes the record to the rendered topic.
 *
 * A later forward overrides an earlier one. If every placeholder renders
 * empty and the topic comes out blank, the current destination is kept.
 */
export function createForwardAction(topic: string): Action {
  const template = compileTemplate(topic);

  return {
    type: 'forward',
    variables: template.variables,

    apply(record: LogRecord, context: ActionContext): void {
      const rendered = template.render(createVariableLookup(record, context)).trim();
      if (rendered !== '') {
        record.destinationTopic = rendered;
      }
    },
  };
}
