import type { LogRecord } from '../record.js';
import type { Action } from './types.js';

const STOP: Action = {
  type: 'stop',
  variables: [],
  apply(record: LogRecord): void {
    record.terminated = true;
  },
};

/** Stop action: ends rule evaluation for the record. */
export function createStopAction(): Action {
  return STOP;
}
