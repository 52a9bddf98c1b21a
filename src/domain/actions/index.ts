export type { Action, ActionType, ActionContext } from './types.js';
export { createVariableLookup } from './types.js';
export { deepMerge } from './deep-merge.js';
export { createMergeAction } from './merge.js';
export { createStopAction } from './stop.js';
export { createForwardAction } from './forward.js';
export { createReplaceAction } from './replace.js';
