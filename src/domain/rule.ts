import type { Matcher } from './matchers/types.js';
import type { Action } from './actions/types.js';

/**
 * An ordered (matcher, actions) pair. Immutable after configuration load.
 */
export interface Rule {
  readonly matcher: Matcher;
  readonly actions: readonly Action[];
}
