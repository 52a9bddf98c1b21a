export type { Matcher, MatcherKind, MatchResult, Captures } from './types.js';
export { NO_MATCH } from './types.js';
export { createQueryMatcher, compileQueryPath, resolvePath } from './query.js';
export type { PathStep } from './query.js';
export { createPatternMatcher, namedGroups } from './pattern.js';
