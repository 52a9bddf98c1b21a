import type { FieldName, LogRecord } from '../record.js';

/** Values captured by a successful match, exposed to action templates. */
export type Captures = Readonly<Record<string, string>>;

/**
 * Result of evaluating a matcher against a record.
 *
 * `matched === false` carries nothing; a match carries its captures
 * (possibly empty).
 */
export type MatchResult =
  | { readonly matched: false }
  | { readonly matched: true; readonly captures: Captures };

export type MatcherKind = 'query' | 'pattern';

/**
 * A predicate over one field of a record.
 *
 * Matchers are compiled once at configuration load and are immutable
 * afterwards, so a single instance is safely shared by every connection.
 * `evaluate` never throws for record content.
 */
export interface Matcher {
  readonly kind: MatcherKind;
  readonly field: FieldName;
  /** The configured expression, for logs and the rule tester. */
  readonly source: string;
  /** Names this matcher may put into `captures`. */
  readonly captureNames: readonly string[];
  evaluate(record: LogRecord): MatchResult;
}

export const NO_MATCH: MatchResult = { matched: false };
