import { ConfigError } from '../errors.js';
import type { FieldName, LogRecord } from '../record.js';
import type { Matcher, MatchResult } from './types.js';
import { NO_MATCH } from './types.js';

// `(?<name>` but not lookbehind `(?<=` / `(?<!`, and not an escaped paren
const NAMED_GROUP = /(?<!\\)\(\?<([A-Za-z_$][A-Za-z0-9_$]*)>/g;

/** Named capture groups declared in a regular expression source. */
export function namedGroups(source: string): string[] {
  const names: string[] = [];
  for (const match of source.matchAll(NAMED_GROUP)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) names.push(name);
  }
  return names;
}

/**
 * Raw-text pattern matcher.
 *
 * The expression is compiled once here; an invalid expression is a
 * configuration error. Matching is unanchored (first match anywhere in
 * the field). A record without the target field does not match.
 *
 * Captures every named group that participated in the match.
 */
export function createPatternMatcher(source: string, field: FieldName): Matcher {
  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (err: unknown) {
    throw ConfigError.at('', `invalid regular expression: ${err instanceof Error ? err.message : String(err)}`);
  }

  return {
    kind: 'pattern',
    field,
    source,
    captureNames: namedGroups(source),

    evaluate(record: LogRecord): MatchResult {
      const text = record.field(field);
      if (text === undefined) return NO_MATCH;

      const match = regex.exec(text);
      if (match === null) return NO_MATCH;

      const captures: Record<string, string> = {};
      if (match.groups) {
        for (const [name, value] of Object.entries(match.groups)) {
          if (value !== undefined) captures[name] = value;
        }
      }
      return { matched: true, captures };
    },
  };
}
