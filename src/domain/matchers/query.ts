import type { JsonValue } from '../json.js';
import { isJsonObject } from '../json.js';
import { ConfigError } from '../errors.js';
import type { FieldName, LogRecord } from '../record.js';
import type { Matcher, MatchResult } from './types.js';
import { NO_MATCH } from './types.js';

/** One step of a compiled query path. */
export type PathStep =
  | { readonly kind: 'key'; readonly name: string }
  | { readonly kind: 'index'; readonly index: number };

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_-]/;

/**
 * Compiles a dotted query path such as `meta.topic`, `items[0].id` or
 * `labels."app.kubernetes.io/name"` into steps.
 *
 * Throws a `ConfigError` describing the first syntax problem.
 */
export function compileQueryPath(path: string): PathStep[] {
  if (path.trim() === '') {
    throw ConfigError.at('', 'query path must not be empty');
  }

  const steps: PathStep[] = [];
  let i = 0;

  const fail = (message: string): never => {
    throw ConfigError.at('', `${message} at offset ${i} in "${path}"`);
  };

  while (i < path.length) {
    // Segment name: identifier or quoted string
    const ch = path[i] ?? '';
    if (ch === '"') {
      let name = '';
      i++;
      while (i < path.length && path[i] !== '"') {
        if (path[i] === '\\' && i + 1 < path.length) i++;
        name += path[i] ?? '';
        i++;
      }
      if (i >= path.length) fail('unterminated quoted segment');
      i++; // closing quote
      if (name === '') fail('empty quoted segment');
      steps.push({ kind: 'key', name });
    } else if (IDENT_START.test(ch)) {
      const start = i;
      while (i < path.length && IDENT_PART.test(path[i] ?? '')) i++;
      steps.push({ kind: 'key', name: path.slice(start, i) });
    } else {
      fail(ch === '.' ? 'empty segment' : `unexpected character "${ch}"`);
    }

    // Zero or more [n] indices
    while (path[i] === '[') {
      const close = path.indexOf(']', i);
      if (close === -1) fail('unterminated index');
      const digits = path.slice(i + 1, close);
      if (!/^\d+$/.test(digits)) fail(`invalid index "[${digits}]"`);
      steps.push({ kind: 'index', index: Number(digits) });
      i = close + 1;
    }

    if (i < path.length) {
      if (path[i] !== '.') fail(`unexpected character "${path[i]}"`);
      i++;
      if (i >= path.length) fail('trailing dot');
    }
  }

  return steps;
}

/** Walks `steps` from `root`; `undefined` when any step is missing. */
export function resolvePath(root: JsonValue, steps: readonly PathStep[]): JsonValue | undefined {
  let current: JsonValue | undefined = root;

  for (const step of steps) {
    if (current === undefined || current === null) return undefined;
    if (step.kind === 'key') {
      if (!isJsonObject(current) || !Object.hasOwn(current, step.name)) return undefined;
      current = current[step.name];
    } else {
      if (!Array.isArray(current)) return undefined;
      current = current[step.index];
    }
  }

  return current;
}

/**
 * Structured-query matcher.
 *
 * Lazily parses the target field as JSON (memoized on the record) and
 * matches when the addressed value exists and is not null. A field that
 * is not valid JSON is a no-match, never an error.
 *
 * Captures `value`: the addressed value as text.
 */
export function createQueryMatcher(path: string, field: FieldName): Matcher {
  const steps = compileQueryPath(path);

  return {
    kind: 'query',
    field,
    source: path,
    captureNames: ['value'],

    evaluate(record: LogRecord): MatchResult {
      const view = record.structuredField(field);
      if (view === undefined) return NO_MATCH;

      const found = resolvePath(view, steps);
      if (found === undefined || found === null) return NO_MATCH;

      return {
        matched: true,
        captures: { value: typeof found === 'string' ? found : JSON.stringify(found) },
      };
    },
  };
}
