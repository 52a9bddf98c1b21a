import type { JsonPrimitive, JsonValue } from './json.js';
import { isJsonObject } from './json.js';

/** Placeholders resolved from run-time values rather than from the record. */
export const BUILTIN_VARIABLES = ['version', 'iso8601'] as const;

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/** Resolves a placeholder name; `undefined` renders as the empty string. */
export type VariableLookup = (name: string) => string | undefined;

type TemplatePart =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'variable'; readonly name: string };

/**
 * A string with `{{name}}` placeholders, split into parts once at load
 * so rendering on the hot path is a single pass with no regex work.
 */
export interface Template {
  readonly source: string;
  /** Distinct placeholder names, in order of first appearance. */
  readonly variables: readonly string[];
  render(lookup: VariableLookup): string;
}

export function compileTemplate(source: string): Template {
  const parts: TemplatePart[] = [];
  const variables: string[] = [];
  let last = 0;

  for (const match of source.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    const name = match[1] ?? '';
    if (index > last) {
      parts.push({ kind: 'text', text: source.slice(last, index) });
    }
    parts.push({ kind: 'variable', name });
    if (!variables.includes(name)) variables.push(name);
    last = index + (match[0] ?? '').length;
  }

  if (last < source.length) {
    parts.push({ kind: 'text', text: source.slice(last) });
  }

  // No placeholders: render is the identity.
  if (variables.length === 0) {
    return { source, variables, render: () => source };
  }

  return {
    source,
    variables,
    render(lookup: VariableLookup): string {
      let out = '';
      for (const part of parts) {
        out += part.kind === 'text' ? part.text : (lookup(part.name) ?? '');
      }
      return out;
    },
  };
}

type FragmentNode =
  | { readonly kind: 'literal'; readonly value: JsonPrimitive }
  | { readonly kind: 'text'; readonly template: Template }
  | { readonly kind: 'array'; readonly items: readonly FragmentNode[] }
  | { readonly kind: 'object'; readonly entries: ReadonlyArray<readonly [string, FragmentNode]> };

/**
 * A structured fragment whose string leaves are templates.
 * Expansion always builds a fresh tree, so the compiled fragment is
 * never aliased into a record.
 */
export interface TemplateFragment {
  readonly variables: readonly string[];
  expand(lookup: VariableLookup): JsonValue;
}

export function compileFragment(value: JsonValue): TemplateFragment {
  const variables: string[] = [];
  const root = compileNode(value, variables);
  return {
    variables,
    expand: (lookup) => expandNode(root, lookup),
  };
}

function compileNode(value: JsonValue, variables: string[]): FragmentNode {
  if (typeof value === 'string') {
    const template = compileTemplate(value);
    for (const name of template.variables) {
      if (!variables.includes(name)) variables.push(name);
    }
    return template.variables.length === 0
      ? { kind: 'literal', value }
      : { kind: 'text', template };
  }
  if (Array.isArray(value)) {
    return { kind: 'array', items: value.map((item) => compileNode(item, variables)) };
  }
  if (isJsonObject(value)) {
    return {
      kind: 'object',
      entries: Object.entries(value).map(([key, child]) => [key, compileNode(child, variables)] as const),
    };
  }
  return { kind: 'literal', value };
}

function expandNode(node: FragmentNode, lookup: VariableLookup): JsonValue {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'text':
      return node.template.render(lookup);
    case 'array':
      return node.items.map((item) => expandNode(item, lookup));
    case 'object': {
      const out: Record<string, JsonValue> = {};
      for (const [key, child] of node.entries) {
        Object.defineProperty(out, key, {
          value: expandNode(child, lookup),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}

/** UTC wall-clock time with second precision, e.g. `2024-01-01T00:00:00Z`. */
export function formatIso8601(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
