/**
 * JSON value model shared by matchers, merge templates and envelopes.
 *
 * Structured views are produced by `JSON.parse` and by merge templates
 * loaded from YAML, so only plain JSON shapes ever appear here.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Plain-object check; arrays and null do not count. */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses text as JSON; `undefined` on any syntax error. */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}
