import { describe, it, expect } from 'vitest';
import { deepMerge, tryParseJson } from '../../src/domain/index.js';
import type { JsonValue } from '../../src/domain/index.js';

describe('deepMerge', () => {
  it('merges nested objects key by key', () => {
    const result = deepMerge({ a: { x: 1 }, keep: true }, { a: { y: 2 }, added: 'z' });
    expect(result).toEqual({ a: { x: 1, y: 2 }, keep: true, added: 'z' });
  });

  it('replaces arrays instead of concatenating', () => {
    expect(deepMerge({ tags: [1, 2] }, { tags: [3] })).toEqual({ tags: [3] });
  });

  it('lets a scalar replace an object', () => {
    expect(deepMerge({ a: { x: 1 } }, { a: 5 })).toEqual({ a: 5 });
  });

  it('lets null replace a value', () => {
    expect(deepMerge({ a: 1 }, { a: null })).toEqual({ a: null });
  });

  it('returns the patch when the target is not an object', () => {
    expect(deepMerge('text', { a: 1 })).toEqual({ a: 1 });
    expect(deepMerge([1], { a: 1 })).toEqual({ a: 1 });
  });

  it('is idempotent for the same patch', () => {
    const patch: JsonValue = { meta: { relay: { version: '1.2.3' } } };
    const once = deepMerge({ meta: { topic: 'foo' } }, patch);
    const twice = deepMerge(deepMerge({ meta: { topic: 'foo' } }, patch), patch);

    expect(twice).toEqual(once);
  });

  it('keeps target key order and appends new keys', () => {
    const result = deepMerge({ b: 1, a: 2 }, { c: 3, a: 4 });
    expect(JSON.stringify(result)).toBe('{"b":1,"a":4,"c":3}');
  });

  it('stores a __proto__ key as plain data', () => {
    const patch = tryParseJson('{"__proto__":{"polluted":true}}');
    expect(patch).toBeDefined();

    const result = deepMerge({}, patch ?? null);

    expect(JSON.stringify(result)).toBe('{"__proto__":{"polluted":true}}');
    expect(Object.prototype).not.toHaveProperty('polluted');
  });
});
