import type { JsonValue } from '../json.js';
import { isJsonObject } from '../json.js';

/**
 * Deep-merges `patch` into `target` and returns the result.
 *
 * Objects unify key by key, recursively, mutating `target` in place.
 * Every other patch value (scalar, array, null) replaces the target value
 * outright; arrays are never concatenated. When `target` is not an object
 * the patch itself is returned.
 *
 * Key order is the target's insertion order followed by new patch keys in
 * the patch's order, so the result is deterministic for fixed inputs.
 */
export function deepMerge(target: JsonValue, patch: JsonValue): JsonValue {
  if (!isJsonObject(target) || !isJsonObject(patch)) {
    return patch;
  }

  for (const key of Object.keys(patch)) {
    const incoming = patch[key];
    if (incoming === undefined) continue;

    const existing = Object.hasOwn(target, key) ? target[key] : undefined;
    const merged = existing === undefined ? incoming : deepMerge(existing, incoming);

    // defineProperty keeps a `__proto__` key an own data property
    Object.defineProperty(target, key, {
      value: merged,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  return target;
}
