/**
 * Deep freeze for parsed manifests, which are immutable once loaded.
 */

/**
 * Recursively freezes an object and all nested objects/arrays in place.
 * Already-frozen subtrees are skipped, which also terminates on cycles.
 * Returns the same reference.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
