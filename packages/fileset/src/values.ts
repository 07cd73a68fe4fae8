/**
 * Narrowing helpers for values that come out of YAML/JSON.
 */

/** A key/value mapping (not null, not a sequence) */
export function isMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Copy of a YAML/JSON-shaped value; sequences and mappings are copied recursively */
export function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isMapping(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, cloneValue(v)]));
  }
  return value;
}
