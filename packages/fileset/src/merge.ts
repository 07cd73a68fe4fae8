/**
 * Deep merge of caller overrides into a materialized config.
 */

import { OverrideMergeError } from "@harvestkit/errors";

import type { ConfigObject } from "./types.js";
import { cloneValue, isMapping } from "./values.js";

const FORBIDDEN_KEYS = new Set(["__proto__", "constructor", "prototype"]);

function mergeInto(target: ConfigObject, overrides: Readonly<ConfigObject>, keyPath: string): void {
  for (const [key, value] of Object.entries(overrides)) {
    const childPath = keyPath ? `${keyPath}.${key}` : key;
    if (FORBIDDEN_KEYS.has(key)) {
      throw new OverrideMergeError(`key '${key}' is not allowed`, childPath);
    }

    if (isMapping(value)) {
      const existing = target[key];
      const merged: ConfigObject = isMapping(existing) ? { ...existing } : {};
      mergeInto(merged, value, childPath);
      target[key] = merged;
    } else {
      target[key] = cloneValue(value);
    }
  }
}

/**
 * Returns `base` with `overrides` applied: nested mappings are merged key
 * by key, anything else in `overrides` (scalars, sequences) replaces the
 * base value. Neither input is modified.
 *
 * @throws {OverrideMergeError} if `overrides` is not a mapping or contains
 *   a prototype-polluting key
 */
export function mergeConfigs(base: Readonly<ConfigObject>, overrides: unknown): ConfigObject {
  if (!isMapping(overrides)) {
    throw new OverrideMergeError("override document must be a mapping");
  }
  const result: ConfigObject = { ...base };
  mergeInto(result, overrides, "");
  return result;
}
