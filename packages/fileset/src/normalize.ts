/**
 * Sugar syntax normalizer for variable declarations.
 *
 * Manifests may spell OS overrides as dotted keys (`os.darwin: ...`)
 * instead of a nested `os:` mapping. Both forms are folded into a single
 * `os` mapping; an entry in the nested form wins over the dotted one.
 * Always returns a new object — never mutates the input.
 */

import type { VariableDeclaration } from "./types.js";
import { isMapping } from "./values.js";

const OS_KEY_PREFIX = "os.";

export function normalizeVariableDeclaration(
  declaration: Readonly<Record<string, unknown>>,
): VariableDeclaration {
  const result: Record<string, unknown> = {};
  const osValues: Record<string, unknown> = {};
  let hasOs = false;

  for (const [key, value] of Object.entries(declaration)) {
    if (key.startsWith(OS_KEY_PREFIX) && key.length > OS_KEY_PREFIX.length) {
      osValues[key.slice(OS_KEY_PREFIX.length)] = value;
      hasOs = true;
    } else if (key !== "os") {
      result[key] = value;
    }
  }

  const nested = declaration["os"];
  if (isMapping(nested)) {
    Object.assign(osValues, nested);
    hasOs = true;
  } else if (nested !== undefined) {
    result["os"] = nested;
  }

  if (hasOs) {
    result["os"] = osValues;
  }
  return result;
}
