/**
 * Variable resolution for fileset manifests.
 *
 * Declarations are resolved strictly in manifest order. Each value is
 * treated as a template that can refer to the builtin variables and to
 * any variable declared before it; a reference to a later declaration
 * fails as a missing field. Caller overrides are applied last and are
 * never templated.
 */

import { MissingVariableFieldError, TemplateError } from "@harvestkit/errors";

import { getBuiltinVars, osHostInfo } from "./builtin.js";
import { applyTemplate } from "./template.js";
import type { HostInfoProvider, VarValue, VariableDeclaration, VariableEnvironment } from "./types.js";
import { isMapping } from "./values.js";

/**
 * Tags a raw value with the shape that decides how it is resolved.
 */
export function classifyValue(value: unknown): VarValue {
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  if (Array.isArray(value)) {
    return { kind: "sequence", items: value };
  }
  return { kind: "opaque", value };
}

/**
 * Resolves a single value against the variables resolved so far.
 *
 * @param name - variable being resolved, for error context
 * @throws {TemplateError} naming the variable (and element index for sequences)
 */
export function resolveVariable(
  vars: VariableEnvironment,
  name: string,
  value: unknown,
): unknown {
  const classified = classifyValue(value);
  switch (classified.kind) {
    case "string":
      return renderFor(vars, name, classified.value);
    case "sequence":
      return classified.items.map((item, index) =>
        typeof item === "string" ? renderFor(vars, name, item, index) : item,
      );
    case "opaque":
      return classified.value;
    default: {
      const unreachable: never = classified;
      return unreachable;
    }
  }
}

function renderFor(
  vars: VariableEnvironment,
  name: string,
  template: string,
  index?: number,
): string {
  try {
    return applyTemplate(vars, template);
  } catch (error: unknown) {
    if (error instanceof TemplateError) {
      const reason = index === undefined ? error.reason : `array element ${index}: ${error.reason}`;
      throw new TemplateError(template, reason, { variable: name, cause: error });
    }
    throw error;
  }
}

/**
 * OS-specific replacement for a declaration's default, if the
 * declaration has an `os` mapping with an entry for exactly `osName`.
 */
function osOverride(declaration: VariableDeclaration, osName: string): { value: unknown } | undefined {
  const osValues = declaration["os"];
  if (!isMapping(osValues) || !Object.hasOwn(osValues, osName)) {
    return undefined;
  }
  return { value: osValues[osName] };
}

/**
 * Builds the variable environment for a fileset.
 *
 * 1. `builtin` is seeded from the host
 * 2. each declaration's default (or OS override) is resolved in order and
 *    becomes visible to later declarations
 * 3. `overrides` replace resolved values verbatim
 *
 * Nothing is returned if any step fails.
 *
 * @throws {MissingVariableFieldError} when a declaration lacks `name` or `default`
 * @throws {TemplateError} when a value cannot be rendered
 * @throws {HostResolutionError} when the host name is unavailable
 */
export function resolveVariables(
  declarations: readonly VariableDeclaration[],
  osName: string,
  overrides: Readonly<Record<string, unknown>> = {},
  hostInfo: HostInfoProvider = osHostInfo,
): VariableEnvironment {
  const vars = new Map<string, unknown>([["builtin", getBuiltinVars(hostInfo)]]);

  declarations.forEach((declaration, index) => {
    const name = declaration["name"];
    if (typeof name !== "string") {
      throw new MissingVariableFieldError("name", index);
    }
    if (!Object.hasOwn(declaration, "default")) {
      throw new MissingVariableFieldError("default", index, name);
    }

    const override = osOverride(declaration, osName);
    const value = override !== undefined ? override.value : declaration["default"];
    vars.set(name, resolveVariable(Object.fromEntries(vars), name, value));
  });

  for (const [name, value] of Object.entries(overrides)) {
    vars.set(name, value);
  }

  return Object.fromEntries(vars);
}
