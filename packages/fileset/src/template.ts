/**
 * Template execution against a variable environment.
 *
 * Missing fields are errors rather than empty output, so a typo in a
 * manifest or a reference to a variable declared later fails loudly.
 */

import { TemplateError } from "@harvestkit/errors";

import { type Operand, type ParsedTemplate, parseTemplate, type TemplateNode } from "./template-parser.js";
import { isMapping } from "./values.js";

interface Scope {
  readonly dot: unknown;
  readonly root: unknown;
  readonly variables: ReadonlyMap<string, unknown>;
}

function typeName(value: unknown): string {
  if (value === null || value === undefined) {
    return "nil";
  }
  if (Array.isArray(value)) {
    return "sequence";
  }
  return typeof value;
}

/**
 * Truthiness of a value for `if` / `with`: false, 0, "", null and empty
 * collections are false.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isMapping(value)) {
    return Object.keys(value).length > 0;
  }
  return value !== false && value !== 0 && value !== "";
}

/**
 * Text form of a value. Sequences print as `[a b]` and mappings as
 * `map[k:v]` with sorted keys; a null at the top level prints nothing.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  return formatNested(value);
}

function formatNested(value: unknown): string {
  if (value === null || value === undefined) {
    return "<nil>";
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatNested).join(" ")}]`;
  }
  if (isMapping(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${key}:${formatNested(value[key])}`);
    return `map[${entries.join(" ")}]`;
  }
  return String(value);
}

class Executor {
  private output = "";

  constructor(private readonly source: string) {}

  run(nodes: readonly TemplateNode[], scope: Scope): string {
    this.walk(nodes, scope);
    return this.output;
  }

  private walk(nodes: readonly TemplateNode[], scope: Scope): void {
    for (const node of nodes) {
      switch (node.type) {
        case "text":
          this.output += node.text;
          break;
        case "output":
          this.output += formatValue(this.evaluate(node.operand, scope));
          break;
        case "if": {
          const value = this.evaluate(node.operand, scope);
          this.walk(isTruthy(value) ? node.body : node.elseBody, scope);
          break;
        }
        case "with": {
          const value = this.evaluate(node.operand, scope);
          if (isTruthy(value)) {
            this.walk(node.body, { ...scope, dot: value });
          } else {
            this.walk(node.elseBody, scope);
          }
          break;
        }
        case "range":
          this.range(node, scope);
          break;
        default: {
          const unreachable: never = node;
          throw new TemplateError(this.source, `unknown node ${String(unreachable)}`);
        }
      }
    }
  }

  private range(node: Extract<TemplateNode, { type: "range" }>, scope: Scope): void {
    const collection = this.evaluate(node.operand, scope);
    let entries: Array<[string | number, unknown]>;
    if (collection === null || collection === undefined) {
      entries = [];
    } else if (Array.isArray(collection)) {
      entries = collection.map((item, index): [number, unknown] => [index, item]);
    } else if (isMapping(collection)) {
      entries = Object.keys(collection)
        .sort()
        .map((key): [string, unknown] => [key, collection[key]]);
    } else {
      this.fail(`range can't iterate over ${formatValue(collection)}`);
    }

    if (entries.length === 0) {
      this.walk(node.elseBody, scope);
      return;
    }

    for (const [key, item] of entries) {
      const variables = new Map(scope.variables);
      if (node.keyVar !== undefined) {
        variables.set(node.keyVar, key);
      }
      if (node.valueVar !== undefined) {
        variables.set(node.valueVar, item);
      }
      this.walk(node.body, { dot: item, root: scope.root, variables });
    }
  }

  private evaluate(operand: Operand, scope: Scope): unknown {
    switch (operand.type) {
      case "literal":
        return operand.value;
      case "field":
        return this.lookup(scope.dot, operand.path);
      case "variable": {
        if (operand.name === "") {
          return this.lookup(scope.root, operand.path);
        }
        if (!scope.variables.has(operand.name)) {
          this.fail(`undefined variable "$${operand.name}"`);
        }
        return this.lookup(scope.variables.get(operand.name), operand.path);
      }
    }
  }

  private lookup(start: unknown, path: readonly string[]): unknown {
    let current = start;
    for (const segment of path) {
      if (!isMapping(current)) {
        this.fail(`can't evaluate field ${segment} in type ${typeName(current)}`);
      }
      if (!Object.hasOwn(current, segment)) {
        this.fail(`map has no entry for key "${segment}"`);
      }
      current = current[segment];
    }
    return current;
  }

  private fail(reason: string): never {
    throw new TemplateError(this.source, reason);
  }
}

/**
 * Renders a parsed template with `data` as both the root and initial
 * context.
 *
 * @throws {TemplateError} when a field or variable cannot be resolved
 */
export function executeTemplate(template: ParsedTemplate, data: unknown): string {
  return new Executor(template.source).run(template.nodes, {
    dot: data,
    root: data,
    variables: new Map(),
  });
}

/**
 * Parses and renders `source` against `vars`. Strings without any
 * action are returned as-is.
 *
 * @throws {TemplateError} on parse or evaluation failure
 */
export function applyTemplate(vars: Readonly<Record<string, unknown>>, source: string): string {
  if (!source.includes("{{")) {
    return source;
  }
  return executeTemplate(parseTemplate(source), vars);
}
