import { HostResolutionError, MissingVariableFieldError, TemplateError } from "@harvestkit/errors";
import { describe, expect, it } from "vitest";
import { classifyValue, resolveVariable, resolveVariables } from "../../resolver.js";
import type { VariableDeclaration } from "../../types.js";
import { TEST_HOST } from "../helpers/fixtures.js";

function resolve(
  declarations: VariableDeclaration[],
  osName = "linux",
  overrides: Record<string, unknown> = {},
) {
  return resolveVariables(declarations, osName, overrides, TEST_HOST);
}

describe("classifyValue", () => {
  it("tags strings, sequences and everything else", () => {
    expect(classifyValue("x")).toEqual({ kind: "string", value: "x" });
    expect(classifyValue([1])).toEqual({ kind: "sequence", items: [1] });
    expect(classifyValue({ a: 1 })).toEqual({ kind: "opaque", value: { a: 1 } });
    expect(classifyValue(null)).toEqual({ kind: "opaque", value: null });
  });
});

describe("resolveVariable", () => {
  const vars = { builtin: { hostname: "web-01", domain: "example.com" } };

  it("renders string values", () => {
    expect(resolveVariable(vars, "host", "{{.builtin.hostname}}")).toBe("web-01");
  });

  it("renders string elements of a sequence and keeps the rest", () => {
    expect(resolveVariable(vars, "xs", ["{{.builtin.domain}}", 5, true])).toEqual([
      "example.com",
      5,
      true,
    ]);
  });

  it("passes opaque values through untouched", () => {
    const nested = { path: "{{.builtin.hostname}}" };
    expect(resolveVariable(vars, "cfg", nested)).toBe(nested);
    expect(resolveVariable(vars, "n", 42)).toBe(42);
  });

  it("reports the failing sequence element", () => {
    let caught: unknown;
    try {
      resolveVariable(vars, "paths", ["/ok", "{{.nope}}"]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TemplateError);
    if (caught instanceof TemplateError) {
      expect(caught.variable).toBe("paths");
      expect(caught.template).toBe("{{.nope}}");
      expect(caught.reason).toBe('array element 1: map has no entry for key "nope"');
      expect(caught.message).toBe(
        'Template evaluation failed on variable paths: array element 1: map has no entry for key "nope"',
      );
    }
  });
});

describe("resolveVariables", () => {
  it("seeds the builtin variables", () => {
    expect(resolve([])).toEqual({
      builtin: { hostname: "web-01", domain: "example.com" },
    });
  });

  it("uses the default when no OS override matches", () => {
    const vars = resolve([{ name: "path", default: "/var/log", os: { darwin: "/usr/local/var/log" } }]);
    expect(vars["path"]).toBe("/var/log");
  });

  it("prefers the OS-specific value for the current OS", () => {
    const vars = resolve(
      [{ name: "path", default: "/var/log", os: { darwin: "/usr/local/var/log" } }],
      "darwin",
    );
    expect(vars["path"]).toBe("/usr/local/var/log");
  });

  it("matches the OS name exactly", () => {
    const vars = resolve([{ name: "path", default: "a", os: { Darwin: "b" } }], "darwin");
    expect(vars["path"]).toBe("a");
  });

  it("applies an OS override whose value is null", () => {
    const vars = resolve([{ name: "path", default: "a", os: { linux: null } }]);
    expect(vars["path"]).toBeNull();
  });

  it("lets later variables reference earlier ones", () => {
    const vars = resolve([
      { name: "dir", default: "/var/log/{{.builtin.hostname}}" },
      { name: "file", default: "{{.dir}}/access.log" },
    ]);
    expect(vars["file"]).toBe("/var/log/web-01/access.log");
  });

  it("fails on a forward reference", () => {
    expect(() =>
      resolve([
        { name: "file", default: "{{.dir}}/access.log" },
        { name: "dir", default: "/var/log" },
      ]),
    ).toThrow('Template evaluation failed on variable file: map has no entry for key "dir"');
  });

  it("applies overrides last without templating them", () => {
    const vars = resolve(
      [
        { name: "dir", default: "/var/log" },
        { name: "file", default: "{{.dir}}/a.log" },
      ],
      "linux",
      { dir: "{{.builtin.hostname}}", extra: 1 },
    );
    expect(vars["dir"]).toBe("{{.builtin.hostname}}");
    expect(vars["file"]).toBe("/var/log/a.log");
    expect(vars["extra"]).toBe(1);
  });

  it("override wins over an OS-specific value", () => {
    const vars = resolve([{ name: "p", default: "a", os: { linux: "b" } }], "linux", { p: "c" });
    expect(vars["p"]).toBe("c");
  });

  it("requires a string name", () => {
    expect(() => resolve([{ default: "x" }])).toThrow(MissingVariableFieldError);
    expect(() => resolve([{ name: 3, default: "x" }])).toThrow(
      "Variable at index 0 doesn't have a string 'name' key",
    );
  });

  it("requires a default", () => {
    expect(() => resolve([{ name: "a", default: "1" }, { name: "b" }])).toThrow(
      "Variable b doesn't have a 'default' key",
    );
  });

  it("propagates host lookup failures", () => {
    const failing = {
      hostname: () => {
        throw new Error("EPERM");
      },
    };
    expect(() => resolveVariables([], "linux", {}, failing)).toThrow(HostResolutionError);
  });
});
