import { describe, expect, it } from "vitest";
import { deepFreeze } from "../../freeze.js";

describe("deepFreeze", () => {
  it("freezes nested objects and arrays", () => {
    const value = { vars: [{ name: "a", os: { linux: ["x"] } }] };
    const frozen = deepFreeze(value);

    expect(frozen).toBe(value);
    expect(Object.isFrozen(frozen.vars)).toBe(true);
    expect(Object.isFrozen(frozen.vars[0]?.os)).toBe(true);
    expect(Object.isFrozen(frozen.vars[0]?.os.linux)).toBe(true);
  });

  it("returns primitives unchanged", () => {
    expect(deepFreeze("x")).toBe("x");
    expect(deepFreeze(null)).toBeNull();
  });

  it("terminates on cycles", () => {
    const a: { self?: unknown } = {};
    a.self = a;
    expect(Object.isFrozen(deepFreeze(a))).toBe(true);
  });
});
