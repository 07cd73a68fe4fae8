import { sep } from "node:path";
import { describe, expect, it } from "vitest";
import { formatPipelineID, removeExt } from "../../pipeline-id.js";

describe("removeExt", () => {
  it.each([
    ["a.json", "a"],
    ["a.b.json", "a.b"],
    ["noext", "noext"],
    [".hidden", ""],
    ["dir.d/file", "dir.d/file"],
    ["ingest/pipeline.json", "ingest/pipeline"],
  ])("removeExt(%s) is %s", (input, expected) => {
    expect(removeExt(input)).toBe(expected);
  });

  it.runIf(sep === "/")("treats a backslash as part of the name on POSIX", () => {
    expect(removeExt("a.b\\c")).toBe("a");
  });

  it.runIf(sep === "\\")("treats a backslash as a separator on Windows", () => {
    expect(removeExt("a.b\\c")).toBe("a.b\\c");
  });
});

describe("formatPipelineID", () => {
  it("joins module, fileset and the pipeline file name", () => {
    expect(formatPipelineID("nginx", "access", "ingest/default.json")).toBe("nginx-access-default");
  });

  it("uses only the base name of the path", () => {
    expect(formatPipelineID("mysql", "slowlog", "ingest/v2.x/pipeline.json")).toBe(
      "mysql-slowlog-pipeline",
    );
  });
});
