import { FilesetConfigError } from "@harvestkit/errors";
import { describe, expect, it } from "vitest";
import { parseModuleConfig } from "../../module.js";
import { FilesetConfigSchema, ManifestSchema, ModuleConfigSchema } from "../../schema.js";

describe("ManifestSchema", () => {
  it("maps snake_case keys to the manifest shape", () => {
    const result = ManifestSchema.parse({
      module_version: "1.0",
      var: [{ name: "a", default: "x" }],
      ingest_pipeline: "ingest/default.json",
      prospector: "config/a.yml",
    });
    expect(result).toEqual({
      moduleVersion: "1.0",
      vars: [{ name: "a", default: "x" }],
      ingestPipeline: "ingest/default.json",
      prospector: "config/a.yml",
    });
  });

  it("defaults module_version and treats a null var list as empty", () => {
    const result = ManifestSchema.parse({ var: null, ingest_pipeline: "a", prospector: "b" });
    expect(result.moduleVersion).toBe("");
    expect(result.vars).toEqual([]);
  });

  it("rejects an empty path template", () => {
    expect(ManifestSchema.safeParse({ ingest_pipeline: "", prospector: "b" }).success).toBe(false);
  });
});

describe("FilesetConfigSchema", () => {
  it("fills defaults", () => {
    expect(FilesetConfigSchema.parse({})).toEqual({ enabled: true, var: {}, prospector: {} });
  });

  it("rejects a non-boolean enabled flag", () => {
    expect(FilesetConfigSchema.safeParse({ enabled: "yes" }).success).toBe(false);
  });
});

describe("ModuleConfigSchema", () => {
  it("fills defaults for the module and each fileset", () => {
    expect(ModuleConfigSchema.parse({ module: "nginx", filesets: { access: {} } })).toEqual({
      module: "nginx",
      enabled: true,
      filesets: { access: { enabled: true, var: {}, prospector: {} } },
    });
  });
});

describe("parseModuleConfig", () => {
  it("returns the validated config", () => {
    const config = parseModuleConfig({
      module: "nginx",
      filesets: { error: { var: { paths: ["/tmp/error.log"] } } },
    });
    expect(config.filesets?.["error"]?.var).toEqual({ paths: ["/tmp/error.log"] });
    expect(config.enabled).toBe(true);
  });

  it("lists each problem with its path", () => {
    try {
      parseModuleConfig({ module: "", filesets: { access: { enabled: "no" } } });
      expect.fail("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(FilesetConfigError);
      if (error instanceof FilesetConfigError) {
        expect(error.problems).toEqual([
          "module: String must contain at least 1 character(s)",
          "filesets.access.enabled: Expected boolean, received string",
        ]);
        expect(error.issues).toHaveLength(2);
      }
    }
  });

  it("rejects a missing module name", () => {
    expect(() => parseModuleConfig({})).toThrow("Invalid module config:\n  - module: Required");
  });
});
