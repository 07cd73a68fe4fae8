import { describe, expect, it } from "vitest";
import {
  ExternalError,
  FilesetNotReadError,
  type HarvestError,
  HostResolutionError,
  InternalError,
  ManifestReadError,
  MissingModuleError,
  NotFoundError,
  TemplateError,
  ValidationError,
} from "../../index.js";

type BaseError = ValidationError | NotFoundError | ExternalError | InternalError;

function category(error: BaseError): string {
  switch (error._tag) {
    case "ValidationError":
      return "validation";
    case "NotFoundError":
      return "not_found";
    case "ExternalError":
      return "external";
    case "InternalError":
      return "internal";
    default: {
      const unreachable: never = error;
      throw new Error(`Unhandled error ${String(unreachable)}`);
    }
  }
}

describe("exhaustive switch on the base _tag", () => {
  it("routes fileset errors through their base _tag", () => {
    expect(category(new TemplateError("{{.x}}", "boom"))).toBe("validation");
    expect(category(new MissingModuleError("nginx", "/m/nginx"))).toBe("not_found");
    expect(category(new ManifestReadError("/m/manifest.yml"))).toBe("not_found");
    expect(category(new HostResolutionError())).toBe("external");
    expect(category(new FilesetNotReadError("access", "vars"))).toBe("internal");
  });

  it("serializes through toJSON", () => {
    const error: HarvestError = new TemplateError("{{.x}}", "boom", {
      variable: "paths",
      cause: new Error("inner"),
    });
    const json = error.toJSON();

    expect(json._tag).toBe("ValidationError");
    expect(json.name).toBe("TemplateError");
    expect(json.code).toBe("FILESET_TEMPLATE_FAILED");
    expect(json.message).toBe("Template evaluation failed on variable paths: boom");
    expect(json.metadata).toEqual({ template: "{{.x}}", variable: "paths" });
    expect(json.cause).toBe("inner");
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });
});
