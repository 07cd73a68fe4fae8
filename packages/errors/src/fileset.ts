/**
 * Fileset errors — manifest loading, variable resolution, materialization
 *
 * Concrete:
 *   - MissingModuleError (FILESET_MODULE_NOT_FOUND)
 *   - ManifestReadError (FILESET_MANIFEST_READ_FAILED)
 *   - ManifestUnpackError (FILESET_MANIFEST_INVALID)
 *   - MissingVariableFieldError (FILESET_VARIABLE_FIELD_MISSING)
 *   - TemplateError (FILESET_TEMPLATE_FAILED)
 *   - HostResolutionError (FILESET_HOST_RESOLUTION_FAILED)
 *   - FileReadError (FILESET_FILE_READ_FAILED)
 *   - ConfigParseError (FILESET_CONFIG_PARSE_FAILED)
 *   - OverrideMergeError (FILESET_OVERRIDE_MERGE_FAILED)
 *   - FilesetConfigError (FILESET_CONFIG_INVALID)
 *   - FilesetNotReadError (FILESET_NOT_READ)
 */

import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";

function causeMessage(cause: Error | undefined): string {
  return cause ? `: ${cause.message}` : "";
}

// ---------------------------------------------------------------------------
// Module / manifest
// ---------------------------------------------------------------------------

export class MissingModuleError extends NotFoundError<"FILESET_MODULE_NOT_FOUND"> {
  constructor(
    public readonly moduleName: string,
    public readonly modulePath: string,
  ) {
    super({
      code: "FILESET_MODULE_NOT_FOUND",
      message: `Module ${moduleName} (${modulePath}) doesn't exist`,
      metadata: { moduleName, modulePath },
    });
  }
}

export class ManifestReadError extends NotFoundError<"FILESET_MANIFEST_READ_FAILED"> {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super({
      code: "FILESET_MANIFEST_READ_FAILED",
      message: `Error reading manifest file ${filePath}${causeMessage(cause)}`,
      metadata: { filePath },
      cause,
    });
  }
}

export class ManifestUnpackError extends ValidationError<"FILESET_MANIFEST_INVALID"> {
  constructor(
    public readonly filePath: string,
    public readonly problems: readonly string[],
    cause?: Error,
  ) {
    super({
      code: "FILESET_MANIFEST_INVALID",
      message: `Error unpacking manifest ${filePath}:\n${problems.map((p) => `  - ${p}`).join("\n")}`,
      metadata: { filePath },
      cause,
      issues: problems.map((p) => ({ field: "manifest", message: p, code: "MANIFEST_ISSUE" })),
    });
  }
}

// ---------------------------------------------------------------------------
// Variable resolution
// ---------------------------------------------------------------------------

export class MissingVariableFieldError extends ValidationError<"FILESET_VARIABLE_FIELD_MISSING"> {
  constructor(
    public readonly field: "name" | "default",
    public readonly index: number,
    public readonly variableName?: string,
  ) {
    super({
      code: "FILESET_VARIABLE_FIELD_MISSING",
      message:
        field === "name"
          ? `Variable at index ${index} doesn't have a string 'name' key`
          : `Variable ${variableName ?? `at index ${index}`} doesn't have a 'default' key`,
      metadata: {
        field,
        index: String(index),
        ...(variableName !== undefined ? { variableName } : {}),
      },
      issues: [
        {
          field: variableName !== undefined ? `var.${variableName}.${field}` : `var[${index}].${field}`,
          message: `'${field}' is required`,
          code: "REQUIRED",
        },
      ],
    });
  }
}

export interface TemplateErrorContext {
  /** Variable whose value was being resolved */
  readonly variable?: string | undefined;
  /** File whose path or contents were being expanded */
  readonly filePath?: string | undefined;
  readonly cause?: Error | undefined;
}

export class TemplateError extends ValidationError<"FILESET_TEMPLATE_FAILED"> {
  readonly variable: string | undefined;
  readonly filePath: string | undefined;

  constructor(
    public readonly template: string,
    public readonly reason: string,
    context: TemplateErrorContext = {},
  ) {
    const where = [
      context.variable !== undefined ? `on variable ${context.variable}` : undefined,
      context.filePath !== undefined ? `in ${context.filePath}` : undefined,
    ].filter((s): s is string => s !== undefined);
    super({
      code: "FILESET_TEMPLATE_FAILED",
      message: `Template evaluation failed${where.length > 0 ? ` ${where.join(" ")}` : ""}: ${reason}`,
      metadata: {
        template,
        ...(context.variable !== undefined ? { variable: context.variable } : {}),
        ...(context.filePath !== undefined ? { filePath: context.filePath } : {}),
      },
      cause: context.cause,
    });
    this.variable = context.variable;
    this.filePath = context.filePath;
  }
}

export class HostResolutionError extends ExternalError<"FILESET_HOST_RESOLUTION_FAILED"> {
  constructor(cause?: Error) {
    super({
      code: "FILESET_HOST_RESOLUTION_FAILED",
      message: `Error getting the hostname${cause ? causeMessage(cause) : ": empty hostname"}`,
      cause,
    });
  }
}

// ---------------------------------------------------------------------------
// Materialization
// ---------------------------------------------------------------------------

export class FileReadError extends NotFoundError<"FILESET_FILE_READ_FAILED"> {
  constructor(
    public readonly filePath: string,
    public readonly purpose: string,
    cause?: Error,
  ) {
    super({
      code: "FILESET_FILE_READ_FAILED",
      message: `Error reading ${purpose} file ${filePath}${causeMessage(cause)}`,
      metadata: { filePath, purpose },
      cause,
    });
  }
}

export class ConfigParseError extends ValidationError<"FILESET_CONFIG_PARSE_FAILED"> {
  constructor(
    public readonly filePath: string,
    public readonly format: "yaml" | "json",
    detail: string,
    public readonly line?: number | undefined,
    public readonly column?: number | undefined,
    cause?: Error,
  ) {
    const location =
      line !== undefined ? ` at line ${line}${column !== undefined ? `:${column}` : ""}` : "";
    super({
      code: "FILESET_CONFIG_PARSE_FAILED",
      message: `Error parsing ${format.toUpperCase()} in ${filePath}${location}: ${detail}`,
      metadata: { filePath, format },
      cause,
    });
  }
}

export class OverrideMergeError extends ValidationError<"FILESET_OVERRIDE_MERGE_FAILED"> {
  constructor(
    public readonly reason: string,
    public readonly keyPath: string = "",
  ) {
    super({
      code: "FILESET_OVERRIDE_MERGE_FAILED",
      message: `Error applying config overrides${keyPath ? ` at '${keyPath}'` : ""}: ${reason}`,
      metadata: { keyPath },
    });
  }
}

// ---------------------------------------------------------------------------
// Configuration / lifecycle
// ---------------------------------------------------------------------------

export class FilesetConfigError extends ValidationError<"FILESET_CONFIG_INVALID"> {
  constructor(
    public readonly problems: readonly string[],
    cause?: Error,
  ) {
    super({
      code: "FILESET_CONFIG_INVALID",
      message: `Invalid module config:\n${problems.map((p) => `  - ${p}`).join("\n")}`,
      cause,
      issues: problems.map((p) => ({ field: "config", message: p, code: "SCHEMA_ISSUE" })),
    });
  }
}

export class FilesetNotReadError extends InternalError<"FILESET_NOT_READ"> {
  constructor(
    public readonly filesetName: string,
    public readonly operation: string,
  ) {
    super({
      code: "FILESET_NOT_READ",
      message: `Fileset ${filesetName} must be read before calling ${operation}`,
      metadata: { filesetName, operation },
    });
  }
}
