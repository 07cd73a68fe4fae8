/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the harvestkit workspace.
 * Each error code maps to a domain, a base error type, and whether the
 * condition is an expected consequence of bad input (`isExpected`) or a
 * failure of the host or of the library itself.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: FILESET, CONFIG
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // FILESET ERRORS — Manifest loading, variable resolution, materialization
  // ============================================================================
  FILESET_MODULE_NOT_FOUND: {
    domain: "fileset",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Module not found",
    description: "The module directory does not exist under the modules path",
  },
  FILESET_MANIFEST_READ_FAILED: {
    domain: "fileset",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Manifest read failed",
    description: "The fileset manifest.yml could not be read",
  },
  FILESET_MANIFEST_INVALID: {
    domain: "fileset",
    baseType: "ValidationError",
    isExpected: true,
    title: "Manifest unpack failed",
    description: "The manifest is not valid YAML or does not have the expected shape",
  },
  FILESET_VARIABLE_FIELD_MISSING: {
    domain: "fileset",
    baseType: "ValidationError",
    isExpected: true,
    title: "Variable field missing",
    description: "A declared variable lacks its 'name' or 'default' key",
  },
  FILESET_TEMPLATE_FAILED: {
    domain: "fileset",
    baseType: "ValidationError",
    isExpected: true,
    title: "Template evaluation failed",
    description: "A template could not be parsed or referenced a missing field",
  },
  FILESET_HOST_RESOLUTION_FAILED: {
    domain: "fileset",
    baseType: "ExternalError",
    isExpected: false,
    title: "Host resolution failed",
    description: "The local hostname could not be obtained",
  },
  FILESET_FILE_READ_FAILED: {
    domain: "fileset",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Fileset file read failed",
    description: "A file referenced by the manifest could not be read",
  },
  FILESET_CONFIG_PARSE_FAILED: {
    domain: "fileset",
    baseType: "ValidationError",
    isExpected: true,
    title: "Config parse failed",
    description: "A harvesting config or pipeline file is not valid YAML/JSON",
  },
  FILESET_OVERRIDE_MERGE_FAILED: {
    domain: "fileset",
    baseType: "ValidationError",
    isExpected: true,
    title: "Override merge failed",
    description: "The caller-supplied override document could not be merged",
  },
  FILESET_NOT_READ: {
    domain: "fileset",
    baseType: "InternalError",
    isExpected: false,
    title: "Fileset not read",
    description: "The fileset was used before read() completed",
  },

  // ============================================================================
  // CONFIG ERRORS — Module / fileset selection config
  // ============================================================================
  FILESET_CONFIG_INVALID: {
    domain: "config",
    baseType: "ValidationError",
    isExpected: true,
    title: "Fileset config invalid",
    description: "The module or fileset configuration failed schema validation",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
