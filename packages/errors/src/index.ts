/**
 * @harvestkit/errors
 *
 * Shared error taxonomy for harvestkit.
 *
 * The error system is built on four behavioral base types:
 * ValidationError, NotFoundError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, HarvestError, type HarvestErrorOptions, isHarvestError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  toError,
  validateCatalog,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, NotFoundError, ValidationError } from "./bases/index.js";
export type { ValidationIssue } from "./bases/validation-error.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isInternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// FILESET ERRORS
// ============================================================================

export {
  ConfigParseError,
  FileReadError,
  FilesetConfigError,
  FilesetNotReadError,
  HostResolutionError,
  ManifestReadError,
  ManifestUnpackError,
  MissingModuleError,
  MissingVariableFieldError,
  OverrideMergeError,
  TemplateError,
  type TemplateErrorContext,
} from "./fileset.js";
