import { type BaseErrorType, ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/** Base types whose codes describe bad input rather than a failure */
const EXPECTED_BASES: ReadonlySet<BaseErrorType> = new Set(["ValidationError", "NotFoundError"]);

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.hasOwn(ERROR_CATALOG, code);
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Coerce an unknown thrown value into an Error, for use as a `cause`.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - Validation/not-found codes are expected, external/internal ones are not
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const code of getAllErrorCodes()) {
    const entry = getCatalogEntry(code);
    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    if (entry.isExpected !== EXPECTED_BASES.has(entry.baseType)) {
      errors.push(`Code '${code}' has isExpected=${entry.isExpected} but base ${entry.baseType}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
