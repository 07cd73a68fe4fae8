import { type BaseErrorType, ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * Options for constructing a base error type. The code determines domain
 * and isExpected via catalog lookup.
 */
export interface HarvestErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  /** String context (file path, variable name, ...) for logs and `toJSON()` */
  metadata?: Record<string, string> | undefined;
  cause?: Error | undefined;
}

/**
 * Plain-object form of a HarvestError, as produced by `toJSON()`.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string>;
  readonly cause?: string;
}

/**
 * Root of the error hierarchy. Domain and expectedness are looked up from
 * the code at construction time.
 */
export abstract class HarvestError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata: Readonly<Record<string, string>> | undefined;
  readonly timestamp: Date;

  constructor(options: HarvestErrorOptions<C>) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);

    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: { ...this.metadata } } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/** Check if a value is any HarvestError */
export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError;
}
