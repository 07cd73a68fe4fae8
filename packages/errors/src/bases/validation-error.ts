import { HarvestError, type HarvestErrorOptions } from "../base.js";
import type { CodesForBase } from "../catalog.js";

type ValidationCode = CodesForBase<"ValidationError">;

/** One field-level problem, e.g. a Zod issue or a missing manifest key */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
  readonly code: string;
}

/**
 * Errors caused by invalid input, configuration, or template data.
 * The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode = ValidationCode> extends HarvestError<C> {
  readonly _tag = "ValidationError" as const;

  /** Structured validation issues (populated for schema failures) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: HarvestErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
    super(options);
    this.issues = options.issues ?? [];
  }
}
