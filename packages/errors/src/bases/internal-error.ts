import { HarvestError, type HarvestErrorOptions } from "../base.js";
import type { CodesForBase } from "../catalog.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs or misuse of an API.
 */
export class InternalError<C extends InternalCode = InternalCode> extends HarvestError<C> {
  readonly _tag = "InternalError" as const;

  constructor(options: HarvestErrorOptions<C>) {
    super(options);
  }
}
