import { HarvestError, type HarvestErrorOptions } from "../base.js";
import type { CodesForBase } from "../catalog.js";

type NotFoundCode = CodesForBase<"NotFoundError">;

/**
 * Errors when a module directory or a file it references does not exist
 * or cannot be read.
 */
export class NotFoundError<C extends NotFoundCode = NotFoundCode> extends HarvestError<C> {
  readonly _tag = "NotFoundError" as const;

  constructor(options: HarvestErrorOptions<C>) {
    super(options);
  }
}
