import { HarvestError, type HarvestErrorOptions } from "../base.js";
import type { CodesForBase } from "../catalog.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by runtime failures in the host environment (e.g. the
 * operating system refusing to report a hostname). Not expected.
 */
export class ExternalError<C extends ExternalCode = ExternalCode> extends HarvestError<C> {
  readonly _tag = "ExternalError" as const;

  constructor(options: HarvestErrorOptions<C>) {
    super(options);
  }
}
