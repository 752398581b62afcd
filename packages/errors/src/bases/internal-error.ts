import { OnrampError } from "../base.js";
import type { InternalCodes, OnrampErrorOptions } from "../types.js";

/**
 * Errors caused by bugs or unexpected faults.
 * HTTP 500. The `.code` field discriminates the specific error.
 */
export class InternalError<C extends InternalCodes = InternalCodes> extends OnrampError {
  override readonly _tag = "InternalError" as const;
  override readonly code: C;

  constructor(options: OnrampErrorOptions<C>) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      options.cause ? { cause: options.cause } : undefined,
    );
    this.code = options.code;
  }
}
