import { OnrampError } from "../base.js";
import type { ExternalCodes, OnrampErrorOptions } from "../types.js";

/**
 * Errors caused by failures in external dependencies (filesystem, network).
 * HTTP 500/502/503. The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCodes = ExternalCodes> extends OnrampError {
  override readonly _tag = "ExternalError" as const;
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
