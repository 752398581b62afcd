import { OnrampError } from "../base.js";
import type { OnrampErrorOptions, ValidationCodes, ValidationIssue } from "../types.js";

/**
 * Errors caused by invalid input or configuration.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCodes = ValidationCodes> extends OnrampError {
  override readonly _tag = "ValidationError" as const;
  override readonly code: C;

  /** Structured validation issues, one per rejected field */
  readonly issues: readonly ValidationIssue[];

  constructor(options: OnrampErrorOptions<C> & { readonly issues?: readonly ValidationIssue[] }) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      options.cause ? { cause: options.cause } : undefined,
    );
    this.code = options.code;
    this.issues = options.issues ?? [];
  }
}
