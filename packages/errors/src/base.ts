import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

/**
 * Plain-object form of an OnrampError, safe for JSON.stringify.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly httpStatus: HttpStatusCode;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
  readonly stack?: string;
}

/**
 * Abstract root of the onramp error hierarchy.
 *
 * Subclasses declare `_tag` and `code`; everything else (status, domain,
 * expectedness) is looked up in the catalog so the two cannot drift.
 */
export abstract class OnrampError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
  }

  get httpStatus(): HttpStatusCode {
    return ERROR_CATALOG[this.code].httpStatus;
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      ...(this.stack ? { stack: this.stack } : {}),
    };
  }

  override toString(): string {
    const meta = this.metadata ? ` ${JSON.stringify(this.metadata)}` : "";
    const trace = this.traceId ? ` [trace: ${this.traceId}]` : "";
    return `${this.name} [${this.code}]: ${this.message}${meta}${trace}`;
  }
}

/**
 * Check whether a value is an OnrampError
 */
export function isOnrampError(error: unknown): error is OnrampError {
  return error instanceof OnrampError;
}

/**
 * Check whether a value is any Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
