/**
 * Type infrastructure for the error system.
 *
 * Construction options and per-base code aliases.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

// ============================================================================
// VALIDATION ISSUE
// ============================================================================

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  readonly field: string;
  readonly message: string;
  readonly code: string;
}

// ============================================================================
// ERROR CONSTRUCTION OPTIONS
// ============================================================================

/**
 * Options for constructing a base error type.
 * The code determines httpStatus, domain, and isExpected via catalog lookup.
 */
export interface OnrampErrorOptions<C extends ErrorCode> {
  readonly code: C;
  readonly message: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
  readonly cause?: Error | undefined;
}

export type { BaseErrorType, CodesForBase };

export type ValidationCodes = CodesForBase<"ValidationError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;
