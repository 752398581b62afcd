/**
 * @onramp/errors
 *
 * Shared error taxonomy for the onramp packages.
 *
 * Errors are built on three behavioral base types: ValidationError,
 * ExternalError, InternalError. Each error carries a `.code` from the catalog
 * that discriminates the specific condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isOnrampError, OnrampError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, ValidationError } from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ExternalCodes,
  InternalCodes,
  OnrampErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { hasCode, isExternalError, isInternalError, isValidationError } from "./guards.js";

// ============================================================================
// README DOMAIN
// ============================================================================

export {
  RampUpConfigurationError,
  ReadmeFetchError,
  ReadmeLocalReadError,
  ReadmeRemoteUnavailableError,
  ResourceDescriptorInvalidError,
} from "./readme.js";
