/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the onramp packages. Each code maps to an
 * HTTP-equivalent status, a behavioral base type, and whether the condition
 * is an expected outcome (bad input, missing content) or a fault.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, readme, config
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // VALIDATION ERRORS
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },
  DESCRIPTOR_INVALID: {
    domain: "validation",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid resource descriptor",
    description: "The resource descriptor names neither a local directory nor a usable remote host",
  },

  // ============================================================================
  // README ERRORS - Documentation acquisition
  // ============================================================================
  README_LOCAL_READ_FAILED: {
    domain: "readme",
    httpStatus: 500,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Local README unreadable",
    description: "A local README file exists but could not be read",
  },
  README_REMOTE_UNAVAILABLE: {
    domain: "readme",
    httpStatus: 503,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Remote fetch unavailable",
    description: "No HTTP client capability is available in this runtime",
  },
  README_FETCH_FAILED: {
    domain: "readme",
    httpStatus: 502,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "README fetch failed",
    description: "A remote README candidate failed or returned a non-200 status",
  },

  // ============================================================================
  // CONFIG ERRORS
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 400,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid configuration",
    description: "A configuration value or environment variable is invalid",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
