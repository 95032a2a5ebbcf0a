/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised anywhere in the Trajecta monorepo is declared here.
 * Each code maps to a domain and a base error type so callers can match on
 * `error.code` for a specific condition or on `_tag` for a whole category.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, vector, trajectory, consensus
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // VECTOR ERRORS - Dimension vectors, snapshots and lens readings
  // ============================================================================
  VECTOR_INVALID_INPUT: {
    domain: "vector",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid input",
    description:
      "A dimension value is outside [0, 1], a dimension name is not recognized, or a numeric argument is not finite",
  },

  // ============================================================================
  // TRAJECTORY ERRORS - History buffer, gradient and prediction
  // ============================================================================
  TRAJECTORY_INSUFFICIENT_DATA: {
    domain: "trajectory",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Insufficient data",
    description: "Not enough snapshots have been recorded for the requested derivative",
  },
  TRAJECTORY_OUT_OF_ORDER_INPUT: {
    domain: "trajectory",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Out-of-order snapshot",
    description: "A snapshot timestamp is earlier than the latest recorded snapshot",
  },
  TRAJECTORY_CONFIGURATION_INVALID: {
    domain: "trajectory",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid trajectory configuration",
    description: "The trajectory tracker configuration is invalid",
  },

  // ============================================================================
  // CONSENSUS ERRORS - Cross-estimator interference analysis
  // ============================================================================
  CONSENSUS_INSUFFICIENT_READINGS: {
    domain: "consensus",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Insufficient lens readings",
    description: "Too few lens readings were supplied for the requested analysis",
  },
  CONSENSUS_CONFIGURATION_INVALID: {
    domain: "consensus",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid consensus configuration",
    description: "The consensus analyzer configuration is invalid",
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
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
