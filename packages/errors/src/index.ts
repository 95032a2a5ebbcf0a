/**
 * @trajecta/errors
 *
 * Shared error taxonomy for the Trajecta trajectory and consensus engines.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` (or `hasCode`) for
 * fine-grained matching, or `instanceof` a domain base for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isTrajectaError, TrajectaError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  hasCode,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

export { InternalError } from "./bases/index.js";

export type {
  InternalCodes,
  TrajectaErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { InvalidInputError, VectorError } from "./vector.js";

export {
  InsufficientDataError,
  OutOfOrderInputError,
  TrajectoryConfigurationError,
  TrajectoryError,
} from "./trajectory.js";

export {
  ConsensusConfigurationError,
  ConsensusError,
  InsufficientReadingsError,
} from "./consensus.js";
