/**
 * Vector errors: dimension vectors, snapshots and lens readings
 *
 * Abstract base: VectorError
 * Concrete:
 *   - InvalidInputError (VECTOR_INVALID_INPUT)
 */

import { TrajectaError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class VectorError extends TrajectaError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a dimension value falls outside [0, 1], a dimension name is not
 * recognized, or a numeric argument is not finite. Input is never clipped.
 */
export class InvalidInputError extends VectorError {
  readonly _tag = "ValidationError" as const;
  readonly code = "VECTOR_INVALID_INPUT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(`Invalid input: ${message}`);
    const entry = ERROR_CATALOG.VECTOR_INVALID_INPUT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}
