/**
 * Consensus errors: cross-estimator interference analysis
 *
 * Abstract base: ConsensusError
 * Concrete:
 *   - InsufficientReadingsError (CONSENSUS_INSUFFICIENT_READINGS)
 *   - ConsensusConfigurationError (CONSENSUS_CONFIGURATION_INVALID)
 */

import { TrajectaError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class ConsensusError extends TrajectaError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class InsufficientReadingsError extends ConsensusError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONSENSUS_INSUFFICIENT_READINGS" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly required: number;
  readonly received: number;

  constructor(operation: string, required: number, received: number) {
    super(`${operation} requires at least ${required} lens readings, got ${received}`);
    const entry = ERROR_CATALOG.CONSENSUS_INSUFFICIENT_READINGS;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.required = required;
    this.received = received;
  }
}

export class ConsensusConfigurationError extends ConsensusError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CONSENSUS_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Invalid consensus configuration: ${message}`);
    const entry = ERROR_CATALOG.CONSENSUS_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
