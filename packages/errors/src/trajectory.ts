import { TrajectaError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all trajectory errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for trajectory errors.
 *
 * Enables generic catch: `if (e instanceof TrajectoryError)`
 * while specific subclasses allow precise handling.
 */
export abstract class TrajectoryError extends TrajectaError {}

// ---------------------------------------------------------------------------
// Insufficient data: too few snapshots for a derivative
// ---------------------------------------------------------------------------

/**
 * Thrown when a derivative is requested before enough snapshots exist.
 * Recoverable: retry after more input has been added.
 */
export class InsufficientDataError extends TrajectoryError {
  readonly _tag = "ValidationError" as const;
  readonly code = "TRAJECTORY_INSUFFICIENT_DATA" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly required: number;
  readonly available: number;

  constructor(operation: string, required: number, available: number) {
    super(`${operation} requires at least ${required} snapshots, got ${available}`);
    const entry = ERROR_CATALOG.TRAJECTORY_INSUFFICIENT_DATA;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.required = required;
    this.available = available;
  }
}

// ---------------------------------------------------------------------------
// Out-of-order input: timestamp earlier than the latest snapshot
// ---------------------------------------------------------------------------

/**
 * Thrown when a snapshot arrives with a timestamp strictly earlier than the
 * newest snapshot already held by the buffer.
 */
export class OutOfOrderInputError extends TrajectoryError {
  readonly _tag = "ValidationError" as const;
  readonly code = "TRAJECTORY_OUT_OF_ORDER_INPUT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly latestTimestamp: number;
  readonly receivedTimestamp: number;

  constructor(latestTimestamp: number, receivedTimestamp: number) {
    super(
      `Snapshot timestamp ${receivedTimestamp} is earlier than the latest recorded timestamp ${latestTimestamp}`,
    );
    const entry = ERROR_CATALOG.TRAJECTORY_OUT_OF_ORDER_INPUT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.latestTimestamp = latestTimestamp;
    this.receivedTimestamp = receivedTimestamp;
  }
}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when the trajectory tracker configuration is invalid.
 */
export class TrajectoryConfigurationError extends TrajectoryError {
  readonly _tag = "ValidationError" as const;
  readonly code = "TRAJECTORY_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string) {
    super(`Invalid trajectory configuration: ${message}`);
    const entry = ERROR_CATALOG.TRAJECTORY_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
