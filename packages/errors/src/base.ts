import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * JSON shape produced by {@link TrajectaError.toJSON}.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
}

/**
 * Root of the Trajecta error hierarchy.
 *
 * Subclasses pin `_tag` and `code` as literal types and copy `domain` and
 * `isExpected` from the catalog entry for their code.
 */
export abstract class TrajectaError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

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

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
    };
  }
}

/**
 * Check whether a value is a TrajectaError
 */
export function isTrajectaError(error: unknown): error is TrajectaError {
  return error instanceof TrajectaError;
}

/**
 * Check whether a value is an Error of any kind
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
