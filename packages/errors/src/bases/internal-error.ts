import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import { TrajectaError } from "../base.js";
import type { TrajectaErrorOptions } from "../types.js";

/**
 * Errors caused by bugs or by values thrown from outside the hierarchy.
 */
export class InternalError extends TrajectaError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(options: TrajectaErrorOptions<"INTERNAL_ERROR">);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | TrajectaErrorOptions<"INTERNAL_ERROR">,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    if (typeof messageOrOptions === "string") {
      super(messageOrOptions, metadata, traceId);
    } else {
      const opts = messageOrOptions;
      super(opts.message, opts.metadata, opts.traceId, opts.cause ? { cause: opts.cause } : undefined);
    }
    const entry = ERROR_CATALOG.INTERNAL_ERROR;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
