/**
 * Configuration validation and resolution.
 */

import { createConsoleLogger } from "@trajecta/core";
import { ConsensusConfigurationError } from "@trajecta/errors";
import { z } from "zod";
import {
  DEFAULT_CRITICAL_AGREEMENT,
  DEFAULT_HIGH_AGREEMENT,
  DEFAULT_INVARIANCE_THRESHOLD,
  DEFAULT_LENS_STABLE_BELOW,
  DEFAULT_LOW_BELOW,
  DEFAULT_MODERATE_AGREEMENT,
  DEFAULT_MODERATE_BELOW,
  PACKAGE_NAME,
} from "./constants.js";
import type { ConsensusConfig, ResolvedConsensusConfig } from "./types.js";

const nonNegative = z
  .number()
  .finite({ message: "must be a finite number" })
  .nonnegative({ message: "must be >= 0" });

const TuningSchema = z.object({
  invarianceThreshold: nonNegative.optional(),
  bands: z
    .object({
      lensStableBelow: nonNegative.optional(),
      lowBelow: nonNegative.optional(),
      moderateBelow: nonNegative.optional(),
    })
    .strict()
    .optional(),
  agreement: z
    .object({
      critical: nonNegative.max(1, { message: "must be <= 1" }).optional(),
      high: nonNegative.max(1, { message: "must be <= 1" }).optional(),
      moderate: nonNegative.max(1, { message: "must be <= 1" }).optional(),
    })
    .strict()
    .optional(),
});

/**
 * Validates and resolves a {@link ConsensusConfig}.
 *
 * @throws {ConsensusConfigurationError} on invalid input
 */
export function resolveConsensusConfig(config: ConsensusConfig = {}): ResolvedConsensusConfig {
  const parsed = TuningSchema.safeParse({
    invarianceThreshold: config.invarianceThreshold,
    bands: config.bands,
    agreement: config.agreement,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "config";
    throw new ConsensusConfigurationError(`${field} ${issue?.message ?? "is invalid"}`);
  }

  const bands = {
    lensStableBelow: config.bands?.lensStableBelow ?? DEFAULT_LENS_STABLE_BELOW,
    lowBelow: config.bands?.lowBelow ?? DEFAULT_LOW_BELOW,
    moderateBelow: config.bands?.moderateBelow ?? DEFAULT_MODERATE_BELOW,
  };
  if (!(bands.lensStableBelow <= bands.lowBelow && bands.lowBelow <= bands.moderateBelow)) {
    throw new ConsensusConfigurationError(
      `bands must be ascending, got ${bands.lensStableBelow}, ${bands.lowBelow}, ${bands.moderateBelow}`,
    );
  }

  const agreement = {
    critical: config.agreement?.critical ?? DEFAULT_CRITICAL_AGREEMENT,
    high: config.agreement?.high ?? DEFAULT_HIGH_AGREEMENT,
    moderate: config.agreement?.moderate ?? DEFAULT_MODERATE_AGREEMENT,
  };
  if (!(agreement.moderate <= agreement.high && agreement.high <= agreement.critical)) {
    throw new ConsensusConfigurationError(
      `agreement levels must satisfy moderate <= high <= critical, got ${agreement.moderate}, ${agreement.high}, ${agreement.critical}`,
    );
  }

  return {
    invarianceThreshold: config.invarianceThreshold ?? DEFAULT_INVARIANCE_THRESHOLD,
    bands,
    agreement,
    logger: config.logger ?? createConsoleLogger(PACKAGE_NAME),
    ...(config.meter ? { meter: config.meter } : {}),
  };
}
