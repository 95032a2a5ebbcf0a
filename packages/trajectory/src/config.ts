/**
 * Configuration validation and resolution.
 */

import { createConsoleLogger } from "@trajecta/core";
import { TrajectoryConfigurationError } from "@trajecta/errors";
import { z } from "zod";
import {
  DEFAULT_ACTIVATION_CEILING,
  DEFAULT_CONSISTENCY_VELOCITY_FLOOR,
  DEFAULT_CRISIS_ACTIVATION,
  DEFAULT_ESCALATING_ACTIVATION,
  DEFAULT_HORIZON_SECONDS,
  DEFAULT_MIN_SAMPLES,
  DEFAULT_RISING_ACTIVATION_VELOCITY,
  DEFAULT_SOCIAL_VELOCITY_FLOOR,
  DEFAULT_STABLE_ACTIVATION,
  DEFAULT_TREND_THRESHOLD,
  DEFAULT_WINDOW_SIZE,
  PACKAGE_NAME,
} from "./constants.js";
import type { ResolvedTrajectoryConfig, TrajectoryConfig } from "./types.js";

const finite = z.number().finite({ message: "must be a finite number" });
const level = finite.min(0, { message: "must be within [0, 1]" }).max(1, {
  message: "must be within [0, 1]",
});

const TuningSchema = z.object({
  windowSize: z.number().int().positive({ message: "must be a positive integer" }).optional(),
  minSamples: z.number().int().min(2, { message: "must be an integer >= 2" }).optional(),
  thresholds: z
    .object({
      risingActivationVelocity: finite.optional(),
      consistencyVelocityFloor: finite.optional(),
      activationCeiling: finite.optional(),
      socialVelocityFloor: finite.optional(),
    })
    .strict()
    .optional(),
  escalation: z
    .object({
      crisis: level.optional(),
      escalating: level.optional(),
      stable: level.optional(),
    })
    .strict()
    .optional(),
  trendThreshold: finite.nonnegative({ message: "must be >= 0" }).optional(),
  ordering: z.enum(["reject", "accept"]).optional(),
  defaultHorizonSeconds: finite.nonnegative({ message: "must be >= 0" }).optional(),
});

/**
 * Validates and resolves a {@link TrajectoryConfig} into a fully-resolved
 * config with all defaults applied.
 *
 * @throws {TrajectoryConfigurationError} on invalid input
 */
export function resolveTrajectoryConfig(config: TrajectoryConfig = {}): ResolvedTrajectoryConfig {
  const parsed = TuningSchema.safeParse({
    windowSize: config.windowSize,
    minSamples: config.minSamples,
    thresholds: config.thresholds,
    escalation: config.escalation,
    trendThreshold: config.trendThreshold,
    ordering: config.ordering,
    defaultHorizonSeconds: config.defaultHorizonSeconds,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "config";
    throw new TrajectoryConfigurationError(`${field} ${issue?.message ?? "is invalid"}`);
  }

  const windowSize = config.windowSize ?? DEFAULT_WINDOW_SIZE;
  const minSamples = config.minSamples ?? DEFAULT_MIN_SAMPLES;
  if (minSamples > windowSize) {
    throw new TrajectoryConfigurationError(
      `minSamples (${minSamples}) cannot exceed windowSize (${windowSize})`,
    );
  }

  const escalation = {
    crisis: config.escalation?.crisis ?? DEFAULT_CRISIS_ACTIVATION,
    escalating: config.escalation?.escalating ?? DEFAULT_ESCALATING_ACTIVATION,
    stable: config.escalation?.stable ?? DEFAULT_STABLE_ACTIVATION,
  };
  if (!(escalation.stable <= escalation.escalating && escalation.escalating <= escalation.crisis)) {
    throw new TrajectoryConfigurationError(
      `escalation thresholds must satisfy stable <= escalating <= crisis, got ${escalation.stable}, ${escalation.escalating}, ${escalation.crisis}`,
    );
  }

  return {
    windowSize,
    minSamples,
    thresholds: {
      risingActivationVelocity:
        config.thresholds?.risingActivationVelocity ?? DEFAULT_RISING_ACTIVATION_VELOCITY,
      consistencyVelocityFloor:
        config.thresholds?.consistencyVelocityFloor ?? DEFAULT_CONSISTENCY_VELOCITY_FLOOR,
      activationCeiling: config.thresholds?.activationCeiling ?? DEFAULT_ACTIVATION_CEILING,
      socialVelocityFloor: config.thresholds?.socialVelocityFloor ?? DEFAULT_SOCIAL_VELOCITY_FLOOR,
    },
    escalation,
    trendThreshold: config.trendThreshold ?? DEFAULT_TREND_THRESHOLD,
    ordering: config.ordering ?? "reject",
    defaultHorizonSeconds: config.defaultHorizonSeconds ?? DEFAULT_HORIZON_SECONDS,
    ...(config.onIntervention ? { onIntervention: config.onIntervention } : {}),
    logger: config.logger ?? createConsoleLogger(PACKAGE_NAME),
    ...(config.meter ? { meter: config.meter } : {}),
  };
}
