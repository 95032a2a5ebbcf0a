/**
 * Second-order extrapolation of the newest snapshot.
 */

import {
  clamp,
  clipUnit,
  type DimensionVector,
  l2Norm,
  mapDimensions,
  type Snapshot,
} from "@trajecta/core";
import {
  INTERVENTION_WINDOW_BASE_SECONDS,
  INTERVENTION_WINDOW_FLOOR_SECONDS,
  INTERVENTION_WINDOW_SLOPE_SECONDS,
} from "./constants.js";
import type {
  EscalationAssessment,
  EscalationThresholds,
  GradientVector,
  InterventionVerdict,
  Prediction,
} from "./types.js";

/**
 * `current + v·h + ½·a·h²` per dimension, clipped into [0, 1].
 */
export function extrapolate(
  current: DimensionVector,
  gradient: GradientVector,
  horizonSeconds: number,
): DimensionVector {
  const { velocity, acceleration } = gradient;
  return clipUnit(
    mapDimensions(
      (d) =>
        current[d] +
        velocity[d] * horizonSeconds +
        0.5 * acceleration[d] * horizonSeconds ** 2,
    ),
  );
}

/**
 * `clip(1 - ‖acceleration‖₂, 0, 1)`.
 *
 * Curvature is read as instability, so confidence falls as the acceleration
 * magnitude grows. This is a heuristic, not a statistical bound.
 */
export function predictionConfidence(acceleration: DimensionVector): number {
  return clamp(1 - l2Norm(acceleration), 0, 1);
}

/** Classify the current activation energy and estimate time left to intervene. */
export function assessEscalation(
  activation: number,
  thresholds: EscalationThresholds,
): EscalationAssessment {
  const level =
    activation > thresholds.crisis
      ? "crisis"
      : activation > thresholds.escalating
        ? "escalating"
        : activation < thresholds.stable
          ? "stable"
          : "de-escalating";

  return {
    level,
    interventionWindowSeconds: Math.max(
      INTERVENTION_WINDOW_BASE_SECONDS - activation * INTERVENTION_WINDOW_SLOPE_SECONDS,
      INTERVENTION_WINDOW_FLOOR_SECONDS,
    ),
  };
}

export interface BuildPredictionOptions {
  readonly current: Snapshot;
  readonly gradient: GradientVector;
  readonly horizonSeconds: number;
  readonly escalation: EscalationThresholds;
  /** Decides the verdict from the extrapolated state */
  readonly evaluate: (predicted: DimensionVector) => InterventionVerdict;
}

export function buildPrediction(options: BuildPredictionOptions): Prediction {
  const { current, gradient, horizonSeconds } = options;
  const predicted = extrapolate(current.values, gradient, horizonSeconds);

  return Object.freeze({
    state: Object.freeze({
      timestamp: current.timestamp + horizonSeconds * 1000,
      values: predicted,
    }),
    confidence: predictionConfidence(gradient.acceleration),
    horizonSeconds,
    intervention: options.evaluate(predicted),
    escalation: assessEscalation(current.values.activationEnergy, options.escalation),
  });
}
