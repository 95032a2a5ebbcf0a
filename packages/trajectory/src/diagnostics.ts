/**
 * Read-only reporting view over a history and its gradient.
 */

import {
  type Dimension,
  elapsedSeconds,
  mean,
  type Snapshot,
  standardDeviation,
} from "@trajecta/core";
import type {
  DimensionDiagnostics,
  GradientVector,
  TrajectoryDiagnostics,
  Trend,
} from "./types.js";

export function classifyTrend(velocity: number, threshold: number): Trend {
  if (velocity > threshold) return "increasing";
  if (velocity < -threshold) return "decreasing";
  return "stable";
}

/**
 * Per-dimension mean, population std, current value, derivatives and trend.
 *
 * `snapshots` must be non-empty and `gradient` must have been computed from
 * the same snapshots.
 */
export function diagnose(
  snapshots: readonly Snapshot[],
  gradient: GradientVector,
  trendThreshold: number,
): TrajectoryDiagnostics {
  const first = snapshots[0];
  const last = snapshots[snapshots.length - 1];

  const describe = (dimension: Dimension): DimensionDiagnostics => {
    const values = snapshots.map((s) => s.values[dimension]);
    const velocity = gradient.velocity[dimension];
    return {
      mean: mean(values),
      std: standardDeviation(values),
      current: last.values[dimension],
      velocity,
      acceleration: gradient.acceleration[dimension],
      trend: classifyTrend(velocity, trendThreshold),
    };
  };

  return {
    samples: snapshots.length,
    timeSpanSeconds: elapsedSeconds(first, last),
    dimensions: {
      consistency: describe("consistency"),
      depth: describe("depth"),
      activationEnergy: describe("activationEnergy"),
      socialArchitecture: describe("socialArchitecture"),
      temporalDepth: describe("temporalDepth"),
      intensity: describe("intensity"),
    },
  };
}
