/**
 * Cross-lens interference: per-dimension variance, the λ coefficient,
 * pairwise compatibility and the qualitative interpretation of λ.
 */

import {
  type Dimension,
  type LensReading,
  mapDimensions,
  mean,
  PRIMARY_DIMENSIONS,
  populationVariance,
  type PrimaryDimension,
} from "@trajecta/core";
import { INTERFERENCE_EPSILON } from "./constants.js";
import type {
  InterferenceBands,
  InterferenceInterpretation,
  PairCompatibility,
} from "./types.js";

export function dimensionVariances(
  readings: readonly LensReading[],
): Readonly<Record<Dimension, number>> {
  return mapDimensions((d) => populationVariance(readings.map((r) => r.values[d])));
}

/** λ = var(intensity) / max(mean(intensity), ε), ε = 0.01 */
export function interferenceCoefficient(readings: readonly LensReading[]): number {
  const intensities = readings.map((r) => r.values.intensity);
  return populationVariance(intensities) / Math.max(mean(intensities), INTERFERENCE_EPSILON);
}

/**
 * Lowest- and highest-variance primary dimensions. Ties go to the dimension
 * listed first in {@link PRIMARY_DIMENSIONS}.
 */
export function varianceExtremes(variances: Readonly<Record<Dimension, number>>): {
  mostStable: PrimaryDimension;
  mostVariable: PrimaryDimension;
} {
  let mostStable: PrimaryDimension = PRIMARY_DIMENSIONS[0];
  let mostVariable: PrimaryDimension = PRIMARY_DIMENSIONS[0];
  for (const d of PRIMARY_DIMENSIONS) {
    if (variances[d] < variances[mostStable]) mostStable = d;
    if (variances[d] > variances[mostVariable]) mostVariable = d;
  }
  return { mostStable, mostVariable };
}

/**
 * `1 - Σ|a - b| / 4` over the primary dimensions. Symmetric; a reading is
 * fully compatible (1) with itself.
 */
export function compatibility(a: LensReading, b: LensReading): number {
  let totalDifference = 0;
  for (const d of PRIMARY_DIMENSIONS) {
    totalDifference += Math.abs(a.values[d] - b.values[d]);
  }
  return 1 - totalDifference / PRIMARY_DIMENSIONS.length;
}

/** One entry per unordered pair (i < j), in input order. */
export function pairwiseCompatibility(readings: readonly LensReading[]): PairCompatibility[] {
  const pairs: PairCompatibility[] = [];
  for (let i = 0; i < readings.length; i++) {
    for (let j = i + 1; j < readings.length; j++) {
      pairs.push({
        first: i,
        second: j,
        lenses: [readings[i].lens, readings[j].lens],
        score: compatibility(readings[i], readings[j]),
      });
    }
  }
  return pairs;
}

export function interpretInterference(
  lambda: number,
  mostVariable: PrimaryDimension,
  bands: InterferenceBands,
): InterferenceInterpretation {
  if (lambda < bands.lensStableBelow) {
    return {
      level: "lens-stable",
      message: `Lens-stable: every lens sees the same core pattern, so the reading is effectively universal. Most variable dimension: ${mostVariable}.`,
    };
  }
  if (lambda < bands.lowBelow) {
    return {
      level: "low",
      message: `Low interference: lenses see mostly similar patterns, with minor lens-dependent variation in ${mostVariable}.`,
    };
  }
  if (lambda < bands.moderateBelow) {
    return {
      level: "moderate",
      message: `Moderate interference: lenses reveal different aspects of the object; ${mostVariable} varies significantly between them.`,
    };
  }
  return {
    level: "high",
    message: `High interference: the reading depends heavily on the lens; ${mostVariable} shows extreme variation.`,
  };
}
