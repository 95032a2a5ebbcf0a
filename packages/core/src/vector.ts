/**
 * Element-wise arithmetic over {@link DimensionVector}s.
 *
 * Every function returns a new frozen vector; inputs are never mutated.
 */

import type { Dimension, DimensionVector } from "./dimensions.js";

/** Build a vector by evaluating `fn` once per dimension. */
export function mapDimensions(fn: (dimension: Dimension) => number): DimensionVector {
  return Object.freeze({
    consistency: fn("consistency"),
    depth: fn("depth"),
    activationEnergy: fn("activationEnergy"),
    socialArchitecture: fn("socialArchitecture"),
    temporalDepth: fn("temporalDepth"),
    intensity: fn("intensity"),
  });
}

export function zeroVector(): DimensionVector {
  return mapDimensions(() => 0);
}

export function subtract(a: DimensionVector, b: DimensionVector): DimensionVector {
  return mapDimensions((d) => a[d] - b[d]);
}

export function scale(v: DimensionVector, factor: number): DimensionVector {
  return mapDimensions((d) => v[d] * factor);
}

/** Divide every component by `divisor`. Callers guard against non-positive divisors. */
export function divide(v: DimensionVector, divisor: number): DimensionVector {
  return mapDimensions((d) => v[d] / divisor);
}

/** Euclidean (L2) norm across all dimensions */
export function l2Norm(v: DimensionVector): number {
  let sumOfSquares = 0;
  for (const value of Object.values(v)) {
    sumOfSquares += value * value;
  }
  return Math.sqrt(sumOfSquares);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Clip every component into [0, 1] */
export function clipUnit(v: DimensionVector): DimensionVector {
  return mapDimensions((d) => clamp(v[d], 0, 1));
}
