/**
 * Constants for @trajecta/consensus.
 */

export const PACKAGE_NAME = "@trajecta/consensus";

/** Floor on mean intensity when computing λ; keeps the ratio bounded near zero mean. */
export const INTERFERENCE_EPSILON = 0.01;

export const MIN_READINGS = 2;
export const DEFAULT_INVARIANCE_THRESHOLD = 0.1;
export const DEFAULT_TARGET_DIMENSION = "intensity";

// λ band upper edges: [0, lensStable) lens-stable, [lensStable, low) low,
// [low, moderate) moderate, [moderate, ∞) high
export const DEFAULT_LENS_STABLE_BELOW = 0.1;
export const DEFAULT_LOW_BELOW = 0.3;
export const DEFAULT_MODERATE_BELOW = 0.6;

// Agreement levels on the veritas score 1 / (1 + deviation)
export const DEFAULT_CRITICAL_AGREEMENT = 0.8;
export const DEFAULT_HIGH_AGREEMENT = 0.6;
export const DEFAULT_MODERATE_AGREEMENT = 0.4;
