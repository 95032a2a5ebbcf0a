/**
 * @trajecta/core
 *
 * Shared data model and numeric primitives:
 * - Dimension schema (six named scalars, four primary)
 * - Snapshot and LensReading with zod-validated construction
 * - Element-wise vector arithmetic and population statistics
 * - Tag-prefixed logger and OTel metric instruments
 */

export {
  DIMENSIONS,
  type Dimension,
  type DimensionVector,
  isDimension,
  PRIMARY_DIMENSIONS,
  parseDimension,
  type PrimaryDimension,
} from "./dimensions.js";
export { createLensReading, type LensReading, parseLensReading } from "./lens-reading.js";
export { createConsoleLogger, type Logger, silentLogger } from "./logger.js";
export { createEngineMetrics, type EngineMetrics, METER_NAME } from "./metrics.js";
export {
  createSnapshot,
  elapsedSeconds,
  parseSnapshot,
  parseUnitVector,
  type Snapshot,
} from "./snapshot.js";
export { mean, populationVariance, standardDeviation } from "./stats.js";
export {
  assertNonNegativeFinite,
  DimensionVectorSchema,
  LensReadingInputSchema,
  type LensReadingInput,
  parseOrThrow,
  SnapshotInputSchema,
  type SnapshotInput,
  TimestampSchema,
  toValidationIssues,
  UnitIntervalSchema,
} from "./validation.js";
export {
  clamp,
  clipUnit,
  divide,
  l2Norm,
  mapDimensions,
  scale,
  subtract,
  zeroVector,
} from "./vector.js";
