/**
 * Snapshot: one timestamped reading of every dimension.
 */

import type { DimensionVector } from "./dimensions.js";
import { DimensionVectorSchema, parseOrThrow, SnapshotInputSchema } from "./validation.js";

export interface Snapshot {
  /** Epoch milliseconds */
  readonly timestamp: number;
  /** Every value lies in [0, 1] */
  readonly values: DimensionVector;
}

/**
 * Create a validated, frozen snapshot.
 *
 * Values outside [0, 1], non-finite values and unknown dimension names are
 * rejected; nothing is clipped.
 *
 * @throws {InvalidInputError}
 */
export function createSnapshot(timestamp: number | Date, values: DimensionVector): Snapshot {
  return parseSnapshot({ timestamp, values });
}

/**
 * Validate an untyped `{ timestamp, values }` record (e.g. decoded JSON).
 *
 * @throws {InvalidInputError}
 */
export function parseSnapshot(input: unknown): Snapshot {
  const parsed = parseOrThrow(SnapshotInputSchema, input, "snapshot");
  const timestamp =
    parsed.timestamp instanceof Date ? parsed.timestamp.getTime() : parsed.timestamp;
  return Object.freeze({
    timestamp,
    values: Object.freeze({ ...parsed.values }),
  });
}

/**
 * Validate a bare dimension vector that must lie in [0, 1].
 *
 * @throws {InvalidInputError}
 */
export function parseUnitVector(input: unknown): DimensionVector {
  return Object.freeze({ ...parseOrThrow(DimensionVectorSchema, input, "dimension vector") });
}

/** Seconds elapsed from `earlier` to `later` (negative when out of order). */
export function elapsedSeconds(earlier: Snapshot, later: Snapshot): number {
  return (later.timestamp - earlier.timestamp) / 1000;
}
