/**
 * Finite-difference derivatives over the newest snapshots of a history.
 *
 * Elapsed time is measured in seconds. A non-positive interval between the
 * snapshots involved (duplicate or out-of-order timestamps) yields the zero
 * vector instead of an error: such input is read as "no motion". Callers
 * that need to reject it do so at ingestion, see {@link HistoryBuffer}.
 */

import {
  type DimensionVector,
  divide,
  elapsedSeconds,
  type Snapshot,
  subtract,
  zeroVector,
} from "@trajecta/core";
import { InsufficientDataError } from "@trajecta/errors";
import type { GradientResult } from "./types.js";

function differenceQuotient(earlier: Snapshot, later: Snapshot): DimensionVector | undefined {
  const dt = elapsedSeconds(earlier, later);
  if (dt <= 0) return undefined;
  return divide(subtract(later.values, earlier.values), dt);
}

/**
 * `(latest - previous) / Δt` for the two newest snapshots.
 *
 * @throws {InsufficientDataError} with fewer than 2 snapshots
 */
export function computeVelocity(snapshots: readonly Snapshot[]): DimensionVector {
  const n = snapshots.length;
  if (n < 2) {
    throw new InsufficientDataError("velocity", 2, n);
  }
  return differenceQuotient(snapshots[n - 2], snapshots[n - 1]) ?? zeroVector();
}

/**
 * `(v1 - v2) / mean(Δt1, Δt2)` where v1 is the velocity over the newest pair
 * and v2 over the pair before it.
 *
 * @throws {InsufficientDataError} with fewer than 3 snapshots
 */
export function computeAcceleration(snapshots: readonly Snapshot[]): DimensionVector {
  const n = snapshots.length;
  if (n < 3) {
    throw new InsufficientDataError("acceleration", 3, n);
  }
  const [s3, s2, s1] = [snapshots[n - 3], snapshots[n - 2], snapshots[n - 1]];
  const dt1 = elapsedSeconds(s2, s1);
  const dt2 = elapsedSeconds(s3, s2);
  if (dt1 <= 0 || dt2 <= 0) {
    return zeroVector();
  }
  const v1 = divide(subtract(s1.values, s2.values), dt1);
  const v2 = divide(subtract(s2.values, s3.values), dt2);
  return divide(subtract(v1, v2), (dt1 + dt2) / 2);
}

/**
 * Velocity and acceleration, or `insufficient_data` below `minSamples`.
 *
 * With exactly two snapshots (only reachable when `minSamples` is 2) the
 * acceleration is the zero vector.
 */
export function estimateGradient(
  snapshots: readonly Snapshot[],
  minSamples: number,
): GradientResult {
  const available = snapshots.length;
  const required = Math.max(minSamples, 2);
  if (available < required) {
    return { status: "insufficient_data", required, available };
  }
  return {
    status: "ok",
    gradient: {
      velocity: computeVelocity(snapshots),
      acceleration: available >= 3 ? computeAcceleration(snapshots) : zeroVector(),
    },
  };
}
