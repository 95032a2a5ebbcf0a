/**
 * LensReading: one estimator's reading of a single object.
 */

import type { DimensionVector } from "./dimensions.js";
import { LensReadingInputSchema, parseOrThrow } from "./validation.js";

export interface LensReading {
  /** Name of the estimator ("lens") that produced the reading */
  readonly lens: string;
  /** Every value lies in [0, 1] */
  readonly values: DimensionVector;
}

/**
 * Create a validated, frozen lens reading.
 *
 * @throws {InvalidInputError}
 */
export function createLensReading(lens: string, values: DimensionVector): LensReading {
  return parseLensReading({ lens, values });
}

/**
 * Validate an untyped `{ lens, values }` record.
 *
 * @throws {InvalidInputError}
 */
export function parseLensReading(input: unknown): LensReading {
  const parsed = parseOrThrow(LensReadingInputSchema, input, "lens reading");
  return Object.freeze({
    lens: parsed.lens,
    values: Object.freeze({ ...parsed.values }),
  });
}
