/**
 * Dimension schema shared by snapshots, lens readings and derivative vectors.
 */

import { InvalidInputError } from "@trajecta/errors";

/** Ordered dimension names. Order is significant for ties and iteration. */
export const DIMENSIONS = [
  "consistency",
  "depth",
  "activationEnergy",
  "socialArchitecture",
  "temporalDepth",
  "intensity",
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

/** The four dimensions compared across lenses (everything except temporal depth and intensity). */
export const PRIMARY_DIMENSIONS = [
  "consistency",
  "depth",
  "activationEnergy",
  "socialArchitecture",
] as const satisfies readonly Dimension[];

export type PrimaryDimension = (typeof PRIMARY_DIMENSIONS)[number];

/** One number per dimension. Not range-constrained; derivatives may be negative. */
export type DimensionVector = Readonly<Record<Dimension, number>>;

export function isDimension(name: string): name is Dimension {
  return (DIMENSIONS as readonly string[]).includes(name);
}

/**
 * Resolve a caller-supplied dimension name.
 *
 * @throws {InvalidInputError} when the name is not a known dimension
 */
export function parseDimension(name: string): Dimension {
  if (!isDimension(name)) {
    throw new InvalidInputError(`unknown dimension "${name}"`, [
      {
        field: "dimension",
        message: `expected one of ${DIMENSIONS.join(", ")}`,
        code: "unknown_dimension",
        value: name,
      },
    ]);
  }
  return name;
}
