/**
 * Snapshot and lens-reading builders for tests.
 *
 * Every builder starts from {@link BASE_VALUES} and overrides only the
 * dimensions a test cares about.
 */

import {
  createLensReading,
  createSnapshot,
  type Dimension,
  type DimensionVector,
  type LensReading,
  type Snapshot,
} from "@trajecta/core";

export type DimensionOverrides = Partial<Record<Dimension, number>>;

export const BASE_VALUES: DimensionVector = Object.freeze({
  consistency: 0.5,
  depth: 0.5,
  activationEnergy: 0.5,
  socialArchitecture: 0.5,
  temporalDepth: 0.5,
  intensity: 0.5,
});

export function vectorOf(overrides: DimensionOverrides = {}): DimensionVector {
  return { ...BASE_VALUES, ...overrides };
}

/** A snapshot `seconds` after the epoch */
export function snapshotAt(seconds: number, overrides: DimensionOverrides = {}): Snapshot {
  return createSnapshot(seconds * 1000, vectorOf(overrides));
}

export function lensReading(lens: string, overrides: DimensionOverrides = {}): LensReading {
  return createLensReading(lens, vectorOf(overrides));
}

/**
 * Six readings, ten seconds apart, of a subject under mounting stress:
 * activation climbs from 0.35 to 0.92 while every other dimension erodes.
 */
export const STRESS_ESCALATION: readonly { readonly seconds: number; readonly values: DimensionVector }[] =
  [
    {
      seconds: 0,
      values: {
        consistency: 0.75,
        depth: 0.65,
        activationEnergy: 0.35,
        socialArchitecture: 0.7,
        temporalDepth: 0.45,
        intensity: 0.65,
      },
    },
    {
      seconds: 10,
      values: {
        consistency: 0.72,
        depth: 0.63,
        activationEnergy: 0.42,
        socialArchitecture: 0.68,
        temporalDepth: 0.4,
        intensity: 0.63,
      },
    },
    {
      seconds: 20,
      values: {
        consistency: 0.7,
        depth: 0.6,
        activationEnergy: 0.52,
        socialArchitecture: 0.65,
        temporalDepth: 0.35,
        intensity: 0.6,
      },
    },
    {
      seconds: 30,
      values: {
        consistency: 0.65,
        depth: 0.58,
        activationEnergy: 0.68,
        socialArchitecture: 0.6,
        temporalDepth: 0.3,
        intensity: 0.58,
      },
    },
    {
      seconds: 40,
      values: {
        consistency: 0.58,
        depth: 0.55,
        activationEnergy: 0.82,
        socialArchitecture: 0.55,
        temporalDepth: 0.25,
        intensity: 0.55,
      },
    },
    {
      seconds: 50,
      values: {
        consistency: 0.5,
        depth: 0.52,
        activationEnergy: 0.92,
        socialArchitecture: 0.48,
        temporalDepth: 0.2,
        intensity: 0.52,
      },
    },
  ];

export function stressEscalationSeries(): Snapshot[] {
  return STRESS_ESCALATION.map(({ seconds, values }) => createSnapshot(seconds * 1000, values));
}
