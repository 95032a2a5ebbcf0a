/**
 * Intensity deviation across lenses and the agreement scores derived from it.
 */

import { type LensReading, standardDeviation } from "@trajecta/core";
import type { AgreementBands, AgreementLevel } from "./types.js";

/** Population standard deviation of intensity across readings */
export function intensityDeviation(readings: readonly LensReading[]): number {
  return standardDeviation(readings.map((r) => r.values.intensity));
}

/** 1 / (1 + deviation): 1 when every lens agrees, falling toward 0 as they diverge */
export function veritasScore(deviation: number): number {
  return 1 / (1 + deviation);
}

export function classifyAgreement(veritas: number, bands: AgreementBands): AgreementLevel {
  if (veritas >= bands.critical) return "critical";
  if (veritas >= bands.high) return "high";
  if (veritas >= bands.moderate) return "moderate";
  return "low";
}
