/**
 * Type definitions for @trajecta/consensus.
 */

import type { Meter } from "@opentelemetry/api";
import type { Dimension, Logger, PrimaryDimension } from "@trajecta/core";

// ---------------------------------------------------------------------------
// Interference
// ---------------------------------------------------------------------------

export type InterferenceLevel = "lens-stable" | "low" | "moderate" | "high";

export interface InterferenceInterpretation {
  readonly level: InterferenceLevel;
  readonly message: string;
}

/** Compatibility of one unordered pair of readings, `first < second` */
export interface PairCompatibility {
  readonly first: number;
  readonly second: number;
  readonly lenses: readonly [string, string];
  readonly score: number;
}

export interface InterferenceResult {
  /** Population variance of every dimension across readings */
  readonly variances: Readonly<Record<Dimension, number>>;
  /** λ = var(intensity) / max(mean(intensity), ε) */
  readonly lambda: number;
  readonly mostStable: PrimaryDimension;
  readonly mostVariable: PrimaryDimension;
  readonly compatibility: readonly PairCompatibility[];
  readonly interpretation: InterferenceInterpretation;
}

// ---------------------------------------------------------------------------
// Agreement
// ---------------------------------------------------------------------------

export interface ResetDecision {
  /** True when deviation is below the invariance threshold */
  readonly reset: boolean;
  readonly deviation: number;
}

export type AgreementLevel = "critical" | "high" | "moderate" | "low";

export interface AgreementAssessment extends ResetDecision {
  /** 1 / (1 + deviation) */
  readonly veritas: number;
  readonly level: AgreementLevel;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface InterferenceBands {
  readonly lensStableBelow: number;
  readonly lowBelow: number;
  readonly moderateBelow: number;
}

export interface AgreementBands {
  readonly critical: number;
  readonly high: number;
  readonly moderate: number;
}

export interface ConsensusConfig {
  /** Default for shouldReset()/assessAgreement() (default: 0.1) */
  readonly invarianceThreshold?: number;
  /** λ bucket edges (defaults: 0.1, 0.3, 0.6) */
  readonly bands?: Partial<InterferenceBands>;
  /** Veritas bucket edges (defaults: 0.8, 0.6, 0.4) */
  readonly agreement?: Partial<AgreementBands>;
  /** Defaults to a console logger tagged with the package name */
  readonly logger?: Logger;
  readonly meter?: Meter;
}

export interface ResolvedConsensusConfig {
  readonly invarianceThreshold: number;
  readonly bands: InterferenceBands;
  readonly agreement: AgreementBands;
  readonly logger: Logger;
  readonly meter?: Meter;
}
