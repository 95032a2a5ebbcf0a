/**
 * Type definitions for @trajecta/trajectory.
 */

import type { Meter } from "@opentelemetry/api";
import type { Dimension, DimensionVector, Logger, Snapshot } from "@trajecta/core";

// ---------------------------------------------------------------------------
// Gradient
// ---------------------------------------------------------------------------

/** First and second finite-difference derivatives, per second and per second². */
export interface GradientVector {
  readonly velocity: DimensionVector;
  readonly acceleration: DimensionVector;
}

export interface InsufficientData {
  readonly status: "insufficient_data";
  readonly required: number;
  readonly available: number;
}

export type GradientResult =
  | { readonly status: "ok"; readonly gradient: GradientVector }
  | InsufficientData;

// ---------------------------------------------------------------------------
// Intervention cascade
// ---------------------------------------------------------------------------

export interface InterventionThresholds {
  /** activationEnergy velocity above this → "rapid escalation" */
  readonly risingActivationVelocity: number;
  /** consistency velocity below this → "coherence breakdown" */
  readonly consistencyVelocityFloor: number;
  /** predicted activationEnergy above this → "extreme activation predicted" */
  readonly activationCeiling: number;
  /** socialArchitecture velocity below this → "rapid disconnection" */
  readonly socialVelocityFloor: number;
}

export type InterventionRuleId =
  | "rapid-escalation"
  | "coherence-breakdown"
  | "extreme-activation"
  | "rapid-disconnection";

export type InterventionReason =
  | "rapid escalation"
  | "coherence breakdown"
  | "extreme activation predicted"
  | "rapid disconnection";

export interface InterventionContext {
  readonly gradient: GradientVector;
  /** Extrapolated, clipped state at the prediction horizon */
  readonly predicted: DimensionVector;
}

export interface InterventionRule {
  readonly id: InterventionRuleId;
  readonly reason: InterventionReason;
  matches(context: InterventionContext): boolean;
  /** Human-readable detail for a match, e.g. the offending velocity */
  describe(context: InterventionContext): string;
}

export type InterventionVerdict =
  | { readonly recommended: false }
  | {
      readonly recommended: true;
      readonly rule: InterventionRuleId;
      readonly reason: InterventionReason;
      readonly detail: string;
    };

// ---------------------------------------------------------------------------
// Escalation assessment
// ---------------------------------------------------------------------------

export type EscalationLevel = "crisis" | "escalating" | "de-escalating" | "stable";

export interface EscalationThresholds {
  /** Activation above this is a crisis */
  readonly crisis: number;
  /** Activation above this (and not a crisis) is escalating */
  readonly escalating: number;
  /** Activation below this is stable; anything else is de-escalating */
  readonly stable: number;
}

export interface EscalationAssessment {
  readonly level: EscalationLevel;
  /** Estimated seconds available to intervene */
  readonly interventionWindowSeconds: number;
}

// ---------------------------------------------------------------------------
// Prediction
// ---------------------------------------------------------------------------

export interface Prediction {
  /** Extrapolated snapshot at `current.timestamp + horizon`, clipped to [0, 1] */
  readonly state: Snapshot;
  /**
   * Heuristic stability proxy, `clip(1 - ‖acceleration‖₂, 0, 1)`.
   * Not a statistical confidence bound.
   */
  readonly confidence: number;
  readonly horizonSeconds: number;
  readonly intervention: InterventionVerdict;
  readonly escalation: EscalationAssessment;
}

export type PredictionResult =
  | { readonly status: "ok"; readonly prediction: Prediction }
  | InsufficientData;

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export type Trend = "increasing" | "decreasing" | "stable";

export interface DimensionDiagnostics {
  readonly mean: number;
  /** Population standard deviation over the buffer */
  readonly std: number;
  readonly current: number;
  readonly velocity: number;
  readonly acceleration: number;
  readonly trend: Trend;
}

export interface TrajectoryDiagnostics {
  readonly samples: number;
  readonly timeSpanSeconds: number;
  readonly dimensions: Readonly<Record<Dimension, DimensionDiagnostics>>;
}

export type DiagnosticsResult =
  | { readonly status: "ok"; readonly diagnostics: TrajectoryDiagnostics }
  | InsufficientData;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * What to do with a snapshot older than the newest one held.
 * - `reject`: throw OutOfOrderInputError (default)
 * - `accept`: keep it; the affected derivatives fall back to zero
 *
 * Equal timestamps are accepted under both policies and read as no motion.
 */
export type OrderingPolicy = "reject" | "accept";

export interface TrajectoryConfig {
  /** History capacity W (default: 50) */
  readonly windowSize?: number;
  /** Snapshots required before a gradient is available (default: 3, minimum 2) */
  readonly minSamples?: number;
  /** Intervention cascade thresholds (defaults: 0.3, -0.25, 0.85, -0.4) */
  readonly thresholds?: Partial<InterventionThresholds>;
  /** Escalation level thresholds (defaults: 0.8, 0.6, 0.3) */
  readonly escalation?: Partial<EscalationThresholds>;
  /** |velocity| beyond which a dimension trends (default: 0.05) */
  readonly trendThreshold?: number;
  readonly ordering?: OrderingPolicy;
  /** Horizon used by predict() when none is passed (default: 30) */
  readonly defaultHorizonSeconds?: number;
  /** Called with every prediction that recommends an intervention */
  readonly onIntervention?: (prediction: Prediction) => void;
  readonly logger?: Logger;
  readonly meter?: Meter;
}

export interface ResolvedTrajectoryConfig {
  readonly windowSize: number;
  readonly minSamples: number;
  readonly thresholds: InterventionThresholds;
  readonly escalation: EscalationThresholds;
  readonly trendThreshold: number;
  readonly ordering: OrderingPolicy;
  readonly defaultHorizonSeconds: number;
  readonly onIntervention?: (prediction: Prediction) => void;
  readonly logger: Logger;
  readonly meter?: Meter;
}
