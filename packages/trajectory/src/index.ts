/**
 * @trajecta/trajectory
 *
 * Bounded-history trajectory tracking over dimension snapshots.
 *
 * Provides:
 * - HistoryBuffer: FIFO ring buffer with an out-of-order policy
 * - Finite-difference velocity and acceleration
 * - Second-order extrapolation with a curvature-based confidence heuristic
 * - Ordered, first-match intervention cascade with configurable thresholds
 * - Per-dimension diagnostics and escalation assessment
 * - GradientTracker composing all of the above
 */

// Config
export { resolveTrajectoryConfig } from "./config.js";
// Constants
export {
  DEFAULT_ACTIVATION_CEILING,
  DEFAULT_CONSISTENCY_VELOCITY_FLOOR,
  DEFAULT_CRISIS_ACTIVATION,
  DEFAULT_ESCALATING_ACTIVATION,
  DEFAULT_HORIZON_SECONDS,
  DEFAULT_MIN_SAMPLES,
  DEFAULT_RISING_ACTIVATION_VELOCITY,
  DEFAULT_SOCIAL_VELOCITY_FLOOR,
  DEFAULT_STABLE_ACTIVATION,
  DEFAULT_TREND_THRESHOLD,
  DEFAULT_WINDOW_SIZE,
  INTERVENTION_WINDOW_BASE_SECONDS,
  INTERVENTION_WINDOW_FLOOR_SECONDS,
  INTERVENTION_WINDOW_SLOPE_SECONDS,
  PACKAGE_NAME,
} from "./constants.js";
// Diagnostics
export { classifyTrend, diagnose } from "./diagnostics.js";
// Gradient
export { computeAcceleration, computeVelocity, estimateGradient } from "./gradient.js";
// History
export { HistoryBuffer } from "./history-buffer.js";
// Prediction
export {
  assessEscalation,
  type BuildPredictionOptions,
  buildPrediction,
  extrapolate,
  predictionConfidence,
} from "./predictor.js";
// Intervention cascade
export { createInterventionRules, evaluateInterventions } from "./rules.js";
// Tracker
export { createGradientTracker, GradientTracker } from "./tracker.js";
// Types
export type {
  DiagnosticsResult,
  DimensionDiagnostics,
  EscalationAssessment,
  EscalationLevel,
  EscalationThresholds,
  GradientResult,
  GradientVector,
  InsufficientData,
  InterventionContext,
  InterventionReason,
  InterventionRule,
  InterventionRuleId,
  InterventionThresholds,
  InterventionVerdict,
  OrderingPolicy,
  Prediction,
  PredictionResult,
  ResolvedTrajectoryConfig,
  TrajectoryConfig,
  TrajectoryDiagnostics,
  Trend,
} from "./types.js";
