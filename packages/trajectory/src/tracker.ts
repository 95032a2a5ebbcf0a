/**
 * GradientTracker: owns one history buffer and answers gradient,
 * prediction and diagnostics queries against it.
 *
 * Not safe for concurrent mutation: a caller sharing a tracker across
 * asynchronous tasks must serialize add/gradient/predict so that a read
 * sees the buffer state it expects.
 */

import {
  assertNonNegativeFinite,
  createEngineMetrics,
  type DimensionVector,
  type EngineMetrics,
  type Snapshot,
} from "@trajecta/core";
import { getErrorMessage, wrapError } from "@trajecta/errors";
import { resolveTrajectoryConfig } from "./config.js";
import { diagnose } from "./diagnostics.js";
import { computeAcceleration, computeVelocity, estimateGradient } from "./gradient.js";
import { HistoryBuffer } from "./history-buffer.js";
import { buildPrediction } from "./predictor.js";
import { createInterventionRules, evaluateInterventions } from "./rules.js";
import type {
  DiagnosticsResult,
  GradientResult,
  InterventionRule,
  PredictionResult,
  ResolvedTrajectoryConfig,
  TrajectoryConfig,
} from "./types.js";

export class GradientTracker {
  private readonly _config: ResolvedTrajectoryConfig;
  private readonly _history: HistoryBuffer;
  private readonly _rules: readonly InterventionRule[];
  private readonly _metrics: EngineMetrics;

  constructor(config: TrajectoryConfig = {}) {
    this._config = resolveTrajectoryConfig(config);
    this._history = new HistoryBuffer(this._config.windowSize, this._config.ordering);
    this._rules = createInterventionRules(this._config.thresholds);
    this._metrics = createEngineMetrics(this._config.meter);
  }

  get config(): ResolvedTrajectoryConfig {
    return this._config;
  }

  get size(): number {
    return this._history.size;
  }

  /** Buffered snapshots, oldest first (frozen copy) */
  snapshots(): readonly Snapshot[] {
    return this._history.toArray();
  }

  /** The cascade in evaluation order */
  rules(): readonly InterventionRule[] {
    return this._rules;
  }

  /**
   * Record a snapshot.
   *
   * @throws {InvalidInputError} on a non-finite timestamp or a value outside [0, 1]
   * @throws {OutOfOrderInputError} under the `reject` policy when the
   *   timestamp is earlier than the newest buffered snapshot
   */
  add(input: Snapshot): void {
    const newest = this._history.latest();
    const snapshot = this._history.add(input);
    this._metrics.snapshotsIngested.add(1);

    if (newest !== undefined && snapshot.timestamp <= newest.timestamp) {
      this._config.logger.warn(
        `Snapshot at ${snapshot.timestamp} does not advance past ${newest.timestamp}; derivatives over this interval read as zero`,
      );
    }
  }

  /**
   * @throws {InsufficientDataError} with fewer than 2 snapshots
   */
  velocity(): DimensionVector {
    return computeVelocity(this._history.toArray());
  }

  /**
   * @throws {InsufficientDataError} with fewer than 3 snapshots
   */
  acceleration(): DimensionVector {
    return computeAcceleration(this._history.toArray());
  }

  gradient(): GradientResult {
    return estimateGradient(this._history.toArray(), this._config.minSamples);
  }

  /**
   * Extrapolate `horizonSeconds` ahead and run the intervention cascade.
   *
   * @throws {InvalidInputError} when the horizon is negative or not finite
   * @throws {TrajectaError} rethrown from `onIntervention`; anything else it
   *   throws arrives wrapped in an {@link InternalError}
   */
  predict(horizonSeconds: number = this._config.defaultHorizonSeconds): PredictionResult {
    assertNonNegativeFinite(horizonSeconds, "horizonSeconds");

    const snapshots = this._history.toArray();
    const result = estimateGradient(snapshots, this._config.minSamples);
    if (result.status !== "ok") return result;

    const { gradient } = result;
    const prediction = buildPrediction({
      current: snapshots[snapshots.length - 1],
      gradient,
      horizonSeconds,
      escalation: this._config.escalation,
      evaluate: (predicted) => evaluateInterventions(this._rules, { gradient, predicted }),
    });

    const { intervention } = prediction;
    if (intervention.recommended) {
      this._metrics.interventionsRecommended.add(1, { rule: intervention.rule });
      this._config.logger.info(
        `Intervention recommended (${intervention.reason}): ${intervention.detail}`,
      );
      try {
        this._config.onIntervention?.(prediction);
      } catch (error) {
        this._config.logger.warn(`onIntervention callback failed: ${getErrorMessage(error)}`);
        throw wrapError(error);
      }
    }

    return { status: "ok", prediction };
  }

  diagnostics(): DiagnosticsResult {
    const snapshots = this._history.toArray();
    const result = estimateGradient(snapshots, this._config.minSamples);
    if (result.status !== "ok") return result;
    return {
      status: "ok",
      diagnostics: diagnose(snapshots, result.gradient, this._config.trendThreshold),
    };
  }

  clear(): void {
    this._history.clear();
  }
}

export function createGradientTracker(config?: TrajectoryConfig): GradientTracker {
  return new GradientTracker(config);
}
