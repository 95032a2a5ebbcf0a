/**
 * ConsensusAnalyzer: compares independent readings ("lenses") of one
 * object and reports how far they disagree.
 *
 * Holds only its resolved configuration and metric handles, so one instance
 * can serve concurrent callers.
 */

import {
  assertNonNegativeFinite,
  createEngineMetrics,
  type EngineMetrics,
  type LensReading,
  parseDimension,
  parseLensReading,
} from "@trajecta/core";
import { InsufficientReadingsError } from "@trajecta/errors";
import { classifyAgreement, intensityDeviation, veritasScore } from "./agreement.js";
import { resolveConsensusConfig } from "./config.js";
import { DEFAULT_TARGET_DIMENSION, MIN_READINGS } from "./constants.js";
import {
  compatibility,
  dimensionVariances,
  interferenceCoefficient,
  interpretInterference,
  pairwiseCompatibility,
  varianceExtremes,
} from "./interference.js";
import type {
  AgreementAssessment,
  ConsensusConfig,
  InterferenceResult,
  ResetDecision,
  ResolvedConsensusConfig,
} from "./types.js";

/**
 * Count check, then re-validation of every reading: callers may pass object
 * literals that never went through {@link parseLensReading}.
 */
function requireReadings(
  operation: string,
  readings: readonly LensReading[],
  required: number = MIN_READINGS,
): LensReading[] {
  if (readings.length < required) {
    throw new InsufficientReadingsError(operation, required, readings.length);
  }
  return readings.map((reading) => parseLensReading(reading));
}

export class ConsensusAnalyzer {
  private readonly _config: ResolvedConsensusConfig;
  private readonly _metrics: EngineMetrics;

  constructor(config: ConsensusConfig = {}) {
    this._config = resolveConsensusConfig(config);
    this._metrics = createEngineMetrics(this._config.meter);
  }

  get config(): ResolvedConsensusConfig {
    return this._config;
  }

  /**
   * Variance per dimension, the interference coefficient λ, the most stable
   * and most variable primary dimensions, pairwise compatibility and an
   * interpretation of λ.
   *
   * @throws {InsufficientReadingsError} with fewer than 2 readings
   * @throws {InvalidInputError} when a reading holds a value outside [0, 1]
   */
  analyze(input: readonly LensReading[]): InterferenceResult {
    const readings = requireReadings("analyze", input);

    const variances = dimensionVariances(readings);
    const lambda = interferenceCoefficient(readings);
    const { mostStable, mostVariable } = varianceExtremes(variances);
    const interpretation = interpretInterference(lambda, mostVariable, this._config.bands);

    this._metrics.consensusAnalyses.add(1, { level: interpretation.level });
    this._metrics.interferenceCoefficient.record(lambda);
    if (interpretation.level === "high") {
      this._config.logger.warn(
        `High interference across ${readings.length} lenses (lambda ${lambda.toFixed(3)}, most variable: ${mostVariable})`,
      );
    }

    return Object.freeze({
      variances,
      lambda,
      mostStable,
      mostVariable,
      compatibility: Object.freeze(pairwiseCompatibility(readings)),
      interpretation,
    });
  }

  /**
   * Symmetric; 1 for a reading compared with itself.
   *
   * @throws {InvalidInputError} when a reading holds a value outside [0, 1]
   */
  compatibility(a: LensReading, b: LensReading): number {
    return compatibility(parseLensReading(a), parseLensReading(b));
  }

  /**
   * Population standard deviation of intensity across readings.
   *
   * @throws {InsufficientReadingsError} with fewer than 2 readings
   * @throws {InvalidInputError} when a reading holds a value outside [0, 1]
   */
  deviation(readings: readonly LensReading[]): number {
    return intensityDeviation(requireReadings("deviation", readings));
  }

  /**
   * Readings agree (`reset: true`) when their intensity deviation is
   * strictly below `threshold`.
   *
   * @throws {InsufficientReadingsError} with fewer than 2 readings
   * @throws {InvalidInputError} when the threshold is negative or not finite,
   *   or a reading holds a value outside [0, 1]
   */
  shouldReset(
    readings: readonly LensReading[],
    threshold: number = this._config.invarianceThreshold,
  ): ResetDecision {
    assertNonNegativeFinite(threshold, "threshold");
    const deviation = intensityDeviation(requireReadings("shouldReset", readings));
    return { reset: deviation < threshold, deviation };
  }

  /**
   * The reading with the highest value on `dimension`. Ties go to the
   * earliest reading in input order.
   *
   * @throws {InsufficientReadingsError} when `readings` is empty
   * @throws {InvalidInputError} for an unknown dimension name or a reading
   *   holding a value outside [0, 1]
   */
  findOptimal(
    input: readonly LensReading[],
    dimension: string = DEFAULT_TARGET_DIMENSION,
  ): LensReading {
    const target = parseDimension(dimension);
    const readings = requireReadings("findOptimal", input, 1);

    let best = readings[0];
    for (const reading of readings) {
      if (reading.values[target] > best.values[target]) best = reading;
    }
    return best;
  }

  /**
   * {@link shouldReset} plus the veritas score and its agreement level.
   *
   * @throws {InsufficientReadingsError} with fewer than 2 readings
   * @throws {InvalidInputError} when the threshold is negative or not finite,
   *   or a reading holds a value outside [0, 1]
   */
  assessAgreement(
    readings: readonly LensReading[],
    threshold: number = this._config.invarianceThreshold,
  ): AgreementAssessment {
    const decision = this.shouldReset(readings, threshold);
    const veritas = veritasScore(decision.deviation);
    return {
      ...decision,
      veritas,
      level: classifyAgreement(veritas, this._config.agreement),
    };
  }
}

export function createConsensusAnalyzer(config?: ConsensusConfig): ConsensusAnalyzer {
  return new ConsensusAnalyzer(config);
}
