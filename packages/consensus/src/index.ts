/**
 * @trajecta/consensus
 *
 * Cross-lens agreement for a single object:
 * - Per-dimension variance and the interference coefficient λ
 * - Pairwise compatibility between readings
 * - Intensity deviation, reset decisions and veritas agreement levels
 */

export { classifyAgreement, intensityDeviation, veritasScore } from "./agreement.js";
export { ConsensusAnalyzer, createConsensusAnalyzer } from "./analyzer.js";
export { resolveConsensusConfig } from "./config.js";
export {
  DEFAULT_CRITICAL_AGREEMENT,
  DEFAULT_HIGH_AGREEMENT,
  DEFAULT_INVARIANCE_THRESHOLD,
  DEFAULT_LENS_STABLE_BELOW,
  DEFAULT_LOW_BELOW,
  DEFAULT_MODERATE_AGREEMENT,
  DEFAULT_MODERATE_BELOW,
  DEFAULT_TARGET_DIMENSION,
  INTERFERENCE_EPSILON,
  MIN_READINGS,
  PACKAGE_NAME,
} from "./constants.js";
export {
  compatibility,
  dimensionVariances,
  interferenceCoefficient,
  interpretInterference,
  pairwiseCompatibility,
  varianceExtremes,
} from "./interference.js";
export type {
  AgreementAssessment,
  AgreementBands,
  AgreementLevel,
  ConsensusConfig,
  InterferenceBands,
  InterferenceInterpretation,
  InterferenceLevel,
  InterferenceResult,
  PairCompatibility,
  ResetDecision,
  ResolvedConsensusConfig,
} from "./types.js";
