/**
 * OTel metrics for the trajectory and consensus engines.
 *
 * Instruments are created from a caller-supplied Meter so that each tracker
 * or analyzer owns its own handles; nothing is cached at module level.
 * When no meter provider is registered, the default meter yields no-op
 * instruments.
 */

import type { Counter, Histogram, Meter } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

export const METER_NAME = "trajecta";

export interface EngineMetrics {
  /** Snapshots accepted into a history buffer */
  readonly snapshotsIngested: Counter;
  /** Interventions recommended, by rule id */
  readonly interventionsRecommended: Counter;
  /** Interference analyses performed */
  readonly consensusAnalyses: Counter;
  /** Distribution of interference coefficients (λ) */
  readonly interferenceCoefficient: Histogram;
}

export function createEngineMetrics(meter: Meter = metrics.getMeter(METER_NAME)): EngineMetrics {
  return {
    snapshotsIngested: meter.createCounter("trajecta.snapshots.ingested", {
      description: "Snapshots accepted into a history buffer",
    }),
    interventionsRecommended: meter.createCounter("trajecta.interventions.recommended", {
      description: "Interventions recommended by the rule cascade",
    }),
    consensusAnalyses: meter.createCounter("trajecta.consensus.analyses", {
      description: "Cross-lens interference analyses performed",
    }),
    interferenceCoefficient: meter.createHistogram("trajecta.consensus.interference", {
      description: "Interference coefficient (lambda) per analysis",
    }),
  };
}
