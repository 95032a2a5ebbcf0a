import { silentLogger } from "@trajecta/core";
import { ConsensusConfigurationError } from "@trajecta/errors";
import { describe, expect, it } from "vitest";
import { resolveConsensusConfig } from "../../config.js";

describe("resolveConsensusConfig", () => {
  it("should apply documented defaults", () => {
    const config = resolveConsensusConfig();

    expect(config.invarianceThreshold).toBe(0.1);
    expect(config.bands).toEqual({ lensStableBelow: 0.1, lowBelow: 0.3, moderateBelow: 0.6 });
    expect(config.agreement).toEqual({ critical: 0.8, high: 0.6, moderate: 0.4 });
    expect(config.meter).toBeUndefined();
  });

  it("should merge partial bands", () => {
    const config = resolveConsensusConfig({ bands: { moderateBelow: 0.9 }, logger: silentLogger });

    expect(config.bands).toEqual({ lensStableBelow: 0.1, lowBelow: 0.3, moderateBelow: 0.9 });
    expect(config.logger).toBe(silentLogger);
  });

  it("should reject bands out of order", () => {
    expect(() => resolveConsensusConfig({ bands: { lowBelow: 0.05 } })).toThrow(
      "Invalid consensus configuration: bands must be ascending, got 0.1, 0.05, 0.6",
    );
  });

  it("should reject agreement levels out of order", () => {
    expect(() => resolveConsensusConfig({ agreement: { moderate: 0.9 } })).toThrow(
      ConsensusConfigurationError,
    );
  });

  it("should reject a negative invariance threshold", () => {
    expect(() => resolveConsensusConfig({ invarianceThreshold: -0.1 })).toThrow(
      "Invalid consensus configuration: invarianceThreshold must be >= 0",
    );
  });

  it("should reject agreement levels above 1", () => {
    expect(() => resolveConsensusConfig({ agreement: { critical: 1.5 } })).toThrow(
      "Invalid consensus configuration: agreement.critical must be <= 1",
    );
  });
});
