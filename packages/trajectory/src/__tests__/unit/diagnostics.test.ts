import { snapshotAt } from "@trajecta/test-utils";
import { describe, expect, it } from "vitest";
import { classifyTrend, diagnose } from "../../diagnostics.js";
import { estimateGradient } from "../../gradient.js";

describe("classifyTrend", () => {
  it("should compare velocity against the threshold in both directions", () => {
    expect(classifyTrend(0.06, 0.05)).toBe("increasing");
    expect(classifyTrend(-0.06, 0.05)).toBe("decreasing");
    expect(classifyTrend(0.05, 0.05)).toBe("stable");
    expect(classifyTrend(-0.05, 0.05)).toBe("stable");
    expect(classifyTrend(0, 0.05)).toBe("stable");
  });
});

describe("diagnose", () => {
  const snapshots = [
    snapshotAt(0, { activationEnergy: 0.1, consistency: 0.9 }),
    snapshotAt(10, { activationEnergy: 0.2, consistency: 0.8 }),
    snapshotAt(20, { activationEnergy: 0.8, consistency: 0.2 }),
  ];
  const result = estimateGradient(snapshots, 3);
  if (result.status !== "ok") throw new Error("expected a gradient");
  const report = diagnose(snapshots, result.gradient, 0.05);

  it("should summarize the window", () => {
    expect(report.samples).toBe(3);
    expect(report.timeSpanSeconds).toBe(20);
  });

  it("should report per-dimension statistics", () => {
    const activation = report.dimensions.activationEnergy;

    expect(activation.mean).toBeCloseTo(1.1 / 3, 12);
    expect(activation.current).toBe(0.8);
    expect(activation.velocity).toBeCloseTo(0.06, 12);
    expect(activation.acceleration).toBeCloseTo(0.005, 12);
    expect(activation.std).toBeGreaterThan(0);
  });

  it("should label trends from velocity", () => {
    expect(report.dimensions.activationEnergy.trend).toBe("increasing");
    expect(report.dimensions.consistency.trend).toBe("decreasing");
    expect(report.dimensions.depth.trend).toBe("stable");
  });

  it("should report a flat dimension as zero spread", () => {
    expect(report.dimensions.intensity).toEqual({
      mean: 0.5,
      std: 0,
      current: 0.5,
      velocity: 0,
      acceleration: 0,
      trend: "stable",
    });
  });
});
