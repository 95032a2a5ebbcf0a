import type { LensReading } from "@trajecta/core";
import { InsufficientReadingsError, InvalidInputError } from "@trajecta/errors";
import { BASE_VALUES, lensReading, RecordingLogger, RecordingMeter } from "@trajecta/test-utils";
import { describe, expect, it } from "vitest";
import { ConsensusAnalyzer, createConsensusAnalyzer } from "../../analyzer.js";

const quietAnalyzer = () => createConsensusAnalyzer({ logger: new RecordingLogger() });

describe("ConsensusAnalyzer.analyze", () => {
  it("should require at least two readings", () => {
    const analyzer = quietAnalyzer();

    expect(() => analyzer.analyze([lensReading("solo")])).toThrow(
      "analyze requires at least 2 lens readings, got 1",
    );
    expect(() => analyzer.analyze([])).toThrow(InsufficientReadingsError);
  });

  it("should classify identical readings as lens-stable", () => {
    const result = quietAnalyzer().analyze([lensReading("a"), lensReading("b")]);

    expect(result.lambda).toBe(0);
    expect(result.interpretation.level).toBe("lens-stable");
    expect(result.compatibility).toEqual([
      { first: 0, second: 1, lenses: ["a", "b"], score: 1 },
    ]);
  });

  it("should classify a single divergent intensity as high interference", () => {
    const readings = [0, 0, 0, 0.9].map((intensity, i) =>
      lensReading(`lens-${i}`, { intensity }),
    );
    const result = quietAnalyzer().analyze(readings);

    expect(result.lambda).toBeCloseTo(0.675, 12);
    expect(result.lambda).toBeGreaterThanOrEqual(0.6);
    expect(result.interpretation.level).toBe("high");
    expect(result.compatibility).toHaveLength(6);
  });

  it("should land moderate and low spreads in their buckets", () => {
    const analyzer = quietAnalyzer();
    const moderate = [0.05, 0.05, 0.05, 0.95].map((intensity, i) =>
      lensReading(`lens-${i}`, { intensity }),
    );
    const low = [lensReading("a", { intensity: 0.1 }), lensReading("b", { intensity: 0.5 })];

    expect(analyzer.analyze(moderate).interpretation.level).toBe("moderate");
    expect(analyzer.analyze(low).interpretation.level).toBe("low");
  });

  it("should apply configured bands", () => {
    const analyzer = createConsensusAnalyzer({
      logger: new RecordingLogger(),
      bands: { lensStableBelow: 0.01, lowBelow: 0.05, moderateBelow: 0.1 },
    });
    const readings = [lensReading("a", { intensity: 0.4 }), lensReading("b", { intensity: 0.6 })];

    expect(analyzer.analyze(readings).interpretation.level).toBe("low");
  });

  it("should freeze the result", () => {
    const result = quietAnalyzer().analyze([lensReading("a"), lensReading("b")]);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.compatibility)).toBe(true);
  });

  it("should warn and record metrics", () => {
    const logger = new RecordingLogger();
    const meter = new RecordingMeter();
    const analyzer = new ConsensusAnalyzer({ logger, meter });
    const readings = [0, 0, 0, 0.9].map((intensity, i) =>
      lensReading(`lens-${i}`, { intensity }),
    );

    analyzer.analyze(readings);
    analyzer.analyze([lensReading("a"), lensReading("b")]);

    expect(logger.messages("warn")).toEqual([
      "High interference across 4 lenses (lambda 0.675, most variable: consistency)",
    ]);
    expect(meter.values("trajecta.consensus.analyses")).toEqual([
      { value: 1, attributes: { level: "high" } },
      { value: 1, attributes: { level: "lens-stable" } },
    ]);
    expect(meter.values("trajecta.consensus.interference")).toHaveLength(2);
  });
});

describe("ConsensusAnalyzer.compatibility", () => {
  it("should be 1 with itself and symmetric", () => {
    const analyzer = quietAnalyzer();
    const a = lensReading("a", { depth: 0.2 });
    const b = lensReading("b", { socialArchitecture: 0.9 });

    expect(analyzer.compatibility(a, a)).toBe(1);
    expect(analyzer.compatibility(a, b)).toBe(analyzer.compatibility(b, a));
  });
});

describe("ConsensusAnalyzer.deviation / shouldReset", () => {
  const identical = [lensReading("a", { intensity: 0.7 }), lensReading("b", { intensity: 0.7 })];
  const spread = [lensReading("a", { intensity: 0.3 }), lensReading("b", { intensity: 0.7 })];

  it("should report zero deviation and reset for identical readings", () => {
    const analyzer = quietAnalyzer();

    expect(analyzer.deviation(identical)).toBe(0);
    for (const threshold of [1e-9, 0.1, 1]) {
      expect(analyzer.shouldReset(identical, threshold)).toEqual({ reset: true, deviation: 0 });
    }
  });

  it("should use the configured invariance threshold by default", () => {
    const analyzer = quietAnalyzer();
    const decision = analyzer.shouldReset(spread);

    expect(decision.reset).toBe(false);
    expect(decision.deviation).toBeCloseTo(0.2, 12);
    expect(analyzer.shouldReset(spread, 0.25).reset).toBe(true);
    expect(createConsensusAnalyzer({ invarianceThreshold: 0.3 }).shouldReset(spread).reset).toBe(
      true,
    );
  });

  it("should report exactly zero deviation when the intensity sum does not round cleanly", () => {
    const readings = ["a", "b", "c"].map((lens) => lensReading(lens, { intensity: 0.4 }));

    expect(quietAnalyzer().shouldReset(readings, 1e-17)).toEqual({ reset: true, deviation: 0 });
  });

  it("should not reset at a zero threshold", () => {
    expect(quietAnalyzer().shouldReset(identical, 0).reset).toBe(false);
  });

  it("should require two readings", () => {
    const analyzer = quietAnalyzer();

    expect(() => analyzer.deviation([lensReading("a")])).toThrow(InsufficientReadingsError);
    expect(() => analyzer.shouldReset([lensReading("a")])).toThrow(
      "shouldReset requires at least 2 lens readings, got 1",
    );
  });

  it("should reject a negative threshold", () => {
    expect(() => quietAnalyzer().shouldReset(identical, -1)).toThrow(InvalidInputError);
  });
});

describe("ConsensusAnalyzer.findOptimal", () => {
  const third = lensReading("third", { intensity: 0.8 });
  const readings = [
    lensReading("first", { intensity: 0.3, depth: 0.9 }),
    lensReading("second", { intensity: 0.8 }),
    third,
  ];

  it("should default to intensity and break ties by input order", () => {
    expect(quietAnalyzer().findOptimal(readings).lens).toBe("second");
  });

  it("should maximize a named dimension", () => {
    expect(quietAnalyzer().findOptimal(readings, "depth").lens).toBe("first");
  });

  it("should return the only reading", () => {
    expect(quietAnalyzer().findOptimal([third]).lens).toBe("third");
  });

  it("should reject unknown dimensions", () => {
    expect(() => quietAnalyzer().findOptimal(readings, "mood")).toThrow(InvalidInputError);
  });

  it("should reject an empty reading list", () => {
    expect(() => quietAnalyzer().findOptimal([])).toThrow(
      "findOptimal requires at least 1 lens readings, got 0",
    );
  });
});

describe("ConsensusAnalyzer.assessAgreement", () => {
  it("should combine the reset decision with veritas and level", () => {
    const readings = [lensReading("a", { intensity: 0.05 }), lensReading("b", { intensity: 0.95 })];
    const assessment = quietAnalyzer().assessAgreement(readings);

    expect(assessment.reset).toBe(false);
    expect(assessment.deviation).toBeCloseTo(0.45, 12);
    expect(assessment.veritas).toBeCloseTo(1 / 1.45, 12);
    expect(assessment.level).toBe("high");
  });

  it("should report critical agreement for identical readings", () => {
    const assessment = quietAnalyzer().assessAgreement([lensReading("a"), lensReading("b")]);

    expect(assessment).toEqual({ reset: true, deviation: 0, veritas: 1, level: "critical" });
  });
});

describe("ConsensusAnalyzer input validation", () => {
  const overRange: LensReading = { lens: "over", values: { ...BASE_VALUES, intensity: 5 } };
  const underRange: LensReading = { lens: "under", values: { ...BASE_VALUES, intensity: -3 } };

  it("should accept well-formed object literals", () => {
    const readings: LensReading[] = [
      { lens: "a", values: BASE_VALUES },
      { lens: "b", values: BASE_VALUES },
    ];

    expect(quietAnalyzer().analyze(readings).lambda).toBe(0);
  });

  it("should reject out-of-range literals on every entry point", () => {
    const analyzer = quietAnalyzer();

    expect(() => analyzer.analyze([underRange, overRange])).toThrow(InvalidInputError);
    expect(() => analyzer.deviation([underRange, overRange])).toThrow(InvalidInputError);
    expect(() => analyzer.shouldReset([underRange, overRange])).toThrow(InvalidInputError);
    expect(() => analyzer.assessAgreement([underRange, overRange])).toThrow(InvalidInputError);
    expect(() => analyzer.findOptimal([overRange])).toThrow(InvalidInputError);
    expect(() => analyzer.compatibility(lensReading("a"), overRange)).toThrow(InvalidInputError);
  });

  it("should name the offending field", () => {
    expect(() => quietAnalyzer().analyze([lensReading("a"), overRange])).toThrow(
      "lens reading: values.intensity: must be within [0, 1]",
    );
  });

  it("should not record metrics for rejected input", () => {
    const meter = new RecordingMeter();
    const analyzer = new ConsensusAnalyzer({ logger: new RecordingLogger(), meter });

    expect(() => analyzer.analyze([underRange, overRange])).toThrow(InvalidInputError);
    expect(meter.values("trajecta.consensus.analyses")).toEqual([]);
  });
});
