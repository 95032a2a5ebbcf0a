import { lensReading, RecordingLogger } from "@trajecta/test-utils";
import { describe, expect, it } from "vitest";
import { createConsensusAnalyzer } from "../../analyzer.js";

describe("cross-lens agreement workflow", () => {
  const analyzer = createConsensusAnalyzer({ logger: new RecordingLogger() });

  it("should treat closely agreeing lenses as invariant ground truth", () => {
    const readings = [
      lensReading("structural", { consistency: 0.62, depth: 0.55, intensity: 0.6 }),
      lensReading("narrative", { consistency: 0.6, depth: 0.55, intensity: 0.62 }),
      lensReading("somatic", { consistency: 0.61, depth: 0.55, intensity: 0.61 }),
    ];

    const interference = analyzer.analyze(readings);
    const agreement = analyzer.assessAgreement(readings);

    expect(interference.interpretation.level).toBe("lens-stable");
    expect(interference.mostVariable).toBe("consistency");
    expect(interference.compatibility.every((pair) => pair.score > 0.98)).toBe(true);
    expect(agreement.reset).toBe(true);
    expect(agreement.level).toBe("critical");
  });

  it("should flag a lens that sees a different object", () => {
    const readings = [
      lensReading("structural", { intensity: 0, consistency: 0.2 }),
      lensReading("narrative", { intensity: 0, consistency: 0.2 }),
      lensReading("outlier", { intensity: 1, consistency: 0.9 }),
    ];

    const interference = analyzer.analyze(readings);
    const agreement = analyzer.assessAgreement(readings);

    expect(interference.interpretation.level).toBe("high");
    expect(interference.mostVariable).toBe("consistency");
    expect(interference.mostStable).toBe("depth");
    expect(agreement.reset).toBe(false);
    expect(analyzer.findOptimal(readings).lens).toBe("outlier");
  });
});
