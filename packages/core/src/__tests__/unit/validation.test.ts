import { InvalidInputError } from "@trajecta/errors";
import { describe, expect, it } from "vitest";
import type { DimensionVector } from "../../index.js";
import {
  assertNonNegativeFinite,
  createLensReading,
  createSnapshot,
  elapsedSeconds,
  isDimension,
  parseDimension,
  parseLensReading,
  parseSnapshot,
  parseUnitVector,
} from "../../index.js";

const values: DimensionVector = {
  consistency: 0.7,
  depth: 0.6,
  activationEnergy: 0.4,
  socialArchitecture: 0.5,
  temporalDepth: 0.3,
  intensity: 0.6,
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

describe("createSnapshot", () => {
  it("should keep numeric timestamps as epoch milliseconds", () => {
    const snapshot = createSnapshot(1_500, values);

    expect(snapshot.timestamp).toBe(1_500);
    expect(snapshot.values).toEqual(values);
  });

  it("should convert Date timestamps to milliseconds", () => {
    expect(createSnapshot(new Date(5_000), values).timestamp).toBe(5_000);
  });

  it("should freeze the snapshot and its values", () => {
    const snapshot = createSnapshot(0, values);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.values)).toBe(true);
  });

  it("should reject values above 1 without clipping", () => {
    const error = captureError(() => createSnapshot(0, { ...values, depth: 1.2 }));

    expect(error).toBeInstanceOf(InvalidInputError);
    if (error instanceof InvalidInputError) {
      expect(error.message).toBe("Invalid input: snapshot: values.depth: must be within [0, 1]");
      expect(error.issues[0]?.field).toBe("values.depth");
    }
  });

  it("should reject negative and non-finite values", () => {
    expect(() => createSnapshot(0, { ...values, intensity: -0.01 })).toThrow(InvalidInputError);
    expect(() => createSnapshot(0, { ...values, intensity: Number.NaN })).toThrow(
      InvalidInputError,
    );
  });

  it("should reject invalid dates", () => {
    expect(() => createSnapshot(new Date(Number.NaN), values)).toThrow(InvalidInputError);
  });
});

describe("parseSnapshot", () => {
  it("should reject unknown dimension names", () => {
    const error = captureError(() =>
      parseSnapshot({ timestamp: 0, values: { ...values, mood: 0.5 } }),
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    if (error instanceof InvalidInputError) {
      expect(error.issues[0]?.field).toBe("values");
      expect(error.issues[0]?.code).toBe("unrecognized_keys");
    }
  });

  it("should reject a missing dimension", () => {
    const { intensity: _omitted, ...partial } = values;
    const error = captureError(() => parseSnapshot({ timestamp: 0, values: partial }));

    expect(error).toBeInstanceOf(InvalidInputError);
    if (error instanceof InvalidInputError) {
      expect(error.issues[0]?.field).toBe("values.intensity");
    }
  });

  it("should report the root field for non-object input", () => {
    const error = captureError(() => parseSnapshot("nope"));

    expect(error).toBeInstanceOf(InvalidInputError);
    if (error instanceof InvalidInputError) {
      expect(error.issues[0]?.field).toBe("(root)");
    }
  });
});

describe("parseUnitVector", () => {
  it("should return a frozen copy", () => {
    const parsed = parseUnitVector(values);

    expect(parsed).toEqual(values);
    expect(Object.isFrozen(parsed)).toBe(true);
  });
});

describe("lens readings", () => {
  it("should create a frozen reading", () => {
    const reading = createLensReading("structural", values);

    expect(reading.lens).toBe("structural");
    expect(Object.isFrozen(reading)).toBe(true);
  });

  it("should reject an empty lens name", () => {
    expect(() => parseLensReading({ lens: "", values })).toThrow(InvalidInputError);
  });
});

describe("elapsedSeconds", () => {
  it("should convert the millisecond difference to seconds", () => {
    const earlier = createSnapshot(10_000, values);
    const later = createSnapshot(25_000, values);

    expect(elapsedSeconds(earlier, later)).toBe(15);
    expect(elapsedSeconds(later, earlier)).toBe(-15);
  });
});

describe("dimension names", () => {
  it("should recognize known dimensions", () => {
    expect(isDimension("socialArchitecture")).toBe(true);
    expect(isDimension("mood")).toBe(false);
    expect(parseDimension("intensity")).toBe("intensity");
  });

  it("should reject unknown dimensions with a structured issue", () => {
    const error = captureError(() => parseDimension("mood"));

    expect(error).toBeInstanceOf(InvalidInputError);
    if (error instanceof InvalidInputError) {
      expect(error.message).toBe('Invalid input: unknown dimension "mood"');
      expect(error.issues[0]?.code).toBe("unknown_dimension");
      expect(error.issues[0]?.value).toBe("mood");
    }
  });
});

describe("assertNonNegativeFinite", () => {
  it("should pass through valid numbers", () => {
    expect(assertNonNegativeFinite(0, "horizonSeconds")).toBe(0);
    expect(assertNonNegativeFinite(30, "horizonSeconds")).toBe(30);
  });

  it("should reject negative values", () => {
    expect(() => assertNonNegativeFinite(-1, "horizonSeconds")).toThrow(
      "Invalid input: horizonSeconds: (root): must be >= 0",
    );
  });

  it("should reject infinities", () => {
    expect(() => assertNonNegativeFinite(Number.POSITIVE_INFINITY, "threshold")).toThrow(
      InvalidInputError,
    );
  });
});
