/**
 * Zod schemas for boundary validation of vectors, snapshots and readings.
 */

import { InvalidInputError, type ValidationIssue } from "@trajecta/errors";
import { type ZodError, z } from "zod";

export const UnitIntervalSchema = z
  .number({ invalid_type_error: "must be a number" })
  .finite({ message: "must be finite" })
  .min(0, { message: "must be within [0, 1]" })
  .max(1, { message: "must be within [0, 1]" });

/** All six dimensions required; unknown dimension names are rejected. */
export const DimensionVectorSchema = z
  .object({
    consistency: UnitIntervalSchema,
    depth: UnitIntervalSchema,
    activationEnergy: UnitIntervalSchema,
    socialArchitecture: UnitIntervalSchema,
    temporalDepth: UnitIntervalSchema,
    intensity: UnitIntervalSchema,
  })
  .strict();

export const TimestampSchema = z.union([
  z.number().finite({ message: "timestamp must be a finite number of milliseconds" }),
  z.date().refine((date) => Number.isFinite(date.getTime()), {
    message: "timestamp must be a valid date",
  }),
]);

export const SnapshotInputSchema = z.object({
  timestamp: TimestampSchema,
  values: DimensionVectorSchema,
});

export const LensReadingInputSchema = z.object({
  lens: z.string().min(1, { message: "lens name must not be empty" }),
  values: DimensionVectorSchema,
});

export type SnapshotInput = z.input<typeof SnapshotInputSchema>;
export type LensReadingInput = z.input<typeof LensReadingInputSchema>;

/** Flatten zod issues into the error package's issue shape. */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parse `input` with `schema`, converting failures to {@link InvalidInputError}.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  subject: string,
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
    throw new InvalidInputError(`${subject}: ${summary}`, issues);
  }
  return result.data;
}

/**
 * Validate a finite, non-negative number such as a prediction horizon.
 *
 * @throws {InvalidInputError} on NaN, infinities or negative values
 */
export function assertNonNegativeFinite(value: number, field: string): number {
  return parseOrThrow(
    z.number().finite({ message: "must be finite" }).nonnegative({ message: "must be >= 0" }),
    value,
    field,
  );
}
