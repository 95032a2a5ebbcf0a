/** Arithmetic mean. Returns 0 for an empty sample. */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Population variance (divides by n, not n - 1). Returns 0 for an empty sample.
 *
 * Samples are shifted by the first value before averaging, so identical
 * samples give exactly 0.
 */
export function populationVariance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const shift = values[0];
  const shifted = values.map((value) => value - shift);
  const mu = mean(shifted);
  let sumOfSquares = 0;
  for (const value of shifted) {
    sumOfSquares += (value - mu) ** 2;
  }
  return sumOfSquares / values.length;
}

/** Population standard deviation */
export function standardDeviation(values: readonly number[]): number {
  return Math.sqrt(populationVariance(values));
}
