/**
 * Descriptive statistics over samples. Inputs are never mutated.
 */

export function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

export function mean(values: readonly number[]): number {
  return sum(values) / values.length;
}

/**
 * Sum of squared deviations from the sample mean (two-pass)
 */
export function sumOfSquares(values: readonly number[], center: number = mean(values)): number {
  return values.reduce((acc, x) => acc + (x - center) * (x - center), 0);
}

/**
 * Sample variance with the n - 1 denominator
 */
export function sampleVariance(values: readonly number[]): number {
  return sumOfSquares(values) / (values.length - 1);
}
