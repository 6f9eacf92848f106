/**
 * Quantile search for continuous distributions without a closed-form
 * inverse: Newton steps from an initial guess, safeguarded by a bracket
 * that falls back to bisection (or to doubling while one side is open).
 */

import { HypothesisError, ErrorCode } from '../../errors';

export interface QuantileProblem {
  /** Target probability, 0 < p < 1 */
  p: number;
  cdf(x: number): number;
  /** Survival function; used for p > 0.5 to keep precision in the upper tail */
  sf(x: number): number;
  pdf(x: number): number;
  initial: number;
  /** Support bounds; may be infinite */
  lower: number;
  upper: number;
  /** Relative tolerance on x */
  tolerance: number;
  maxIterations: number;
}

export function solveQuantile(problem: QuantileProblem): number {
  const { p, cdf, sf, pdf, tolerance, maxIterations } = problem;
  const useUpperTail = p > 0.5;
  const q = 1 - p;

  // Increasing in x, zero at the quantile
  const residual = (x: number): number => (useUpperTail ? q - sf(x) : cdf(x) - p);

  let lo = problem.lower;
  let hi = problem.upper;
  let x = problem.initial;
  if (!(x > lo && x < hi)) {
    x = Number.isFinite(lo) && Number.isFinite(hi) ? (lo + hi) / 2 : Number.isFinite(lo) ? lo + 1 : 0;
  }

  for (let i = 0; i < maxIterations; i++) {
    const f = residual(x);
    if (f === 0) return x;
    if (f < 0) lo = x;
    else hi = x;

    const density = pdf(x);
    let next = x - f / density;

    if (!(density > 0) || !Number.isFinite(next) || next <= lo || next >= hi) {
      if (Number.isFinite(lo) && Number.isFinite(hi)) {
        next = (lo + hi) / 2;
      } else if (f < 0) {
        next = x + Math.max(1, Math.abs(x));
      } else {
        next = x - Math.max(1, Math.abs(x));
        if (next <= lo) next = (lo + x) / 2;
      }
    }

    // Relative test; quantiles near zero (small-df chi-square) can be ~1e-12
    const scale = Math.max(Math.abs(next), Number.MIN_VALUE);
    if (Math.abs(next - x) <= tolerance * scale) return next;
    if (Number.isFinite(lo) && Number.isFinite(hi) && hi - lo <= tolerance * scale) {
      return (lo + hi) / 2;
    }
    x = next;
  }

  throw new HypothesisError(
    ErrorCode.CONVERGENCE_FAILURE,
    `Quantile search did not converge within ${maxIterations} iterations`,
    { p, lastEstimate: x, maxIterations }
  );
}
