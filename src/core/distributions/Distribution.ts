/**
 * Distribution interfaces
 */

/**
 * Anything with a cumulative distribution function. The noncentral t
 * only offers this much.
 */
export interface CumulativeDistribution {
  /**
   * Cumulative distribution function, P(X <= x)
   */
  cdf(x: number): number;

  /**
   * Survival function, P(X > x) = 1 - cdf(x), computed directly so that
   * small upper-tail probabilities keep their precision
   */
  sf(x: number): number;
}

/**
 * Continuous reference distribution used by the hypothesis tests
 */
export interface Distribution extends CumulativeDistribution {
  /**
   * Probability density function
   */
  pdf(x: number): number;

  /**
   * Log probability density function
   */
  logPdf(x: number): number;

  /**
   * Inverse CDF: the x with cdf(x) = p. p = 0 and p = 1 map to the
   * support bounds.
   */
  quantile(p: number): number;

  /**
   * Expected value (NaN where undefined)
   */
  mean(): number;

  /**
   * Variance (Infinity or NaN where undefined)
   */
  variance(): number;

  /**
   * Support of the distribution (where the PDF > 0)
   */
  support(): { min: number; max: number };
}
