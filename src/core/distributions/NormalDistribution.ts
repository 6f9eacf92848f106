/**
 * Normal Distribution
 * CDF through the complementary error function; quantile by Acklam's
 * rational approximation polished with one Halley step.
 */

import { erfc } from '../utils/math/special';
import { requireFinite, requirePositive, requireProbability } from '../utils/validation';
import type { Distribution } from './Distribution';

const LOG_TWO_PI = Math.log(2 * Math.PI);
const SQRT_TWO = Math.sqrt(2);
const SQRT_TWO_PI = Math.sqrt(2 * Math.PI);

// Acklam's coefficients for the inverse standard normal CDF
const A = [
  -3.969683028665376e1, 2.209460984245205e2, -2.759285104469687e2, 1.38357751867269e2,
  -3.066479806614716e1, 2.506628277459239,
];
const B = [
  -5.447609879822406e1, 1.615858368580409e2, -1.556989798598866e2, 6.680131188771972e1,
  -1.328068155288572e1,
];
const C = [
  -7.784894002430293e-3, -3.223964580411365e-1, -2.400758277161838, -2.549732539343734,
  4.374664141464968, 2.938163982698783,
];
const D = [7.784695709041462e-3, 3.224671290700398e-1, 2.445134137142996, 3.754408661907416];
const P_LOW = 0.02425;

/**
 * Standard normal CDF Φ(z)
 */
export function standardNormalCdf(z: number): number {
  return 0.5 * erfc(-z / SQRT_TWO);
}

/**
 * Standard normal survival function 1 - Φ(z)
 */
export function standardNormalSf(z: number): number {
  return 0.5 * erfc(z / SQRT_TWO);
}

/**
 * Inverse of the standard normal CDF for 0 < p < 1
 */
export function standardNormalQuantile(p: number): number {
  let x: number;

  if (p < P_LOW) {
    const q = Math.sqrt(-2 * Math.log(p));
    x =
      (((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
      ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1);
  } else if (p <= 1 - P_LOW) {
    const q = p - 0.5;
    const r = q * q;
    x =
      ((((((A[0] * r + A[1]) * r + A[2]) * r + A[3]) * r + A[4]) * r + A[5]) * q) /
      (((((B[0] * r + B[1]) * r + B[2]) * r + B[3]) * r + B[4]) * r + 1);
  } else {
    const q = Math.sqrt(-2 * Math.log1p(-p));
    x =
      -(((((C[0] * q + C[1]) * q + C[2]) * q + C[3]) * q + C[4]) * q + C[5]) /
      ((((D[0] * q + D[1]) * q + D[2]) * q + D[3]) * q + 1);
  }

  // Halley refinement; e = Φ(x) - p, evaluated in the tail that holds p
  const e = p > 0.5 ? 1 - p - standardNormalSf(x) : standardNormalCdf(x) - p;
  const u = e * SQRT_TWO_PI * Math.exp((x * x) / 2);
  return x - u / (1 + (x * u) / 2);
}

/**
 * Normal distribution N(μ, σ²)
 */
export class NormalDistribution implements Distribution {
  constructor(
    private readonly meanValue: number = 0,
    private readonly stdDevValue: number = 1
  ) {
    requireFinite('mean', meanValue);
    requirePositive('stdDev', stdDevValue);
  }

  /**
   * Probability density function
   */
  pdf(x: number): number {
    requireFinite('x', x);
    const standardized = (x - this.meanValue) / this.stdDevValue;
    const coefficient = 1 / (this.stdDevValue * SQRT_TWO_PI);
    return coefficient * Math.exp(-0.5 * standardized * standardized);
  }

  /**
   * log(φ(x)) = -0.5 * log(2π) - log(σ) - 0.5 * ((x - μ) / σ)²
   */
  logPdf(x: number): number {
    requireFinite('x', x);
    const standardized = (x - this.meanValue) / this.stdDevValue;
    return -0.5 * LOG_TWO_PI - Math.log(this.stdDevValue) - 0.5 * standardized * standardized;
  }

  cdf(x: number): number {
    requireFinite('x', x);
    return standardNormalCdf(this.standardize(x));
  }

  sf(x: number): number {
    requireFinite('x', x);
    return standardNormalSf(this.standardize(x));
  }

  quantile(p: number): number {
    requireProbability('p', p);
    if (p === 0) return -Infinity;
    if (p === 1) return Infinity;
    return this.meanValue + this.stdDevValue * standardNormalQuantile(p);
  }

  mean(): number {
    return this.meanValue;
  }

  variance(): number {
    return this.stdDevValue * this.stdDevValue;
  }

  support(): { min: number; max: number } {
    return { min: -Infinity, max: Infinity };
  }

  stdDev(): number {
    return this.stdDevValue;
  }

  /**
   * Standardize a value: (x - μ) / σ
   */
  standardize(x: number): number {
    return (x - this.meanValue) / this.stdDevValue;
  }

  getParameters(): { mean: number; stdDev: number } {
    return { mean: this.meanValue, stdDev: this.stdDevValue };
  }
}
