/**
 * Student's t Distribution
 *
 * Tail probabilities come from the regularized incomplete beta function,
 * evaluated on whichever of t²/(ν+t²) or ν/(ν+t²) keeps the result free
 * of cancellation, so small and very large ν are both handled.
 */

import { logGammaRatio, regularizedBeta } from '../utils/math/special';
import { solveQuantile } from '../utils/math/quantile';
import { requireFinite, requirePositive, requireProbability } from '../utils/validation';
import { DEFAULT_CONFIG, type EngineConfig } from '../config';
import type { Distribution } from './Distribution';
import { standardNormalQuantile } from './NormalDistribution';

export class StudentTDistribution implements Distribution {
  private readonly logNormalizer: number;

  constructor(
    private readonly df: number,
    private readonly config: EngineConfig = DEFAULT_CONFIG
  ) {
    requirePositive('degreesOfFreedom', df);
    this.logNormalizer = -logGammaRatio(0.5, df / 2) - 0.5 * Math.log(df * Math.PI);
  }

  pdf(x: number): number {
    return Math.exp(this.logPdf(x));
  }

  logPdf(x: number): number {
    requireFinite('x', x);
    return this.logNormalizer - ((this.df + 1) / 2) * Math.log1p((x * x) / this.df);
  }

  /**
   * P(T > |x|)
   */
  private upperTail(x: number): number {
    const t2 = x * x;
    const df = this.df;
    if (t2 < df) {
      return 0.5 * (1 - regularizedBeta(t2 / (df + t2), 0.5, df / 2, this.config.maxIterations));
    }
    return 0.5 * regularizedBeta(df / (df + t2), df / 2, 0.5, this.config.maxIterations);
  }

  cdf(x: number): number {
    requireFinite('x', x);
    if (x === 0) return 0.5;
    const tail = this.upperTail(x);
    return x > 0 ? 1 - tail : tail;
  }

  sf(x: number): number {
    requireFinite('x', x);
    if (x === 0) return 0.5;
    const tail = this.upperTail(x);
    return x > 0 ? tail : 1 - tail;
  }

  quantile(p: number): number {
    requireProbability('p', p);
    if (p === 0) return -Infinity;
    if (p === 1) return Infinity;
    if (p === 0.5) return 0;

    const df = this.df;
    if (df === 1) {
      return Math.tan(Math.PI * (p - 0.5));
    }
    if (df === 2) {
      return (2 * p - 1) / Math.sqrt(2 * p * (1 - p));
    }

    return solveQuantile({
      p,
      cdf: (x) => this.cdf(x),
      sf: (x) => this.sf(x),
      pdf: (x) => this.pdf(x),
      initial: this.initialQuantile(p),
      lower: -Infinity,
      upper: Infinity,
      tolerance: this.config.quantileTolerance,
      maxIterations: this.config.quantileMaxIterations,
    });
  }

  /**
   * Cornish-Fisher expansion of the t quantile around the normal quantile
   */
  private initialQuantile(p: number): number {
    const z = standardNormalQuantile(p);
    const df = this.df;
    const z2 = z * z;
    const g1 = (z * (z2 + 1)) / 4;
    const g2 = (z * ((5 * z2 + 16) * z2 + 3)) / 96;
    const g3 = (z * (((3 * z2 + 19) * z2 + 17) * z2 - 15)) / 384;
    const g4 = (z * ((((79 * z2 + 776) * z2 + 1482) * z2 - 1920) * z2 - 945)) / 92160;
    const estimate = z + g1 / df + g2 / df ** 2 + g3 / df ** 3 + g4 / df ** 4;
    return Number.isFinite(estimate) ? estimate : z;
  }

  mean(): number {
    return this.df > 1 ? 0 : NaN;
  }

  variance(): number {
    if (this.df > 2) return this.df / (this.df - 2);
    return this.df > 1 ? Infinity : NaN;
  }

  support(): { min: number; max: number } {
    return { min: -Infinity, max: Infinity };
  }

  getParameters(): { degreesOfFreedom: number } {
    return { degreesOfFreedom: this.df };
  }
}
