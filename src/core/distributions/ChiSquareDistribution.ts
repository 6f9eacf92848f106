/**
 * Chi-square Distribution
 * CDF(x) = P(ν/2, x/2), the lower regularized incomplete gamma.
 * Fractional ν is allowed.
 */

import { logGamma, regularizedGammaP, regularizedGammaQ } from '../utils/math/special';
import { solveQuantile } from '../utils/math/quantile';
import { requireFinite, requirePositive, requireProbability } from '../utils/validation';
import { DEFAULT_CONFIG, type EngineConfig } from '../config';
import type { Distribution } from './Distribution';
import { standardNormalQuantile } from './NormalDistribution';

export class ChiSquareDistribution implements Distribution {
  constructor(
    private readonly df: number,
    private readonly config: EngineConfig = DEFAULT_CONFIG
  ) {
    requirePositive('degreesOfFreedom', df);
  }

  pdf(x: number): number {
    requireFinite('x', x);
    if (x < 0) return 0;
    if (x === 0) {
      if (this.df < 2) return Infinity;
      return this.df === 2 ? 0.5 : 0;
    }
    return Math.exp(this.logPdf(x));
  }

  /**
   * log f(x) = (ν/2 - 1) log x - x/2 - (ν/2) log 2 - log Γ(ν/2)
   */
  logPdf(x: number): number {
    requireFinite('x', x);
    if (x < 0) return -Infinity;
    const k = this.df / 2;
    if (x === 0) {
      if (k < 1) return Infinity;
      return k === 1 ? Math.log(0.5) : -Infinity;
    }
    return (k - 1) * Math.log(x) - x / 2 - k * Math.LN2 - logGamma(k);
  }

  cdf(x: number): number {
    requireFinite('x', x);
    if (x <= 0) return 0;
    return regularizedGammaP(this.df / 2, x / 2, this.config.maxIterations);
  }

  sf(x: number): number {
    requireFinite('x', x);
    if (x <= 0) return 1;
    return regularizedGammaQ(this.df / 2, x / 2, this.config.maxIterations);
  }

  quantile(p: number): number {
    requireProbability('p', p);
    if (p === 0) return 0;
    if (p === 1) return Infinity;

    return solveQuantile({
      p,
      cdf: (x) => this.cdf(x),
      sf: (x) => this.sf(x),
      pdf: (x) => this.pdf(x),
      initial: this.initialQuantile(p),
      lower: 0,
      upper: Infinity,
      tolerance: this.config.quantileTolerance,
      maxIterations: this.config.quantileMaxIterations,
    });
  }

  /**
   * Wilson-Hilferty cube-root approximation
   */
  private initialQuantile(p: number): number {
    const z = standardNormalQuantile(p);
    const h = 2 / (9 * this.df);
    const cube = 1 - h + z * Math.sqrt(h);
    const estimate = this.df * cube * cube * cube;
    return estimate > 0 ? estimate : this.df * 0.01;
  }

  mean(): number {
    return this.df;
  }

  variance(): number {
    return 2 * this.df;
  }

  support(): { min: number; max: number } {
    return { min: 0, max: Infinity };
  }

  getParameters(): { degreesOfFreedom: number } {
    return { degreesOfFreedom: this.df };
  }
}
