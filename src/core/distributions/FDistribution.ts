/**
 * F (Fisher-Snedecor) Distribution
 *
 * With d1·x/(d1·x + d2) ~ Beta(d1/2, d2/2), both tails reduce to the
 * regularized incomplete beta function.
 */

import { logBeta, regularizedBeta } from '../utils/math/special';
import { solveQuantile } from '../utils/math/quantile';
import { requireFinite, requirePositive, requireProbability } from '../utils/validation';
import { DEFAULT_CONFIG, type EngineConfig } from '../config';
import type { Distribution } from './Distribution';

export class FDistribution implements Distribution {
  constructor(
    private readonly df1: number,
    private readonly df2: number,
    private readonly config: EngineConfig = DEFAULT_CONFIG
  ) {
    requirePositive('numeratorDegreesOfFreedom', df1);
    requirePositive('denominatorDegreesOfFreedom', df2);
  }

  pdf(x: number): number {
    requireFinite('x', x);
    if (x < 0) return 0;
    if (x === 0) {
      if (this.df1 < 2) return Infinity;
      return this.df1 === 2 ? 1 : 0;
    }
    return Math.exp(this.logPdf(x));
  }

  logPdf(x: number): number {
    requireFinite('x', x);
    if (x < 0) return -Infinity;
    if (x === 0) {
      if (this.df1 < 2) return Infinity;
      return this.df1 === 2 ? 0 : -Infinity;
    }
    const { df1, df2 } = this;
    return (
      0.5 * (df1 * Math.log(df1 * x) + df2 * Math.log(df2) - (df1 + df2) * Math.log(df1 * x + df2)) -
      Math.log(x) -
      logBeta(df1 / 2, df2 / 2)
    );
  }

  cdf(x: number): number {
    requireFinite('x', x);
    if (x <= 0) return 0;
    const scaled = this.df1 * x;
    return regularizedBeta(
      scaled / (scaled + this.df2),
      this.df1 / 2,
      this.df2 / 2,
      this.config.maxIterations
    );
  }

  sf(x: number): number {
    requireFinite('x', x);
    if (x <= 0) return 1;
    return regularizedBeta(
      this.df2 / (this.df2 + this.df1 * x),
      this.df2 / 2,
      this.df1 / 2,
      this.config.maxIterations
    );
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
      initial: this.df2 > 2 ? this.df2 / (this.df2 - 2) : 1,
      lower: 0,
      upper: Infinity,
      tolerance: this.config.quantileTolerance,
      maxIterations: this.config.quantileMaxIterations,
    });
  }

  mean(): number {
    return this.df2 > 2 ? this.df2 / (this.df2 - 2) : NaN;
  }

  variance(): number {
    const { df1, df2 } = this;
    if (df2 <= 4) return df2 > 2 ? Infinity : NaN;
    return (2 * df2 * df2 * (df1 + df2 - 2)) / (df1 * (df2 - 2) ** 2 * (df2 - 4));
  }

  support(): { min: number; max: number } {
    return { min: 0, max: Infinity };
  }

  getParameters(): { numeratorDegreesOfFreedom: number; denominatorDegreesOfFreedom: number } {
    return { numeratorDegreesOfFreedom: this.df1, denominatorDegreesOfFreedom: this.df2 };
  }
}
