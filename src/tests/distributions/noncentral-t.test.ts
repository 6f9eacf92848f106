/**
 * Tests for the noncentral t distribution
 */

import { describe, it, expect } from 'vitest';
import jStat from 'jstat';
import { NoncentralTDistribution, StudentTDistribution } from '../../core/distributions';
import { resolveConfig } from '../../core/config';
import { ErrorCode } from '../../core/errors';
import { captureError } from '../utilities/captureError';

describe('NoncentralTDistribution', () => {
  it('should expose its parameters', () => {
    expect(new NoncentralTDistribution(10, 1.5).getParameters()).toEqual({
      degreesOfFreedom: 10,
      noncentrality: 1.5,
    });
  });

  it('should reject invalid parameters', () => {
    expect(captureError(() => new NoncentralTDistribution(0, 1)).code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(captureError(() => new NoncentralTDistribution(5, NaN)).code).toBe(ErrorCode.INVALID_PARAMETER);
  });

  it('should reduce to the central t at zero noncentrality', () => {
    const central = new StudentTDistribution(7);
    const noncentral = new NoncentralTDistribution(7, 0);
    for (const x of [-2.5, -0.3, 0, 1.1, 4]) {
      expect(Math.abs(noncentral.cdf(x) - central.cdf(x))).toBeLessThan(1e-9);
    }
  });

  it('should stay continuous as noncentrality shrinks toward zero', () => {
    const central = new StudentTDistribution(7);
    const nearlyCentral = new NoncentralTDistribution(7, 1e-12);
    for (const x of [-2.5, -0.3, 0, 1.1, 4]) {
      expect(Math.abs(nearlyCentral.cdf(x) - central.cdf(x))).toBeLessThan(1e-9);
      expect(Math.abs(nearlyCentral.sf(x) - central.sf(x))).toBeLessThan(1e-9);
    }
  });

  it('should reproduce reference values', () => {
    expect(new NoncentralTDistribution(10, 1).cdf(2)).toBeCloseTo(0.807611562530311, 9);
    expect(new NoncentralTDistribution(10, 1).cdf(-1)).toBeCloseTo(0.026801856769495647, 9);
    expect(new NoncentralTDistribution(20, 2.5).sf(3)).toBeCloseTo(0.33839712650687503, 9);
    expect(new NoncentralTDistribution(8, -0.5).cdf(1.5)).toBeCloseTo(0.9669485805752511, 9);
  });

  it('should agree with jStat', () => {
    for (const [x, df, ncp] of [
      [2, 10, 1],
      [-1, 10, 1],
      [0.4, 5, -1.2],
      [3.5, 30, 2.8],
    ]) {
      expect(new NoncentralTDistribution(df, ncp).cdf(x)).toBeCloseTo(jStat.noncentralt.cdf(x, df, ncp), 6);
    }
  });

  it('should keep cdf + sf = 1', () => {
    const nct = new NoncentralTDistribution(15, 0.7);
    expect(nct.cdf(1.2) + nct.sf(1.2)).toBeCloseTo(1, 14);
  });

  it('should use the normal approximation for very large noncentrality', () => {
    const value = new NoncentralTDistribution(30, 40).cdf(40);
    expect(value).toBeCloseTo(0.4747349723614869, 9);
  });

  it('should throw CONVERGENCE_FAILURE when the series cap is exceeded', () => {
    const config = resolveConfig({ noncentralMaxIterations: 1 });
    const error = captureError(() => new NoncentralTDistribution(10, 3, config).cdf(2));
    expect(error.code).toBe(ErrorCode.CONVERGENCE_FAILURE);
    expect(error.message).toBe('Noncentral t series did not converge within 1 iterations');
  });
});
