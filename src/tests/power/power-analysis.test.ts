/**
 * Tests for two-sample t-test power and sample-size calculations
 */

import { describe, it, expect } from 'vitest';
import { powerAnalysis, requiredSampleSize, sampleSizeAnalysis } from '../../power/powerAnalysis';
import { TestType } from '../../domain/results';
import { ErrorCode } from '../../core/errors';
import { captureError } from '../utilities/captureError';

describe('powerAnalysis', () => {
  it('should reproduce the medium-effect reference point', () => {
    const result = powerAnalysis(0.5, 64);

    expect(result.testType).toBe(TestType.PowerAnalysis);
    expect(result.power).toBeCloseTo(0.8014595579223075, 9);
    expect(result.degreesOfFreedom).toBe(126);
    expect(result.noncentrality).toBeCloseTo(2 * Math.SQRT2, 14);
    expect(result.criticalValue).toBeCloseTo(1.9789706019906252, 10);
    expect(result.significanceLevel).toBe(0.05);
  });

  it('should reproduce a small-sample reference point', () => {
    expect(powerAnalysis(1, 10).power).toBeCloseTo(0.5620066465862329, 9);
  });

  it('should lose power at a stricter alpha', () => {
    const result = powerAnalysis(0.5, 64, 0.01);
    expect(result.significanceLevel).toBe(0.01);
    expect(result.power).toBeCloseTo(0.5852510203722324, 9);
  });

  it('should equal alpha when there is no effect', () => {
    expect(Math.abs(powerAnalysis(0, 30).power - 0.05)).toBeLessThan(1e-3);
    expect(Math.abs(powerAnalysis(0, 30, 0.1).power - 0.1)).toBeLessThan(1e-3);
  });

  it('should increase with the sample size', () => {
    const powers = [2, 3, 5, 8, 13, 21, 34, 55].map((n) => powerAnalysis(0.5, n).power);
    for (let i = 1; i < powers.length; i++) {
      expect(powers[i]).toBeGreaterThan(powers[i - 1]);
    }
  });

  it('should depend only on the magnitude of the effect', () => {
    expect(powerAnalysis(-0.5, 64).power).toBeCloseTo(powerAnalysis(0.5, 64).power, 12);
  });

  it('should reject invalid arguments', () => {
    expect(captureError(() => powerAnalysis(0.5, 1)).code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(captureError(() => powerAnalysis(0.5, 10.5)).code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(captureError(() => powerAnalysis(NaN, 10)).code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(captureError(() => powerAnalysis(0.5, 10, 1)).code).toBe(ErrorCode.INVALID_PARAMETER);
  });

  it('should omit the sample-size fields from JSON', () => {
    expect(powerAnalysis(0.5, 64).toJSON()).not.toHaveProperty('requiredSampleSize');
  });
});

describe('requiredSampleSize', () => {
  it.each([
    [0.2, 0.8, 394],
    [0.5, 0.8, 64],
    [0.8, 0.8, 26],
    [0.5, 0.9, 86],
    [2, 0.8, 6],
  ])('should find n for d = %f at power %f', (effectSize, targetPower, expected) => {
    expect(requiredSampleSize(effectSize, targetPower)).toBe(expected);
  });

  it('should return the smallest n that reaches the target', () => {
    const n = requiredSampleSize(0.8, 0.8);
    expect(powerAnalysis(0.8, n).power).toBeGreaterThanOrEqual(0.8);
    expect(powerAnalysis(0.8, n - 1).power).toBeLessThan(0.8);
  });

  it('should return the minimum group size when it already suffices', () => {
    expect(requiredSampleSize(10, 0.5)).toBe(2);
  });

  it('should treat negative effects like positive ones', () => {
    expect(requiredSampleSize(-0.5, 0.8)).toBe(64);
  });

  it('should reject a zero effect size', () => {
    const error = captureError(() => requiredSampleSize(0, 0.8));
    expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(error.context).toEqual({ effectSize: 0, targetPower: 0.8 });
  });

  it('should reject a target power outside (0, 1)', () => {
    expect(captureError(() => requiredSampleSize(0.5, 1)).code).toBe(ErrorCode.INVALID_PARAMETER);
    expect(captureError(() => requiredSampleSize(0.5, 0)).code).toBe(ErrorCode.INVALID_PARAMETER);
  });

  it('should throw CONVERGENCE_FAILURE when the search cap is exceeded', () => {
    const error = captureError(() =>
      requiredSampleSize(0.2, 0.8, 0.05, { config: { sampleSizeMaxIterations: 2 } })
    );
    expect(error.code).toBe(ErrorCode.CONVERGENCE_FAILURE);
    expect(error.message).toBe('Sample size search did not converge within 2 iterations');
  });
});

describe('sampleSizeAnalysis', () => {
  it('should report the solved n with its achieved power', () => {
    const result = sampleSizeAnalysis(0.5, 0.8);

    expect(result.requiredSampleSize).toBe(64);
    expect(result.sampleSizePerGroup).toBe(64);
    expect(result.targetPower).toBe(0.8);
    expect(result.power).toBeCloseTo(0.8014595579223075, 9);
    expect(result.toJSON()).toMatchObject({ requiredSampleSize: 64, targetPower: 0.8 });
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(sampleSizeAnalysis(0.8, 0.8))).toBe(true);
  });
});
