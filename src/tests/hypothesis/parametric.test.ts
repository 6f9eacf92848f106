/**
 * Tests for the two-sample t-test and one-way ANOVA
 */

import { describe, it, expect } from 'vitest';
import { tTest, anova } from '../../hypothesis/parametric';
import { TestType } from '../../domain/results';
import { ErrorCode } from '../../core/errors';
import { captureError } from '../utilities/captureError';

const CONTROL = [10, 12, 9, 11];
const TREATMENT = [15, 14, 16, 13];

describe('tTest', () => {
  describe("Welch's test (default)", () => {
    it('should reproduce the reference example', () => {
      const result = tTest(CONTROL, TREATMENT);

      expect(result.testName).toBe("Welch's t-test");
      expect(result.testType).toBe(TestType.TTest);
      // t = (10.5 - 14.5) / √(5/12 + 5/12)
      expect(result.statistic).toBeCloseTo(-4.381780460041329, 12);
      expect(result.degreesOfFreedom).toHaveLength(1);
      expect(result.degreesOfFreedom[0]).toBeCloseTo(6, 12);
      expect(result.pValue).toBeCloseTo(0.004659214943993942, 12);
      expect(result.isSignificant).toBe(true);
    });

    it('should report the intermediate values', () => {
      const { parameters } = tTest(CONTROL, TREATMENT);

      expect(parameters.mean1).toBe(10.5);
      expect(parameters.mean2).toBe(14.5);
      expect(parameters.variance1).toBeCloseTo(5 / 3, 14);
      expect(parameters.variance2).toBeCloseTo(5 / 3, 14);
      expect(parameters.sampleSize1).toBe(4);
      expect(parameters.sampleSize2).toBe(4);
      expect(parameters.standardError).toBeCloseTo(Math.sqrt(5 / 6), 14);
      expect(parameters.cohensD).toBeCloseTo(-3.0983866769659336, 12);
    });

    it('should use Welch-Satterthwaite degrees of freedom for unequal variances', () => {
      const result = tTest([1, 2, 3, 4], [2, 4, 6]);

      expect(result.statistic).toBeCloseTo(-1.1338934190276817, 12);
      expect(result.degreesOfFreedom[0]).toBeCloseTo(3.234718826405868, 12);
      expect(result.pValue).toBeCloseTo(0.33382370007750106, 10);
      expect(result.isSignificant).toBe(false);
    });

    it('should be unaffected by the scale of the data', () => {
      const scaled = tTest([1e-100, 2e-100, 3e-100], [4e-100, 5e-100, 7e-100]);
      const unscaled = tTest([1, 2, 3], [4, 5, 7]);

      expect(unscaled.statistic).toBeCloseTo(-Math.sqrt(10), 12);
      expect(unscaled.degreesOfFreedom[0]).toBeCloseTo(100 / 29, 12);
      expect(scaled.statistic).toBeCloseTo(unscaled.statistic, 10);
      expect(scaled.degreesOfFreedom[0]).toBeCloseTo(unscaled.degreesOfFreedom[0], 10);
      expect(scaled.pValue).toBeCloseTo(unscaled.pValue, 10);
    });
  });

  describe("Student's test (equalVariance)", () => {
    it('should pool the variances', () => {
      const result = tTest([1, 2, 3, 4], [2, 4, 6], { equalVariance: true });

      expect(result.testName).toBe("Student's t-test");
      expect(result.statistic).toBeCloseTo(-1.2179969144117253, 12);
      expect(result.degreesOfFreedom).toEqual([5]);
      expect(result.pValue).toBeCloseTo(0.27756051996351794, 10);
      expect(result.parameters.cohensD).toBeCloseTo(-0.9302605094190634, 12);
    });

    it('should be antisymmetric in its samples', () => {
      const a = [2.1, 3.4, 1.9, 5.0, 4.4];
      const b = [6.2, 5.1, 7.7, 4.9];
      const forward = tTest(a, b, { equalVariance: true });
      const backward = tTest(b, a, { equalVariance: true });

      expect(backward.statistic).toBeCloseTo(-forward.statistic, 12);
      expect(backward.pValue).toBeCloseTo(forward.pValue, 12);
    });
  });

  describe('options', () => {
    it('should honour a custom alpha', () => {
      const result = tTest(CONTROL, TREATMENT, { alpha: 0.001 });

      expect(result.alpha).toBe(0.001);
      expect(result.isSignificant).toBe(false);
      expect(result.interpretation).toBe(
        'Fail to reject the null hypothesis at α=0.001: p=0.0047 >= 0.001. ' +
          'Insufficient evidence against: μ₁ = μ₂ (means are equal).'
      );
    });

    it('should use the default hypothesis labels', () => {
      const result = tTest(CONTROL, TREATMENT);

      expect(result.nullHypothesis).toBe('μ₁ = μ₂ (means are equal)');
      expect(result.alternativeHypothesis).toBe('μ₁ ≠ μ₂ (means are different)');
      expect(result.interpretation).toBe(
        'Reject the null hypothesis at α=0.05: p=0.0047 < 0.05. ' +
          'Evidence supports: μ₁ ≠ μ₂ (means are different).'
      );
    });

    it('should carry custom hypothesis labels', () => {
      const result = tTest(CONTROL, TREATMENT, {
        nullHypothesis: 'The new layout has no effect',
        alternativeHypothesis: 'The new layout changes the score',
      });

      expect(result.nullHypothesis).toBe('The new layout has no effect');
      expect(result.interpretation).toContain('Evidence supports: The new layout changes the score.');
    });

    it('should take the default alpha from the config override', () => {
      expect(tTest(CONTROL, TREATMENT, { config: { alpha: 0.001 } }).alpha).toBe(0.001);
    });
  });

  describe('errors', () => {
    it('should require at least two observations per sample', () => {
      const error = captureError(() => tTest([1], [2, 3]));
      expect(error.code).toBe(ErrorCode.INSUFFICIENT_DATA);
      expect(error.context).toEqual({ sample: 'sample1', actualCount: 1, minimumRequired: 2 });
    });

    it('should reject two constant samples', () => {
      expect(captureError(() => tTest([1, 1], [2, 2])).code).toBe(ErrorCode.INSUFFICIENT_DATA);
    });

    it('should reject non-finite observations', () => {
      const error = captureError(() => tTest([1, 2, NaN], [2, 3]));
      expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
      expect(error.context).toEqual({ sample: 'sample1', index: 2, value: NaN });
    });

    it('should reject alpha outside (0, 1)', () => {
      expect(captureError(() => tTest(CONTROL, TREATMENT, { alpha: 0 })).code).toBe(
        ErrorCode.INVALID_PARAMETER
      );
      expect(captureError(() => tTest(CONTROL, TREATMENT, { alpha: 1 })).code).toBe(
        ErrorCode.INVALID_PARAMETER
      );
    });
  });
});

describe('anova', () => {
  it('should compute F for three separated groups', () => {
    const result = anova([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
    ]);

    expect(result.testName).toBe('One-way ANOVA');
    expect(result.testType).toBe(TestType.ANOVA);
    expect(result.statistic).toBe(27);
    expect(result.degreesOfFreedom).toEqual([2, 6]);
    // F(2, 6) upper tail: (1 + 2·27/6)^-3 = 10^-3
    expect(result.pValue).toBeCloseTo(0.001, 14);
    expect(result.isSignificant).toBe(true);
    expect(result.parameters).toEqual({
      ssb: 54,
      ssw: 6,
      dfBetween: 2,
      dfWithin: 6,
      msb: 27,
      msw: 1,
      grandMean: 5,
      totalN: 9,
      groups: 3,
      etaSquared: 0.9,
    });
  });

  it('should equal the squared pooled t for two groups', () => {
    const groups = [
      [2.1, 3.4, 1.9, 5.0, 4.4],
      [6.2, 5.1, 7.7, 4.9],
    ];
    const f = anova(groups);
    const t = tTest(groups[0], groups[1], { equalVariance: true });

    expect(Math.abs(f.statistic - t.statistic ** 2) / f.statistic).toBeLessThan(1e-6);
    expect(f.pValue).toBeCloseTo(t.pValue, 10);
  });

  it('should reproduce the reference example as a two-group layout', () => {
    const result = anova([CONTROL, TREATMENT]);

    expect(result.statistic).toBeCloseTo(19.2, 12);
    expect(result.pValue).toBeCloseTo(0.004659214943993942, 12);
    expect(result.parameters.etaSquared).toBeCloseTo(32 / 42, 14);
  });

  it('should use custom labels', () => {
    const result = anova(
      [
        [1, 2, 3],
        [4, 5, 6],
      ],
      { nullHypothesis: 'Same yield', alternativeHypothesis: 'Different yield' }
    );
    expect(result.nullHypothesis).toBe('Same yield');
    expect(result.alternativeHypothesis).toBe('Different yield');
  });

  describe('errors', () => {
    it('should require at least two groups', () => {
      expect(captureError(() => anova([[1, 2, 3]])).code).toBe(ErrorCode.INSUFFICIENT_DATA);
    });

    it('should require two observations per group', () => {
      const error = captureError(() => anova([[1, 2], [3]]));
      expect(error.code).toBe(ErrorCode.INSUFFICIENT_DATA);
      expect(error.context).toEqual({ sample: 'group 2', actualCount: 1, minimumRequired: 2 });
    });

    it('should reject groups without within-group variation', () => {
      expect(
        captureError(() =>
          anova([
            [1, 1],
            [2, 2],
          ])
        ).code
      ).toBe(ErrorCode.INSUFFICIENT_DATA);
    });
  });
});
