/**
 * Parametric tests: two-sample t-test (Welch or pooled) and one-way ANOVA
 */

import { HypothesisError, ErrorCode } from '../core/errors';
import { StudentTDistribution, FDistribution } from '../core/distributions';
import { mean, sampleVariance, sumOfSquares } from '../core/utils/math/descriptive';
import { DataValidator } from '../domain/validation/DataValidator';
import { StatisticalTestResult, TestType, type TestOptions } from '../domain/results';
import { resolveTestContext } from './context';

export interface TTestOptions extends TestOptions {
  /** Pool the variances (Student's t-test); default false (Welch) */
  equalVariance?: boolean;
}

const T_TEST_LABELS = {
  nullHypothesis: 'μ₁ = μ₂ (means are equal)',
  alternativeHypothesis: 'μ₁ ≠ μ₂ (means are different)',
};

const ANOVA_LABELS = {
  nullHypothesis: 'All group means are equal',
  alternativeHypothesis: 'At least one group mean is different',
};

/**
 * Two-sample t-test for a difference in means
 *
 * Welch's test by default, with Welch–Satterthwaite degrees of freedom;
 * `equalVariance: true` pools the variances and uses n1 + n2 - 2.
 * The p-value is two-tailed.
 *
 * @throws HypothesisError INSUFFICIENT_DATA when a sample has fewer than 2
 *   observations, or when both samples are constant (zero standard error)
 */
export function tTest(
  sample1: readonly number[],
  sample2: readonly number[],
  options: TTestOptions = {}
): StatisticalTestResult {
  const { alpha, config, labels } = resolveTestContext(options, T_TEST_LABELS);
  const equalVariance = options.equalVariance ?? false;

  DataValidator.validateSample(sample1, 'sample1', 2);
  DataValidator.validateSample(sample2, 'sample2', 2);

  const n1 = sample1.length;
  const n2 = sample2.length;
  const mean1 = mean(sample1);
  const mean2 = mean(sample2);
  const variance1 = sampleVariance(sample1);
  const variance2 = sampleVariance(sample2);
  const pooledVariance = ((n1 - 1) * variance1 + (n2 - 1) * variance2) / (n1 + n2 - 2);

  let standardError: number;
  let df: number;
  if (equalVariance) {
    standardError = Math.sqrt(pooledVariance * (1 / n1 + 1 / n2));
    df = n1 + n2 - 2;
  } else {
    const a = variance1 / n1;
    const b = variance2 / n2;
    standardError = Math.sqrt(a + b);
    // Satterthwaite df in terms of variance shares; a² and b² underflow for tiny variances
    const share1 = a / (a + b);
    const share2 = b / (a + b);
    df = 1 / ((share1 * share1) / (n1 - 1) + (share2 * share2) / (n2 - 1));
  }

  if (standardError === 0) {
    throw new HypothesisError(
      ErrorCode.INSUFFICIENT_DATA,
      'Both samples have zero variance; the t statistic is undefined',
      { mean1, mean2 }
    );
  }

  const t = (mean1 - mean2) / standardError;
  const pValue = 2 * new StudentTDistribution(df, config).sf(Math.abs(t));

  return new StatisticalTestResult({
    testName: equalVariance ? "Student's t-test" : "Welch's t-test",
    testType: TestType.TTest,
    statistic: t,
    degreesOfFreedom: [df],
    pValue,
    alpha,
    ...labels,
    parameters: {
      mean1,
      mean2,
      variance1,
      variance2,
      sampleSize1: n1,
      sampleSize2: n2,
      standardError,
      degreesOfFreedom: df,
      cohensD: pooledVariance > 0 ? (mean1 - mean2) / Math.sqrt(pooledVariance) : NaN,
    },
  });
}

/**
 * One-way analysis of variance across two or more groups
 *
 * F = (SSB / (k-1)) / (SSW / (N-k)); the p-value is the upper tail of
 * F(k-1, N-k). With two groups F equals the square of the pooled t.
 *
 * @throws HypothesisError INSUFFICIENT_DATA with fewer than 2 groups, a group
 *   with fewer than 2 observations, or no within-group variation
 */
export function anova(
  groups: readonly (readonly number[])[],
  options: TestOptions = {}
): StatisticalTestResult {
  const { alpha, config, labels } = resolveTestContext(options, ANOVA_LABELS);

  DataValidator.validateGroups(groups, 2, 2);

  const k = groups.length;
  const totalN = groups.reduce((n, group) => n + group.length, 0);
  const grandMean = mean(groups.flat());
  const groupMeans = groups.map((group) => mean(group));

  const ssb = groups.reduce(
    (acc, group, i) => acc + group.length * (groupMeans[i] - grandMean) ** 2,
    0
  );
  const ssw = groups.reduce((acc, group, i) => acc + sumOfSquares(group, groupMeans[i]), 0);

  if (ssw === 0) {
    throw new HypothesisError(
      ErrorCode.INSUFFICIENT_DATA,
      'Every group is constant; the F statistic is undefined',
      { groups: k }
    );
  }

  const dfBetween = k - 1;
  const dfWithin = totalN - k;
  const msb = ssb / dfBetween;
  const msw = ssw / dfWithin;
  const f = msb / msw;
  const pValue = new FDistribution(dfBetween, dfWithin, config).sf(f);

  return new StatisticalTestResult({
    testName: 'One-way ANOVA',
    testType: TestType.ANOVA,
    statistic: f,
    degreesOfFreedom: [dfBetween, dfWithin],
    pValue,
    alpha,
    ...labels,
    parameters: {
      ssb,
      ssw,
      dfBetween,
      dfWithin,
      msb,
      msw,
      grandMean,
      totalN,
      groups: k,
      etaSquared: ssb / (ssb + ssw),
    },
  });
}
