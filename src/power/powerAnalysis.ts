/**
 * Power analysis for the two-sided, two-sample t-test with equal group
 * sizes, through the noncentral t distribution
 */

import { HypothesisError, ErrorCode } from '../core/errors';
import { resolveConfig, type EngineConfig } from '../core/config';
import { StudentTDistribution, NoncentralTDistribution } from '../core/distributions';
import { requireFinite, requireOpenUnitInterval } from '../core/utils/validation';
import { PowerAnalysisResult } from '../domain/results';

export interface PowerOptions {
  /** Numerical overrides for this call */
  config?: Partial<EngineConfig>;
}

const MIN_GROUP_SIZE = 2;

function requireGroupSize(n: number): void {
  if (!Number.isInteger(n) || n < MIN_GROUP_SIZE) {
    throw new HypothesisError(
      ErrorCode.INVALID_PARAMETER,
      `Sample size per group must be an integer of at least ${MIN_GROUP_SIZE}`,
      { sampleSizePerGroup: n }
    );
  }
}

/**
 * Power at n per group. df = 2n - 2, ncp = d·√(n/2),
 * power = P(T > t_crit) + P(T < -t_crit) under the noncentral t.
 */
function computePower(
  effectSize: number,
  n: number,
  alpha: number,
  config: EngineConfig
): { power: number; df: number; ncp: number; criticalValue: number } {
  const df = 2 * n - 2;
  const ncp = effectSize * Math.sqrt(n / 2);
  const criticalValue = new StudentTDistribution(df, config).quantile(1 - alpha / 2);
  const noncentral = new NoncentralTDistribution(df, ncp, config);
  const power = noncentral.sf(criticalValue) + noncentral.cdf(-criticalValue);
  return { power, df, ncp, criticalValue };
}

/**
 * Statistical power of the two-sample t-test
 *
 * @param effectSize - Cohen's d
 * @param sampleSizePerGroup - integer >= 2
 * @param alpha - two-sided significance level (defaults to the configured 0.05)
 */
export function powerAnalysis(
  effectSize: number,
  sampleSizePerGroup: number,
  alpha?: number,
  options: PowerOptions = {}
): PowerAnalysisResult {
  const config = resolveConfig(options.config);
  const significanceLevel = alpha ?? config.alpha;
  requireFinite('effectSize', effectSize);
  requireGroupSize(sampleSizePerGroup);
  requireOpenUnitInterval('alpha', significanceLevel);

  const { power, df, ncp, criticalValue } = computePower(
    effectSize,
    sampleSizePerGroup,
    significanceLevel,
    config
  );

  return new PowerAnalysisResult({
    effectSize,
    sampleSizePerGroup,
    power,
    significanceLevel,
    degreesOfFreedom: df,
    noncentrality: ncp,
    criticalValue,
  });
}

/**
 * Smallest n per group whose power reaches the target
 *
 * Power is increasing in n for a fixed non-zero effect, so the search
 * doubles n until the target is bracketed and then bisects on integers.
 *
 * @throws HypothesisError INVALID_PARAMETER for a zero effect size or a
 *   target outside (0, 1)
 * @throws HypothesisError CONVERGENCE_FAILURE when the search exceeds its cap
 */
export function requiredSampleSize(
  effectSize: number,
  targetPower: number,
  alpha?: number,
  options: PowerOptions = {}
): number {
  const config = resolveConfig(options.config);
  const significanceLevel = alpha ?? config.alpha;
  requireFinite('effectSize', effectSize);
  requireOpenUnitInterval('targetPower', targetPower);
  requireOpenUnitInterval('alpha', significanceLevel);
  if (effectSize === 0) {
    throw new HypothesisError(
      ErrorCode.INVALID_PARAMETER,
      'A zero effect size cannot reach any power above alpha',
      { effectSize, targetPower }
    );
  }

  const maxIterations = config.sampleSizeMaxIterations;
  const reaches = (n: number) =>
    computePower(effectSize, n, significanceLevel, config).power >= targetPower;
  const failure = () =>
    new HypothesisError(
      ErrorCode.CONVERGENCE_FAILURE,
      `Sample size search did not converge within ${maxIterations} iterations`,
      { effectSize, targetPower, alpha: significanceLevel, maxIterations }
    );

  if (reaches(MIN_GROUP_SIZE)) return MIN_GROUP_SIZE;

  let iterations = 0;
  let lo = MIN_GROUP_SIZE;
  let hi = 2 * MIN_GROUP_SIZE;
  while (!reaches(hi)) {
    if (++iterations > maxIterations) throw failure();
    lo = hi;
    hi *= 2;
  }

  // Invariant: power(lo) < target <= power(hi)
  while (hi - lo > 1) {
    if (++iterations > maxIterations) throw failure();
    const mid = Math.floor((lo + hi) / 2);
    if (reaches(mid)) hi = mid;
    else lo = mid;
  }

  return hi;
}

/**
 * Solve for n and report the achieved power at that n
 */
export function sampleSizeAnalysis(
  effectSize: number,
  targetPower: number,
  alpha?: number,
  options: PowerOptions = {}
): PowerAnalysisResult {
  const n = requiredSampleSize(effectSize, targetPower, alpha, options);
  const achieved = powerAnalysis(effectSize, n, alpha, options);

  return new PowerAnalysisResult({
    effectSize,
    sampleSizePerGroup: n,
    power: achieved.power,
    significanceLevel: achieved.significanceLevel,
    degreesOfFreedom: achieved.degreesOfFreedom,
    noncentrality: achieved.noncentrality,
    criticalValue: achieved.criticalValue,
    requiredSampleSize: n,
    targetPower,
  });
}
