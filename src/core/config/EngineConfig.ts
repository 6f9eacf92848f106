/**
 * Engine configuration
 *
 * Numerical tolerances, iteration caps and defaults shared by the
 * distributions, tests and power analysis. Every iterative routine
 * reads its cap from here so it is guaranteed to terminate.
 */

import { z } from 'zod';
import { HypothesisError, ErrorCode } from '../errors';

export interface EngineConfig {
  /** Default significance level when a call does not pass one */
  alpha: number;
  /** Cap for incomplete gamma/beta series and continued fractions */
  maxIterations: number;
  /** Relative tolerance for quantile searches */
  quantileTolerance: number;
  /** Cap for quantile Newton/bisection steps */
  quantileMaxIterations: number;
  /** Cap for the noncentral-t series */
  noncentralMaxIterations: number;
  /** Error bound at which the noncentral-t series stops */
  noncentralTolerance: number;
  /** Cap for the sample-size bracket + bisection search */
  sampleSizeMaxIterations: number;
  /** Largest per-sample size for which Mann-Whitney may use the exact distribution */
  mannWhitneyExactThreshold: number;
}

/** Hard ceiling on per-sample sizes for the exact Mann-Whitney distribution */
export const MANN_WHITNEY_EXACT_LIMIT = 50;

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  alpha: 0.05,
  maxIterations: 10000,
  quantileTolerance: 1e-12,
  quantileMaxIterations: 200,
  noncentralMaxIterations: 1000,
  noncentralTolerance: 1e-12,
  sampleSizeMaxIterations: 200,
  mannWhitneyExactThreshold: 20,
});

const probability = z.number().gt(0).lt(1);
const positiveInt = z.number().int().positive();

const EngineConfigSchema = z
  .object({
    alpha: probability,
    maxIterations: positiveInt,
    quantileTolerance: z.number().positive().lt(1),
    quantileMaxIterations: positiveInt,
    noncentralMaxIterations: positiveInt,
    noncentralTolerance: z.number().positive().lt(1),
    sampleSizeMaxIterations: positiveInt,
    mannWhitneyExactThreshold: z.number().int().nonnegative().max(MANN_WHITNEY_EXACT_LIMIT),
  })
  .strict();

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @throws HypothesisError INVALID_PARAMETER when a value is out of range
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
  if (!parsed.success) {
    throw new HypothesisError(ErrorCode.INVALID_PARAMETER, 'Invalid engine configuration', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

// A blank variable counts as unset rather than coercing to 0
const envNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().optional()
);

const EnvSchema = z.object({
  HYPOTHESIS_ALPHA: envNumber,
  HYPOTHESIS_MAX_ITERATIONS: envNumber,
  HYPOTHESIS_EXACT_THRESHOLD: envNumber,
});

/**
 * Read configuration overrides from environment variables.
 * Unset variables are left to the defaults; the values are validated
 * when passed through resolveConfig.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new HypothesisError(ErrorCode.INVALID_INPUT, 'Invalid environment configuration', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const overrides: Partial<EngineConfig> = {};
  const { HYPOTHESIS_ALPHA, HYPOTHESIS_MAX_ITERATIONS, HYPOTHESIS_EXACT_THRESHOLD } = parsed.data;
  if (HYPOTHESIS_ALPHA !== undefined) overrides.alpha = HYPOTHESIS_ALPHA;
  if (HYPOTHESIS_MAX_ITERATIONS !== undefined) overrides.maxIterations = HYPOTHESIS_MAX_ITERATIONS;
  if (HYPOTHESIS_EXACT_THRESHOLD !== undefined) {
    overrides.mannWhitneyExactThreshold = HYPOTHESIS_EXACT_THRESHOLD;
  }
  return overrides;
}
