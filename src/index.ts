/**
 * hypothesis-engine - classical hypothesis tests and power analysis
 *
 * Two-sample t-tests, one-way ANOVA, chi-square tests of independence,
 * the Mann-Whitney U test and t-test power analysis, each returning an
 * immutable result with a p-value, a significance decision and a
 * plain-language interpretation.
 */

// Error handling
export { HypothesisError, ErrorCode, isHypothesisError, wrapError } from './core/errors';

// Configuration
export { DEFAULT_CONFIG, resolveConfig, configFromEnv } from './core/config';
export type { EngineConfig } from './core/config';

// Logging
export { logger, createLogger } from './core/logger';
export type { Logger, LoggerContext } from './core/logger';

// Special functions
export {
  logGamma,
  logBeta,
  logGammaRatio,
  regularizedGammaP,
  regularizedGammaQ,
  regularizedBeta,
  erf,
  erfc,
} from './core/utils/math/special';

// Reference distributions
export {
  NormalDistribution,
  StudentTDistribution,
  ChiSquareDistribution,
  FDistribution,
  NoncentralTDistribution,
  standardNormalCdf,
  standardNormalSf,
  standardNormalQuantile,
  createStandardNormal,
} from './core/distributions';
export type { Distribution, CumulativeDistribution } from './core/distributions';

// Ranks
export { rankCombined } from './core/utils/ranks';
export type { CombinedRanking } from './core/utils/ranks';

// Results
export {
  AnalysisResult,
  StatisticalTestResult,
  PowerAnalysisResult,
  TestType,
  interpret,
  formatPValue,
} from './domain/results';
export type {
  HypothesisLabels,
  LowExpectedFrequencyWarning,
  ResultWarning,
  TestOptions,
  StatisticalTestResultInit,
  PowerAnalysisResultInit,
} from './domain/results';

// Hypothesis tests
export * from './hypothesis';

// Power analysis
export { powerAnalysis, requiredSampleSize, sampleSizeAnalysis } from './power/powerAnalysis';
export type { PowerOptions } from './power/powerAnalysis';

// Text input
export * from './io';

// Version
export const VERSION = '0.1.0';
