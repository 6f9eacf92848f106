/**
 * Types shared by the hypothesis test results
 */

import type { EngineConfig } from '../../core/config';

/**
 * Which family of test produced a result
 */
export enum TestType {
  TTest = 'TTest',
  ANOVA = 'ANOVA',
  ChiSquare = 'ChiSquare',
  MannWhitney = 'MannWhitney',
  PowerAnalysis = 'PowerAnalysis',
}

/**
 * Free-text hypothesis labels carried on a result
 */
export interface HypothesisLabels {
  nullHypothesis: string;
  alternativeHypothesis: string;
}

/**
 * Attached to a chi-square result for each cell whose expected frequency
 * is below 5, where the chi-square approximation is unreliable. The
 * p-value is still computed.
 */
export interface LowExpectedFrequencyWarning {
  kind: 'LowExpectedFrequency';
  row: number;
  column: number;
  expected: number;
  message: string;
}

export type ResultWarning = LowExpectedFrequencyWarning;

/**
 * Options accepted by every test
 */
export interface TestOptions {
  /** Significance threshold (defaults to the configured alpha, 0.05) */
  alpha?: number;
  nullHypothesis?: string;
  alternativeHypothesis?: string;
  /** Numerical overrides for this call */
  config?: Partial<EngineConfig>;
}
