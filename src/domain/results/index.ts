/**
 * Result objects returned by the engine
 */

export { AnalysisResult } from './AnalysisResult';
export { StatisticalTestResult } from './StatisticalTestResult';
export type { StatisticalTestResultInit } from './StatisticalTestResult';
export { PowerAnalysisResult } from './PowerAnalysisResult';
export type { PowerAnalysisResultInit } from './PowerAnalysisResult';
export { TestType } from './types';
export type {
  HypothesisLabels,
  LowExpectedFrequencyWarning,
  ResultWarning,
  TestOptions,
} from './types';
export { interpret, formatPValue } from './interpretation';
