/**
 * Hypothesis tests and the test dispatcher
 */

export { tTest, anova } from './parametric';
export type { TTestOptions } from './parametric';
export { chiSquareTest, mannWhitneyTest } from './nonparametric';
export type { MannWhitneyMethod, MannWhitneyOptions } from './nonparametric';
export { exactUFrequencies, exactMannWhitneyPValue } from './mannWhitneyExact';
export {
  runHypothesisTest,
  runBatch,
  parseTestRequest,
  TestKindSchema,
  TestRequestSchema,
} from './runner';
export type { TestKind, TestRequest, RunOptions, BatchOutcome } from './runner';
