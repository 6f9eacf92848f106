/**
 * Test dispatcher: runs a hypothesis test named by kind over text-encoded
 * data. Used by the CLI `run` and `batch` commands.
 */

import { z } from 'zod';
import { HypothesisError, ErrorCode, wrapError } from '../core/errors';
import type { EngineConfig } from '../core/config';
import { logger, createLogger, type Logger } from '../core/logger';
import { parseGroups, parseNestedArrays, parseSamplePair } from '../io/parsers';
import type { StatisticalTestResult, TestOptions } from '../domain/results';
import { tTest, anova } from './parametric';
import { chiSquareTest, mannWhitneyTest } from './nonparametric';

export const TestKindSchema = z.enum(['t-test', 'anova', 'chi-square', 'mann-whitney']);
export type TestKind = z.infer<typeof TestKindSchema>;

export const TestRequestSchema = z
  .object({
    id: z.string().optional(),
    kind: TestKindSchema,
    /** Encoded as in io/parsers: sample pair, groups or a JSON table */
    data: z.string(),
    alpha: z.number().optional(),
    equalVariance: z.boolean().optional(),
    method: z.enum(['normal', 'exact', 'auto']).optional(),
    nullHypothesis: z.string().optional(),
    alternativeHypothesis: z.string().optional(),
  })
  .strict();

export type TestRequest = z.infer<typeof TestRequestSchema>;

export interface RunOptions {
  config?: Partial<EngineConfig>;
  log?: Logger;
}

export type BatchOutcome =
  | { id?: string; status: 'fulfilled'; result: StatisticalTestResult }
  | { id?: string; status: 'rejected'; error: HypothesisError };

/**
 * Validate an untyped request (e.g. one entry of a JSON batch file)
 *
 * @throws HypothesisError INVALID_INPUT
 */
export function parseTestRequest(input: unknown): TestRequest {
  const parsed = TestRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new HypothesisError(ErrorCode.INVALID_INPUT, 'Invalid test request', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function dispatch(request: TestRequest, config?: Partial<EngineConfig>): StatisticalTestResult {
  const common: TestOptions = {
    alpha: request.alpha,
    nullHypothesis: request.nullHypothesis,
    alternativeHypothesis: request.alternativeHypothesis,
    config,
  };

  switch (request.kind) {
    case 't-test': {
      const [sample1, sample2] = parseSamplePair(request.data);
      return tTest(sample1, sample2, { ...common, equalVariance: request.equalVariance });
    }
    case 'anova':
      return anova(parseGroups(request.data), common);
    case 'chi-square':
      return chiSquareTest(parseNestedArrays(request.data), common);
    case 'mann-whitney': {
      const [sample1, sample2] = parseSamplePair(request.data);
      return mannWhitneyTest(sample1, sample2, { ...common, method: request.method });
    }
  }
}

/**
 * Run one test. Errors propagate unchanged.
 */
export function runHypothesisTest(request: TestRequest, options: RunOptions = {}): StatisticalTestResult {
  const log = createLogger({ requestId: request.id, testKind: request.kind }, options.log ?? logger);

  log.debug({ alpha: request.alpha }, 'Running hypothesis test');
  const result = dispatch(request, options.config);
  log.debug(
    { statistic: result.statistic, pValue: result.pValue, isSignificant: result.isSignificant },
    'Hypothesis test complete'
  );

  return result;
}

/**
 * Run each request independently. A failing request yields a rejected
 * outcome carrying its error; the others still run.
 */
export function runBatch(requests: readonly unknown[], options: RunOptions = {}): BatchOutcome[] {
  const log = options.log ?? logger;

  return requests.map((raw, index): BatchOutcome => {
    let id: string | undefined;
    try {
      const request = parseTestRequest(raw);
      id = request.id;
      return { id, status: 'fulfilled', result: runHypothesisTest(request, { ...options, log }) };
    } catch (err) {
      const error = wrapError(err);
      log.warn({ index, requestId: id, code: error.code, err: error }, 'Hypothesis test failed');
      return { id, status: 'rejected', error };
    }
  });
}
