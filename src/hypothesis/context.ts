/**
 * Per-call settings shared by every test: alpha, numerical config and
 * hypothesis labels, with the test's own defaults filled in.
 */

import { resolveConfig, type EngineConfig } from '../core/config';
import { DataValidator } from '../domain/validation/DataValidator';
import type { HypothesisLabels, TestOptions } from '../domain/results';

export interface TestContext {
  alpha: number;
  config: EngineConfig;
  labels: HypothesisLabels;
}

export function resolveTestContext(options: TestOptions, defaults: HypothesisLabels): TestContext {
  const config = resolveConfig(options.config);
  const alpha = options.alpha ?? config.alpha;
  DataValidator.validateAlpha(alpha);

  return {
    alpha,
    config,
    labels: {
      nullHypothesis: options.nullHypothesis ?? defaults.nullHypothesis,
      alternativeHypothesis: options.alternativeHypothesis ?? defaults.alternativeHypothesis,
    },
  };
}
