/**
 * Uniform, immutable result of a hypothesis test
 */

import { AnalysisResult } from './AnalysisResult';
import { interpret } from './interpretation';
import { TestType, type HypothesisLabels, type ResultWarning } from './types';

export interface StatisticalTestResultInit extends HypothesisLabels {
  testName: string;
  testType: TestType;
  /** t, F, χ² or U depending on the test */
  statistic: number;
  /** One value for t and χ², two (between, within) for ANOVA, none for Mann-Whitney */
  degreesOfFreedom: readonly number[];
  /** Two-tailed (or upper-tail for F and χ²) probability in [0, 1] */
  pValue: number;
  alpha: number;
  /** Named intermediate values (means, sums of squares, U1/U2, z ...) */
  parameters?: Readonly<Record<string, number>>;
  warnings?: readonly ResultWarning[];
}

export class StatisticalTestResult extends AnalysisResult implements HypothesisLabels {
  readonly testName: string;
  readonly testType: TestType;
  readonly statistic: number;
  readonly degreesOfFreedom: readonly number[];
  readonly pValue: number;
  readonly alpha: number;
  readonly isSignificant: boolean;
  readonly nullHypothesis: string;
  readonly alternativeHypothesis: string;
  readonly interpretation: string;
  readonly parameters: Readonly<Record<string, number>>;
  readonly warnings: readonly ResultWarning[];

  constructor(init: StatisticalTestResultInit) {
    super();
    this.testName = init.testName;
    this.testType = init.testType;
    this.statistic = init.statistic;
    this.degreesOfFreedom = Object.freeze([...init.degreesOfFreedom]);
    this.pValue = init.pValue;
    this.alpha = init.alpha;
    this.isSignificant = init.pValue < init.alpha;
    this.nullHypothesis = init.nullHypothesis;
    this.alternativeHypothesis = init.alternativeHypothesis;
    this.interpretation = interpret(init.pValue, init.alpha, init);
    this.parameters = Object.freeze({ ...(init.parameters ?? {}) });
    this.warnings = Object.freeze((init.warnings ?? []).map((w) => Object.freeze({ ...w })));
    Object.freeze(this);
  }

  /**
   * The same result relabelled; the interpretation is regenerated
   */
  withHypotheses(labels: Partial<HypothesisLabels>): StatisticalTestResult {
    return new StatisticalTestResult({
      testName: this.testName,
      testType: this.testType,
      statistic: this.statistic,
      degreesOfFreedom: this.degreesOfFreedom,
      pValue: this.pValue,
      alpha: this.alpha,
      nullHypothesis: labels.nullHypothesis ?? this.nullHypothesis,
      alternativeHypothesis: labels.alternativeHypothesis ?? this.alternativeHypothesis,
      parameters: this.parameters,
      warnings: this.warnings,
    });
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  toJSON(): Record<string, unknown> {
    return {
      testName: this.testName,
      testType: this.testType,
      statistic: this.statistic,
      degreesOfFreedom: [...this.degreesOfFreedom],
      pValue: this.pValue,
      alpha: this.alpha,
      isSignificant: this.isSignificant,
      nullHypothesis: this.nullHypothesis,
      alternativeHypothesis: this.alternativeHypothesis,
      interpretation: this.interpretation,
      parameters: { ...this.parameters },
      warnings: this.warnings.map((w) => ({ ...w })),
    };
  }
}
