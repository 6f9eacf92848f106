/**
 * Result of a power or sample-size calculation for the two-sample t-test
 */

import { AnalysisResult } from './AnalysisResult';
import { TestType } from './types';

export interface PowerAnalysisResultInit {
  effectSize: number;
  sampleSizePerGroup: number;
  power: number;
  significanceLevel: number;
  degreesOfFreedom: number;
  noncentrality: number;
  criticalValue: number;
  /** Present when the calculation solved for n */
  requiredSampleSize?: number;
  targetPower?: number;
}

export class PowerAnalysisResult extends AnalysisResult {
  readonly testType = TestType.PowerAnalysis;
  readonly effectSize: number;
  readonly sampleSizePerGroup: number;
  readonly power: number;
  readonly significanceLevel: number;
  readonly degreesOfFreedom: number;
  readonly noncentrality: number;
  readonly criticalValue: number;
  readonly requiredSampleSize?: number;
  readonly targetPower?: number;

  constructor(init: PowerAnalysisResultInit) {
    super();
    this.effectSize = init.effectSize;
    this.sampleSizePerGroup = init.sampleSizePerGroup;
    this.power = init.power;
    this.significanceLevel = init.significanceLevel;
    this.degreesOfFreedom = init.degreesOfFreedom;
    this.noncentrality = init.noncentrality;
    this.criticalValue = init.criticalValue;
    this.requiredSampleSize = init.requiredSampleSize;
    this.targetPower = init.targetPower;
    Object.freeze(this);
  }

  toJSON(): Record<string, unknown> {
    return {
      testType: this.testType,
      effectSize: this.effectSize,
      sampleSizePerGroup: this.sampleSizePerGroup,
      power: this.power,
      significanceLevel: this.significanceLevel,
      degreesOfFreedom: this.degreesOfFreedom,
      noncentrality: this.noncentrality,
      criticalValue: this.criticalValue,
      ...(this.requiredSampleSize !== undefined ? { requiredSampleSize: this.requiredSampleSize } : {}),
      ...(this.targetPower !== undefined ? { targetPower: this.targetPower } : {}),
    };
  }
}
