/**
 * Templated interpretation sentences. Pure formatting.
 */

import type { HypothesisLabels } from './types';

/**
 * Four decimals, or exponent form below 1e-4 where fixed notation would
 * print zero
 */
export function formatPValue(pValue: number): string {
  return pValue > 0 && pValue < 1e-4 ? pValue.toExponential(2) : pValue.toFixed(4);
}

/**
 * "Reject/Fail to reject the null hypothesis at α=<alpha>: p=<p> <|>= <alpha>."
 * followed by the hypothesis the decision speaks to.
 */
export function interpret(pValue: number, alpha: number, labels: HypothesisLabels): string {
  const p = formatPValue(pValue);
  if (pValue < alpha) {
    return (
      `Reject the null hypothesis at α=${alpha}: p=${p} < ${alpha}. ` +
      `Evidence supports: ${labels.alternativeHypothesis}.`
    );
  }
  return (
    `Fail to reject the null hypothesis at α=${alpha}: p=${p} >= ${alpha}. ` +
    `Insufficient evidence against: ${labels.nullHypothesis}.`
  );
}
