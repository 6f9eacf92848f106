/**
 * Exact null distribution of the Mann-Whitney U statistic for samples
 * without ties: the number of arrangements giving each U, by the
 * recurrence N(m, n, u) = N(m-1, n, u-n) + N(m, n-1, u).
 */

import { HypothesisError, ErrorCode } from '../core/errors';
import { MANN_WHITNEY_EXACT_LIMIT } from '../core/config';

/**
 * Frequencies of U = 0..n1·n2 under the null hypothesis
 */
export function exactUFrequencies(n1: number, n2: number): Float64Array {
  if (n1 > MANN_WHITNEY_EXACT_LIMIT || n2 > MANN_WHITNEY_EXACT_LIMIT) {
    throw new HypothesisError(
      ErrorCode.INVALID_PARAMETER,
      `Exact U frequencies are limited to samples of at most ${MANN_WHITNEY_EXACT_LIMIT}`,
      { sampleSize1: n1, sampleSize2: n2 }
    );
  }

  // previous[j] holds the frequencies for (i - 1, j)
  let previous: Float64Array[] = [];
  for (let j = 0; j <= n2; j++) {
    previous.push(Float64Array.of(1));
  }

  for (let i = 1; i <= n1; i++) {
    const current: Float64Array[] = [Float64Array.of(1)];
    for (let j = 1; j <= n2; j++) {
      const counts = new Float64Array(i * j + 1);
      const withLargest = previous[j]; // (i-1, j), shifted by j
      const withoutLargest = current[j - 1]; // (i, j-1)
      for (let u = 0; u < withLargest.length; u++) counts[u + j] += withLargest[u];
      for (let u = 0; u < withoutLargest.length; u++) counts[u] += withoutLargest[u];
      current.push(counts);
    }
    previous = current;
  }

  return previous[n2];
}

/**
 * Two-sided exact p-value for U = min(U1, U2): 2·P(U <= u), capped at 1
 */
export function exactMannWhitneyPValue(u: number, n1: number, n2: number): number {
  const frequencies = exactUFrequencies(n1, n2);
  let total = 0;
  let lowerTail = 0;
  for (let k = 0; k < frequencies.length; k++) {
    total += frequencies[k];
    if (k <= u) lowerTail += frequencies[k];
  }
  return Math.min(1, (2 * lowerTail) / total);
}
