/**
 * Combined-sample ranking for rank-based tests
 */

export interface CombinedRanking {
  /** 1-based ranks of sample1 observations, in input order */
  ranks1: number[];
  /** 1-based ranks of sample2 observations, in input order */
  ranks2: number[];
  rankSum1: number;
  rankSum2: number;
  /** Sizes of every group of tied values (groups of size > 1 only) */
  tieGroups: number[];
  /** T = Σ(t³ - t) over the tie groups */
  tieCorrection: number;
}

/**
 * Rank the pooled observations of two samples. Tied values share the
 * average of the ranks they span.
 */
export function rankCombined(
  sample1: readonly number[],
  sample2: readonly number[]
): CombinedRanking {
  const pooled = [...sample1, ...sample2];
  const order = pooled.map((_, index) => index).sort((i, j) => pooled[i] - pooled[j]);
  const ranks = new Array<number>(pooled.length);
  const tieGroups: number[] = [];
  let tieCorrection = 0;

  let start = 0;
  while (start < order.length) {
    let end = start + 1;
    while (end < order.length && pooled[order[end]] === pooled[order[start]]) {
      end++;
    }

    // Positions start..end-1 hold ranks start+1..end
    const averageRank = (start + 1 + end) / 2;
    for (let k = start; k < end; k++) {
      ranks[order[k]] = averageRank;
    }

    const size = end - start;
    if (size > 1) {
      tieGroups.push(size);
      tieCorrection += size * size * size - size;
    }
    start = end;
  }

  const ranks1 = ranks.slice(0, sample1.length);
  const ranks2 = ranks.slice(sample1.length);
  return {
    ranks1,
    ranks2,
    rankSum1: ranks1.reduce((a, b) => a + b, 0),
    rankSum2: ranks2.reduce((a, b) => a + b, 0),
    tieGroups,
    tieCorrection,
  };
}
