/**
 * Nonparametric tests: chi-square test of independence and the
 * Mann-Whitney U test
 */

import { HypothesisError, ErrorCode } from '../core/errors';
import { MANN_WHITNEY_EXACT_LIMIT } from '../core/config';
import { ChiSquareDistribution, standardNormalSf } from '../core/distributions';
import { rankCombined } from '../core/utils/ranks';
import { DataValidator } from '../domain/validation/DataValidator';
import {
  StatisticalTestResult,
  TestType,
  type TestOptions,
  type LowExpectedFrequencyWarning,
} from '../domain/results';
import { resolveTestContext } from './context';
import { exactMannWhitneyPValue } from './mannWhitneyExact';

/**
 * How the Mann-Whitney p-value is obtained:
 * - 'normal': tie-corrected normal approximation (default)
 * - 'exact': exact permutation distribution; samples must be tie-free and
 *   within the exact threshold
 * - 'auto': exact when both samples are within the exact threshold and
 *   tie-free, normal otherwise
 */
export type MannWhitneyMethod = 'normal' | 'exact' | 'auto';

export interface MannWhitneyOptions extends TestOptions {
  method?: MannWhitneyMethod;
  /** Largest per-sample size the exact method accepts (default from config, 20; at most 50) */
  exactThreshold?: number;
  /** Shift |U - μ| by 0.5 toward zero before standardizing; default false */
  continuityCorrection?: boolean;
}

const CHI_SQUARE_LABELS = {
  nullHypothesis: 'Variables are independent',
  alternativeHypothesis: 'Variables are associated',
};

const MANN_WHITNEY_LABELS = {
  nullHypothesis: 'Distributions are identical',
  alternativeHypothesis: 'Distributions are different',
};

const MIN_EXPECTED_FREQUENCY = 5;

/**
 * Pearson's chi-square test of independence on an r x c table
 *
 * Cells with an expected frequency below 5 add a LowExpectedFrequency
 * warning to the result; the p-value is still computed.
 *
 * @throws HypothesisError DEGENERATE_TABLE when a row or column sums to zero
 */
export function chiSquareTest(
  table: readonly (readonly number[])[],
  options: TestOptions = {}
): StatisticalTestResult {
  const { alpha, config, labels } = resolveTestContext(options, CHI_SQUARE_LABELS);

  DataValidator.validateContingencyTable(table);

  const rows = table.length;
  const columns = table[0].length;
  const rowTotals = table.map((row) => row.reduce((a, b) => a + b, 0));
  const columnTotals = Array.from({ length: columns }, (_, j) =>
    table.reduce((acc, row) => acc + row[j], 0)
  );
  const grandTotal = rowTotals.reduce((a, b) => a + b, 0);

  const emptyRow = rowTotals.findIndex((total) => total === 0);
  const emptyColumn = columnTotals.findIndex((total) => total === 0);
  if (emptyRow !== -1 || emptyColumn !== -1) {
    throw new HypothesisError(
      ErrorCode.DEGENERATE_TABLE,
      'Every row and column of the contingency table must have a non-zero total',
      {
        emptyRow: emptyRow === -1 ? null : emptyRow,
        emptyColumn: emptyColumn === -1 ? null : emptyColumn,
      }
    );
  }

  let chiSquare = 0;
  let minExpected = Infinity;
  const warnings: LowExpectedFrequencyWarning[] = [];

  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < columns; j++) {
      const expected = (rowTotals[i] * columnTotals[j]) / grandTotal;
      const diff = table[i][j] - expected;
      chiSquare += (diff * diff) / expected;
      minExpected = Math.min(minExpected, expected);

      if (expected < MIN_EXPECTED_FREQUENCY) {
        warnings.push({
          kind: 'LowExpectedFrequency',
          row: i,
          column: j,
          expected,
          message:
            `Expected frequency ${expected.toFixed(2)} in cell [${i}][${j}] is below ` +
            `${MIN_EXPECTED_FREQUENCY}; the chi-square approximation may be unreliable`,
        });
      }
    }
  }

  const df = (rows - 1) * (columns - 1);
  const pValue = new ChiSquareDistribution(df, config).sf(chiSquare);

  return new StatisticalTestResult({
    testName: 'Chi-square test of independence',
    testType: TestType.ChiSquare,
    statistic: chiSquare,
    degreesOfFreedom: [df],
    pValue,
    alpha,
    ...labels,
    parameters: {
      rows,
      columns,
      grandTotal,
      degreesOfFreedom: df,
      minExpected,
      cramersV: Math.sqrt(chiSquare / (grandTotal * Math.min(rows - 1, columns - 1))),
    },
    warnings,
  });
}

/**
 * Mann-Whitney U test (Wilcoxon rank-sum) for a shift between two samples
 *
 * U = min(U1, U2). The default p-value uses the normal approximation with
 * the tie-corrected variance; see MannWhitneyMethod for the exact method.
 *
 * @throws HypothesisError INSUFFICIENT_DATA for an empty sample or when every
 *   observation is tied
 * @throws HypothesisError INVALID_PARAMETER for method 'exact' on tied data or
 *   on a sample larger than the exact threshold
 */
export function mannWhitneyTest(
  sample1: readonly number[],
  sample2: readonly number[],
  options: MannWhitneyOptions = {}
): StatisticalTestResult {
  const { alpha, config, labels } = resolveTestContext(options, MANN_WHITNEY_LABELS);
  const method = options.method ?? 'normal';
  const exactThreshold = Math.min(
    options.exactThreshold ?? config.mannWhitneyExactThreshold,
    MANN_WHITNEY_EXACT_LIMIT
  );

  DataValidator.validateSample(sample1, 'sample1', 1);
  DataValidator.validateSample(sample2, 'sample2', 1);

  const n1 = sample1.length;
  const n2 = sample2.length;
  const total = n1 + n2;
  const ranking = rankCombined(sample1, sample2);
  const hasTies = ranking.tieGroups.length > 0;
  const allTied = ranking.tieGroups.length === 1 && ranking.tieGroups[0] === total;

  const u1 = ranking.rankSum1 - (n1 * (n1 + 1)) / 2;
  const u2 = n1 * n2 - u1;
  const u = Math.min(u1, u2);

  const meanU = (n1 * n2) / 2;
  const varianceU =
    (n1 * n2 * (total + 1)) / 12 -
    (n1 * n2 * ranking.tieCorrection) / (12 * total * (total - 1));
  const sdU = Math.sqrt(Math.max(varianceU, 0));

  if (method === 'exact' && hasTies) {
    throw new HypothesisError(
      ErrorCode.INVALID_PARAMETER,
      'The exact Mann-Whitney distribution requires samples without ties',
      { tieGroups: ranking.tieGroups }
    );
  }

  const withinExactThreshold = n1 <= exactThreshold && n2 <= exactThreshold;
  if (method === 'exact' && !withinExactThreshold) {
    throw new HypothesisError(
      ErrorCode.INVALID_PARAMETER,
      `The exact Mann-Whitney distribution is limited to samples of at most ${exactThreshold}`,
      { sampleSize1: n1, sampleSize2: n2, exactThreshold }
    );
  }

  const useExact =
    method === 'exact' || (method === 'auto' && !hasTies && withinExactThreshold);

  if (!useExact && (allTied || sdU === 0)) {
    throw new HypothesisError(
      ErrorCode.INSUFFICIENT_DATA,
      'All observations are tied; the Mann-Whitney statistic has no variance',
      { sampleSize1: n1, sampleSize2: n2 }
    );
  }

  let deviation = u - meanU;
  if (options.continuityCorrection) {
    deviation = Math.min(0, deviation + 0.5);
  }
  const z = sdU > 0 ? deviation / sdU : 0;
  const pValue = useExact ? exactMannWhitneyPValue(u, n1, n2) : 2 * standardNormalSf(Math.abs(z));

  return new StatisticalTestResult({
    testName: useExact ? 'Mann-Whitney U test (exact)' : 'Mann-Whitney U test',
    testType: TestType.MannWhitney,
    statistic: u,
    degreesOfFreedom: [],
    pValue,
    alpha,
    ...labels,
    parameters: {
      sampleSize1: n1,
      sampleSize2: n2,
      rankSum1: ranking.rankSum1,
      rankSum2: ranking.rankSum2,
      u1,
      u2,
      meanU,
      sdU,
      z,
      tieCorrection: ranking.tieCorrection,
    },
  });
}
