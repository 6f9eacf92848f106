/**
 * Data Validator
 *
 * Validates the structure of test inputs: samples, groups of samples and
 * contingency tables. Statistical preconditions that depend on computed
 * values (zero variance, zero margins) are checked by the tests themselves.
 */

import { HypothesisError, ErrorCode } from '../../core/errors';
import { requireOpenUnitInterval } from '../../core/utils/validation';

export class DataValidator {
  /**
   * Validate a sample has enough observations and that every one is finite
   */
  static validateSample(sample: readonly number[], name: string, minimumSize: number): void {
    if (!Array.isArray(sample)) {
      throw new HypothesisError(ErrorCode.INVALID_PARAMETER, `${name} must be an array of numbers`, {
        sample: name,
      });
    }

    if (sample.length < minimumSize) {
      throw new HypothesisError(
        ErrorCode.INSUFFICIENT_DATA,
        `${name} must have at least ${minimumSize} observation${minimumSize === 1 ? '' : 's'}`,
        { sample: name, actualCount: sample.length, minimumRequired: minimumSize }
      );
    }

    const badIndex = sample.findIndex((x) => typeof x !== 'number' || !Number.isFinite(x));
    if (badIndex !== -1) {
      throw new HypothesisError(ErrorCode.INVALID_PARAMETER, `${name} contains a non-finite value`, {
        sample: name,
        index: badIndex,
        value: sample[badIndex],
      });
    }
  }

  /**
   * Validate the groups of a one-way layout
   */
  static validateGroups(
    groups: readonly (readonly number[])[],
    minimumGroups: number,
    minimumGroupSize: number
  ): void {
    if (!Array.isArray(groups) || groups.length < minimumGroups) {
      throw new HypothesisError(
        ErrorCode.INSUFFICIENT_DATA,
        `At least ${minimumGroups} groups are required`,
        { actualGroups: Array.isArray(groups) ? groups.length : 0, minimumRequired: minimumGroups }
      );
    }

    groups.forEach((group, index) => {
      this.validateSample(group, `group ${index + 1}`, minimumGroupSize);
    });
  }

  /**
   * Validate a contingency table is rectangular, at least 2 x 2, and holds
   * non-negative finite counts
   */
  static validateContingencyTable(table: readonly (readonly number[])[]): void {
    if (!Array.isArray(table) || table.length < 2) {
      throw new HypothesisError(
        ErrorCode.INSUFFICIENT_DATA,
        'Contingency table must have at least 2 rows',
        { rows: Array.isArray(table) ? table.length : 0 }
      );
    }

    const columns = Array.isArray(table[0]) ? table[0].length : 0;
    if (columns < 2) {
      throw new HypothesisError(
        ErrorCode.INSUFFICIENT_DATA,
        'Contingency table must have at least 2 columns',
        { columns }
      );
    }

    table.forEach((row, i) => {
      if (!Array.isArray(row) || row.length !== columns) {
        throw new HypothesisError(ErrorCode.INVALID_PARAMETER, 'Contingency table must be rectangular', {
          row: i,
          expectedColumns: columns,
          actualColumns: Array.isArray(row) ? row.length : 0,
        });
      }

      row.forEach((count, j) => {
        if (typeof count !== 'number' || !Number.isFinite(count) || count < 0) {
          throw new HypothesisError(
            ErrorCode.INVALID_PARAMETER,
            'Contingency table counts must be non-negative finite numbers',
            { row: i, column: j, value: count }
          );
        }
      });
    });
  }

  /**
   * Validate a significance level, 0 < alpha < 1
   */
  static validateAlpha(alpha: number): void {
    requireOpenUnitInterval('alpha', alpha);
  }
}
