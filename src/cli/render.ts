/**
 * Terminal rendering of results: cli-table3 tables coloured with chalk,
 * pretty JSON, or CSV.
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { z } from 'zod';
import {
  StatisticalTestResult,
  PowerAnalysisResult,
  formatPValue,
} from '../domain/results';
import type { BatchOutcome } from '../hypothesis/runner';

export const OutputFormatSchema = z.enum(['table', 'json', 'csv']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const BORDERLESS_ROWS = { mid: '', 'left-mid': '', 'mid-mid': '', 'right-mid': '' };

export function formatNumber(value: number): string {
  return Number.isFinite(value) && !Number.isInteger(value) ? value.toFixed(4) : String(value);
}

function keyValueTable(rows: [string, string][]): string {
  const table = new Table({ chars: BORDERLESS_ROWS, style: { 'padding-left': 2 } });
  table.push(...rows.map(([label, value]) => [chalk.gray(label), value]));
  return table.toString();
}

function significance(isSignificant: boolean): string {
  return isSignificant ? chalk.green('yes') : chalk.gray('no');
}

function renderTestTable(result: StatisticalTestResult): string {
  const lines: string[] = [chalk.bold.white(result.testName)];

  lines.push(
    keyValueTable([
      ['Statistic', formatNumber(result.statistic)],
      [
        'Degrees of freedom',
        result.degreesOfFreedom.length > 0
          ? result.degreesOfFreedom.map(formatNumber).join(', ')
          : 'n/a',
      ],
      ['p-value', formatPValue(result.pValue)],
      ['Alpha', String(result.alpha)],
      ['Significant', significance(result.isSignificant)],
      ['H0', result.nullHypothesis],
      ['H1', result.alternativeHypothesis],
    ])
  );

  const parameters = Object.entries(result.parameters);
  if (parameters.length > 0) {
    lines.push(chalk.bold.white('Parameters'));
    lines.push(keyValueTable(parameters.map(([name, value]) => [name, formatNumber(value)])));
  }

  for (const warning of result.warnings) {
    lines.push(chalk.yellow(`Warning: ${warning.message}`));
  }

  lines.push(result.isSignificant ? chalk.green(result.interpretation) : result.interpretation);
  return lines.join('\n');
}

function renderPowerTable(result: PowerAnalysisResult): string {
  const rows: [string, string][] = [
    ['Effect size (d)', formatNumber(result.effectSize)],
    ['Sample size per group', String(result.sampleSizePerGroup)],
    ['Power', formatNumber(result.power)],
    ['Alpha', String(result.significanceLevel)],
    ['Degrees of freedom', String(result.degreesOfFreedom)],
    ['Noncentrality', formatNumber(result.noncentrality)],
    ['Critical value', formatNumber(result.criticalValue)],
  ];
  if (result.targetPower !== undefined) {
    rows.push(['Target power', String(result.targetPower)]);
  }

  const title =
    result.requiredSampleSize !== undefined
      ? 'Required sample size (two-sample t-test)'
      : 'Power (two-sample t-test)';
  return [chalk.bold.white(title), keyValueTable(rows)].join('\n');
}

/**
 * Render a single test or power result
 */
export function renderResult(
  result: StatisticalTestResult | PowerAnalysisResult,
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result.toJSON(), null, 2);
    case 'csv':
      return result.toCSV();
    case 'table':
      return result instanceof PowerAnalysisResult ? renderPowerTable(result) : renderTestTable(result);
  }
}

function outcomeToJSON(outcome: BatchOutcome): Record<string, unknown> {
  if (outcome.status === 'fulfilled') {
    return { id: outcome.id ?? null, status: outcome.status, result: outcome.result.toJSON() };
  }
  return {
    id: outcome.id ?? null,
    status: outcome.status,
    error: { code: outcome.error.code, message: outcome.error.message },
  };
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render the outcomes of a batch, one row per request
 */
export function renderBatch(outcomes: readonly BatchOutcome[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(outcomes.map(outcomeToJSON), null, 2);
  }

  const rows = outcomes.map((outcome, index) => {
    const id = outcome.id ?? String(index + 1);
    if (outcome.status === 'fulfilled') {
      const { result } = outcome;
      return [
        id,
        result.testName,
        formatNumber(result.statistic),
        formatPValue(result.pValue),
        result.isSignificant ? 'yes' : 'no',
        '',
      ];
    }
    return [id, '', '', '', '', `${outcome.error.code}: ${outcome.error.message}`];
  });

  if (format === 'csv') {
    const header = ['id', 'test', 'statistic', 'pValue', 'significant', 'error'];
    return [header, ...rows].map((row) => row.map(csvField).join(',')).join('\n');
  }

  const table = new Table({
    head: ['ID', 'Test', 'Statistic', 'p-value', 'Significant', 'Error'].map((h) => chalk.cyan(h)),
  });
  for (const row of rows) {
    const [id, test, statistic, pValue, significant, error] = row;
    table.push([
      id,
      test,
      statistic,
      pValue,
      significant === 'yes' ? chalk.green(significant) : significant,
      chalk.red(error),
    ]);
  }
  return table.toString();
}
