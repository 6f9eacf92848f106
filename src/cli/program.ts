/**
 * hypothesis CLI program
 *
 * Commands print their result to stdout; logs go to stderr.
 */

import { readFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { HypothesisError, ErrorCode } from '../core/errors';
import { configFromEnv, type EngineConfig } from '../core/config';
import { createLogger } from '../core/logger';
import { parseGroups, parseNestedArrays, parseSamplePair } from '../io/parsers';
import { tTest, anova } from '../hypothesis/parametric';
import { chiSquareTest, mannWhitneyTest } from '../hypothesis/nonparametric';
import { runHypothesisTest, runBatch, parseTestRequest } from '../hypothesis/runner';
import { powerAnalysis, sampleSizeAnalysis } from '../power/powerAnalysis';
import { renderResult, renderBatch, OutputFormatSchema } from './render';

export const VERSION = '0.1.0';

/**
 * Where the program writes and what it reads from its environment
 */
export interface CliContext {
  write(text: string): void;
  env: NodeJS.ProcessEnv;
  /** Called when a batch finishes with failed requests */
  onBatchFailures(count: number): void;
}

const defaultContext: CliContext = {
  write: (text) => console.log(text),
  env: process.env,
  onBatchFailures: () => {
    process.exitCode = 1;
  },
};

const CommandOptionsSchema = z.object({
  alpha: z.number().optional(),
  null: z.string().optional(),
  alternative: z.string().optional(),
  equalVariance: z.boolean().optional(),
  method: z.enum(['normal', 'exact', 'auto']).optional(),
  format: OutputFormatSchema,
});

type CommandOptions = z.infer<typeof CommandOptionsSchema>;

function parseFloatOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseOptions(options: unknown): CommandOptions {
  const parsed = CommandOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new HypothesisError(ErrorCode.INVALID_INPUT, 'Invalid command options', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function numberArgument(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new HypothesisError(ErrorCode.INVALID_INPUT, `${name} must be a finite number`, {
      [name]: value,
    });
  }
  return parsed;
}

function withTestOptions(command: Command): Command {
  return command
    .option('-a, --alpha <number>', 'Significance level', parseFloatOption)
    .option('--null <text>', 'Null hypothesis label')
    .option('--alternative <text>', 'Alternative hypothesis label')
    .option('-f, --format <type>', 'Output format (table, json, csv)', 'table');
}

/**
 * Create the CLI program
 */
export function createProgram(context: CliContext = defaultContext): Command {
  const program = new Command();
  const config = (): Partial<EngineConfig> => configFromEnv(context.env);
  const testOptions = (options: CommandOptions) => ({
    alpha: options.alpha,
    nullHypothesis: options.null,
    alternativeHypothesis: options.alternative,
  });

  program
    .name('hypothesis')
    .description('Classical hypothesis tests and power analysis')
    .version(VERSION, '-v, --version', 'Show version number');

  withTestOptions(
    program
      .command('t-test')
      .description("Two-sample t-test (Welch's by default)")
      .argument('<data>', "Two samples, e.g. '10,12,9,11|15,14,16,13'")
      .option('--equal-variance', "Pool the variances (Student's t-test)")
  ).action((data: string, rawOptions: unknown) => {
    const options = parseOptions(rawOptions);
    const [sample1, sample2] = parseSamplePair(data);
    const result = tTest(sample1, sample2, {
      ...testOptions(options),
      equalVariance: options.equalVariance,
      config: config(),
    });
    context.write(renderResult(result, options.format));
  });

  withTestOptions(
    program
      .command('anova')
      .description('One-way ANOVA')
      .argument('<groups>', "Groups, e.g. '1,2,3|4,5,6|7,8,9' or '[[1,2,3],[4,5,6]]'")
  ).action((groups: string, rawOptions: unknown) => {
    const options = parseOptions(rawOptions);
    const result = anova(parseGroups(groups), { ...testOptions(options), config: config() });
    context.write(renderResult(result, options.format));
  });

  withTestOptions(
    program
      .command('chi-square')
      .description('Chi-square test of independence')
      .argument('<table>', "Contingency table as JSON, e.g. '[[10,20],[30,40]]'")
  ).action((table: string, rawOptions: unknown) => {
    const options = parseOptions(rawOptions);
    const result = chiSquareTest(parseNestedArrays(table), { ...testOptions(options), config: config() });
    context.write(renderResult(result, options.format));
  });

  withTestOptions(
    program
      .command('mann-whitney')
      .description('Mann-Whitney U test')
      .argument('<data>', "Two samples, e.g. '1,2,3|4,5,6'")
      .option('-m, --method <method>', 'p-value method (normal, exact, auto)')
  ).action((data: string, rawOptions: unknown) => {
    const options = parseOptions(rawOptions);
    const [sample1, sample2] = parseSamplePair(data);
    const result = mannWhitneyTest(sample1, sample2, {
      ...testOptions(options),
      method: options.method,
      config: config(),
    });
    context.write(renderResult(result, options.format));
  });

  program
    .command('power')
    .description('Power of the two-sided two-sample t-test')
    .argument('<effect>', "Effect size (Cohen's d)")
    .argument('<n>', 'Sample size per group')
    .option('-a, --alpha <number>', 'Significance level', parseFloatOption)
    .option('-f, --format <type>', 'Output format (table, json, csv)', 'table')
    .action((effect: string, n: string, rawOptions: unknown) => {
      const options = parseOptions(rawOptions);
      const result = powerAnalysis(
        numberArgument('effect', effect),
        numberArgument('n', n),
        options.alpha,
        { config: config() }
      );
      context.write(renderResult(result, options.format));
    });

  program
    .command('sample-size')
    .description('Smallest per-group sample size reaching a target power')
    .argument('<effect>', "Effect size (Cohen's d)")
    .argument('<power>', 'Target power, e.g. 0.8')
    .option('-a, --alpha <number>', 'Significance level', parseFloatOption)
    .option('-f, --format <type>', 'Output format (table, json, csv)', 'table')
    .action((effect: string, power: string, rawOptions: unknown) => {
      const options = parseOptions(rawOptions);
      const result = sampleSizeAnalysis(
        numberArgument('effect', effect),
        numberArgument('power', power),
        options.alpha,
        { config: config() }
      );
      context.write(renderResult(result, options.format));
    });

  withTestOptions(
    program
      .command('run')
      .description('Run a test by kind (t-test, anova, chi-square, mann-whitney)')
      .argument('<kind>', 'Test kind')
      .argument('<data>', 'Test data in the encoding of that kind')
      .option('--equal-variance', "Pool the variances (t-test only)")
      .option('-m, --method <method>', 'p-value method (mann-whitney only)')
  ).action((kind: string, data: string, rawOptions: unknown) => {
    const options = parseOptions(rawOptions);
    const request = parseTestRequest({
      kind,
      data,
      alpha: options.alpha,
      equalVariance: options.equalVariance,
      method: options.method,
      nullHypothesis: options.null,
      alternativeHypothesis: options.alternative,
    });
    const result = runHypothesisTest(request, {
      config: config(),
      log: createLogger({ command: 'run' }),
    });
    context.write(renderResult(result, options.format));
  });

  program
    .command('batch')
    .description('Run every request in a JSON file; failures do not stop the others')
    .argument('<file>', 'JSON array of { id?, kind, data, alpha?, ... } requests')
    .option('-f, --format <type>', 'Output format (table, json, csv)', 'table')
    .action((file: string, rawOptions: unknown) => {
      const options = parseOptions(rawOptions);
      const requests = readRequests(file);
      const outcomes = runBatch(requests, {
        config: config(),
        log: createLogger({ command: 'batch' }),
      });
      context.write(renderBatch(outcomes, options.format));

      const failures = outcomes.filter((outcome) => outcome.status === 'rejected').length;
      if (failures > 0) context.onBatchFailures(failures);
    });

  return program;
}

function readRequests(file: string): unknown[] {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new HypothesisError(ErrorCode.INVALID_INPUT, `Could not read requests from ${file}`, {
      file,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (!Array.isArray(json)) {
    throw new HypothesisError(ErrorCode.INVALID_INPUT, 'Batch file must contain a JSON array', { file });
  }
  return json;
}
