#!/usr/bin/env node
/**
 * hypothesis CLI entry point
 */

import chalk from 'chalk';
import { wrapError } from '../core/errors';
import { createLogger } from '../core/logger';
import { createProgram } from './program';

const log = createLogger({ command: 'cli' });

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const error = wrapError(err);
    log.error({ code: error.code, context: error.context }, error.message);
    console.error(chalk.red(`Error [${error.code}]: ${error.message}`));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
