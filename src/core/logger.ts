/**
 * Structured logging with pino
 *
 * Used by the CLI and the test dispatcher. The numerical core never logs:
 * it raises errors and returns results.
 *
 * Configuration:
 * - LOG_LEVEL env var (default: 'info')
 * - LOG_PRETTY=1 for human-readable output via pino-pretty
 */

import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_PRETTY = process.env.LOG_PRETTY === '1';

/**
 * Singleton logger instance. Writes to stderr so command output on
 * stdout stays machine-readable.
 */
export const logger = pino(
  {
    level: LOG_LEVEL,
    ...(IS_PRETTY
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:HH:MM:ss.l',
              ignore: 'pid,hostname',
              destination: 2,
            },
          },
        }
      : {
          formatters: {
            level(label: string) {
              return { level: label };
            },
          },
          timestamp: pino.stdTimeFunctions.isoTime,
        }),
  },
  IS_PRETTY ? undefined : pino.destination(2)
);

export type Logger = pino.Logger;

/**
 * Context bound to child loggers
 */
export interface LoggerContext {
  command?: string;
  requestId?: string;
  testKind?: string;
}

/**
 * Create a child logger with bound context fields.
 *
 * @example
 * ```ts
 * const log = createLogger({ command: 't-test' })
 * log.info('Running test')
 * // => {"level":"info","command":"t-test","msg":"Running test"}
 * ```
 */
export function createLogger(context: LoggerContext, parent: Logger = logger): Logger {
  return parent.child(context);
}
