/**
 * Structured logging using pino.
 *
 * Logs go to stderr so that CLI output on stdout stays machine-readable.
 * Logging is disabled under the test runner to keep test output clean.
 */

import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const pinoOptions: pino.LoggerOptions = {
  level: process.env.CLASSIFIER_EVALS_LOG_LEVEL ?? 'info',
  enabled: !isTest,
  base: null,
  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger = pino(pinoOptions, pino.destination({ dest: 2, sync: true }));

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'indexer', 'splitter', 'pipeline')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
