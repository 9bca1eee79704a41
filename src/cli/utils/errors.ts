/**
 * CLI Error Handling
 *
 * Errors are written to stderr as JSON and the process exits with code 1.
 */

import { EvalsError, toError } from '../../errors.js';

export interface CliErrorOutput {
  error: string;
  code: string;
  details?: Record<string, unknown>;
}

export function formatCliError(error: unknown): CliErrorOutput {
  if (error instanceof EvalsError) {
    return {
      error: error.message,
      code: error.code,
      ...(Object.keys(error.context).length > 0 ? { details: error.context } : {}),
    };
  }
  return { error: toError(error).message, code: 'INTERNAL_ERROR' };
}

/**
 * Handle CLI errors consistently
 */
export function handleCliError(error: unknown): never {
  console.error(JSON.stringify(formatCliError(error), null, 2));
  process.exit(1);
}
