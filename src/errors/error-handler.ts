/**
 * Centralized error handler for the entry points
 *
 * A finished run never comes through here: unhealthy results are reported
 * and mapped to an exit code by the caller. This handles argument errors,
 * Ctrl+C and bugs.
 */

import { ExitCode, EXIT_CODE_DESCRIPTIONS } from './exit-codes';
import { errorMessage, isDiagError } from './error-types';
import { runCleanup } from './cleanup-registry';

/**
 * Debug mode flag - set via KB_DEBUG environment variable
 */
export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  return env['KB_DEBUG'] === '1' || env['KB_DEBUG'] === 'true';
};

/**
 * Format error message for display (ASCII only, no emojis)
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return `[X] ${error.message}`;
  }

  if (typeof error === 'string') {
    return `[X] ${error}`;
  }

  return '[X] An unexpected error occurred';
}

/**
 * DiagError types carry their own codes, others default to GENERAL_ERROR
 */
export function getExitCode(error: unknown): ExitCode {
  if (isDiagError(error)) {
    return error.code;
  }
  return ExitCode.GENERAL_ERROR;
}

function logDebugInfo(error: unknown, code: ExitCode, cleanupErrors: unknown[]): void {
  if (!isDebugMode()) return;

  console.error('');
  console.error('[i] Debug information:');
  console.error(`    Exit code: ${code} (${EXIT_CODE_DESCRIPTIONS[code] || 'Unknown'})`);

  if (error instanceof Error) {
    console.error(`    Error type: ${error.constructor.name}`);
    if (error.stack) {
      console.error('    Stack trace:');
      const stackLines = error.stack.split('\n').slice(1, 6);
      for (const line of stackLines) {
        console.error(`      ${line.trim()}`);
      }
    }
  }

  for (const failure of cleanupErrors) {
    console.error(`    Cleanup failed: ${errorMessage(failure)}`);
  }
}

/**
 * Formats error, runs cleanup, and exits with the error's code
 */
export function handleError(error: unknown): never {
  const cleanupErrors = runCleanup();

  const code = getExitCode(error);
  console.error(formatErrorMessage(error));
  logDebugInfo(error, code, cleanupErrors);

  process.exit(code);
}

/**
 * Wrap an async main so any rejection goes through handleError
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
