/**
 * Error Handling Module
 *
 * @example
 * ```typescript
 * import { withErrorHandling, ConfigError } from './errors';
 *
 * const main = withErrorHandling(async () => {
 *   throw new ConfigError('--timeout must be a positive number', '--timeout');
 * });
 * ```
 */

// Exit codes
export { ExitCode, EXIT_CODE_DESCRIPTIONS, exitCodeFor } from './exit-codes';

// Error types
export {
  DiagError,
  ConnectionFailure,
  TimeoutFailure,
  ToolMissingError,
  ProtocolError,
  ConfigError,
  UserAbortError,
  isDiagError,
  errorMessage,
} from './error-types';

// Error handler
export {
  handleError,
  withErrorHandling,
  isDebugMode,
  formatErrorMessage,
  getExitCode,
} from './error-handler';

// Cleanup registry
export { registerCleanup, runCleanup, clearCleanup, getCleanupCount } from './cleanup-registry';

export type { CleanupCallback } from './cleanup-registry';
