/**
 * Standardized exit codes for the diagnostic CLIs
 *
 * Exit codes follow Unix conventions:
 * - 0: Success (healthy / all probes passed)
 * - 1: The run completed but reported failures
 * - 2-125: The run could not be carried out
 * - 130: SIGINT (Ctrl+C) - 128 + 2
 */

export enum ExitCode {
  /** Run completed and the aggregate outcome is successful */
  SUCCESS = 0,

  /** Run completed with FAIL results or failed probes, or an unexpected error */
  GENERAL_ERROR = 1,

  /** Invalid flags or environment values */
  CONFIG_ERROR = 2,

  /** Network-related errors (connection refused, timeout, DNS) */
  NETWORK_ERROR = 3,

  /** Expected external binary is not on PATH */
  BINARY_ERROR = 5,

  /** Collaborator answered with something we could not interpret */
  PROTOCOL_ERROR = 6,

  /** User aborted operation (Ctrl+C, SIGINT) */
  USER_ABORT = 130,
}

/**
 * Human-readable descriptions for exit codes
 * Used in debug output
 */
export const EXIT_CODE_DESCRIPTIONS: Record<ExitCode, string> = {
  [ExitCode.SUCCESS]: 'Success',
  [ExitCode.GENERAL_ERROR]: 'Failures reported',
  [ExitCode.CONFIG_ERROR]: 'Configuration error',
  [ExitCode.NETWORK_ERROR]: 'Network error',
  [ExitCode.BINARY_ERROR]: 'Binary/executable error',
  [ExitCode.PROTOCOL_ERROR]: 'Protocol error',
  [ExitCode.USER_ABORT]: 'User abort (Ctrl+C)',
};

/**
 * Map an aggregate success flag to the process exit code
 */
export function exitCodeFor(success: boolean): ExitCode {
  return success ? ExitCode.SUCCESS : ExitCode.GENERAL_ERROR;
}
