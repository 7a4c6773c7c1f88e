/**
 * Custom error types for the diagnostic CLIs
 *
 * Checks and probes catch these at their own boundary and turn them into
 * results. Only ConfigError and UserAbortError are expected to reach the
 * entry point's error handler.
 */

import { ExitCode } from './exit-codes';

/**
 * Base error class for all diagnostic errors
 */
export class DiagError extends Error {
  constructor(
    message: string,
    public readonly code: ExitCode = ExitCode.GENERAL_ERROR
  ) {
    super(message);
    this.name = 'DiagError';
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Endpoint or host could not be reached
 * `reason` is the short cause shown in reports (e.g. ECONNREFUSED, Not Found)
 */
export class ConnectionFailure extends DiagError {
  constructor(
    public readonly reason: string,
    public readonly url?: string,
    public readonly statusCode?: number
  ) {
    super(`Connection failed: ${reason}`, ExitCode.NETWORK_ERROR);
    this.name = 'ConnectionFailure';
  }
}

/**
 * An external call exceeded its time bound
 */
export class TimeoutFailure extends ConnectionFailure {
  constructor(
    public readonly timeoutMs: number,
    url?: string
  ) {
    super('timed out', url);
    this.name = 'TimeoutFailure';
    this.message = `Timed out after ${timeoutMs}ms`;
  }
}

/**
 * Expected external binary is absent from PATH
 * Checks degrade this to WARN rather than FAIL
 */
export class ToolMissingError extends DiagError {
  constructor(public readonly binary: string) {
    super(`${binary} not in PATH`, ExitCode.BINARY_ERROR);
    this.name = 'ToolMissingError';
  }
}

/**
 * Unexpected response shape or unusable output from a collaborator
 */
export class ProtocolError extends DiagError {
  constructor(message: string) {
    super(message, ExitCode.PROTOCOL_ERROR);
    this.name = 'ProtocolError';
  }
}

/**
 * Invalid CLI flags or environment values
 */
export class ConfigError extends DiagError {
  constructor(
    message: string,
    public readonly option?: string
  ) {
    super(message, ExitCode.CONFIG_ERROR);
    this.name = 'ConfigError';
  }
}

/**
 * User abort error (Ctrl+C, SIGINT)
 */
export class UserAbortError extends DiagError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message, ExitCode.USER_ABORT);
    this.name = 'UserAbortError';
  }
}

/**
 * Type guard to check if an error is a DiagError
 */
export function isDiagError(error: unknown): error is DiagError {
  return error instanceof DiagError;
}

/**
 * Message of any thrown value, for result details
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
