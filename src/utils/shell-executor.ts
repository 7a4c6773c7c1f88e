/**
 * Shell Executor Utilities
 *
 * Runs external CLIs (psql, tailscale) non-interactively with a time bound.
 */

import { spawn } from 'child_process';
import { TimeoutFailure, ToolMissingError } from '../errors';

export interface CommandOptions {
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Signature checks depend on, so tests can hand in a fake
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>;

/**
 * Spawn `command` with `args`, capture output and wait for exit.
 *
 * Rejects with ToolMissingError when the binary is not on PATH and with
 * TimeoutFailure when it outlives `timeoutMs` (the child is killed).
 * A nonzero exit is not an error here; callers read `exitCode`.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
      env: options.env ?? process.env,
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      proc.kill('SIGKILL');
      reject(new TimeoutFailure(options.timeoutMs));
    }, options.timeoutMs);

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (err: NodeJS.ErrnoException) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err.code === 'ENOENT' ? new ToolMissingError(command) : err);
    });

    proc.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
    });
  });
};
