/**
 * kb-status command
 *
 * Usage:
 *   kb-status              Run every health check and print the report
 *   kb-status --help       Show help
 *   kb-status --version    Show version
 */

import { ConfigError, exitCodeFor, registerCleanup, type ExitCode } from '../errors';
import type { HealthConfig } from '../config';
import {
  planChecks,
  renderHealthReport,
  runChecks,
  summarizeHealth,
  type HealthStatus,
} from '../health';
import { runCommand, type CommandRunner } from '../utils/shell-executor';
import { color, fail, ok, spinner, warn } from '../utils/ui';

const DEBUG_INDICATORS: Record<HealthStatus, (message: string) => string> = {
  OK: ok,
  WARN: warn,
  FAIL: fail,
};

export type StatusAction = 'run' | 'help' | 'version';

export interface StatusCommandDeps {
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  write?: (text: string) => void;
}

export function parseStatusArgs(args: string[]): StatusAction {
  for (const arg of args) {
    if (arg === '--help' || arg === '-h') return 'help';
    if (arg === '--version' || arg === '-v') return 'version';
    throw new ConfigError(`Unknown option: ${arg}`, arg);
  }
  return 'run';
}

export function statusHelp(): string {
  return [
    '',
    'Usage: kb-status [options]',
    '',
    'Check the API server, PostgreSQL, Ollama, Tailscale and SSH nodes.',
    '',
    'Options:',
    '  --help, -h           Show this help message',
    '  --version, -v        Show version',
    '',
    'Environment:',
    `  ${color('KB_API_HOST', 'command')}   API base URL (default: http://localhost:8000)`,
    `  ${color('OLLAMA_HOST', 'command')}   Ollama base URL (default: http://localhost:11434)`,
    `  ${color('PG_HOST', 'command')}       PostgreSQL host (default: localhost)`,
    `  ${color('PG_DATABASE', 'command')}   PostgreSQL database (default: claude_memory)`,
    `  ${color('PG_USER', 'command')}       PostgreSQL user (default: claude_mcp)`,
    `  ${color('KB_NODES', 'command')}      SSH nodes, e.g. "10.0.0.5=gpu-primary,10.0.0.6"`,
    `  ${color('KB_DEBUG', 'command')}      Set to 1 for debug output on stderr`,
    '',
    'Exit status is 0 when no check FAILs, 1 otherwise.',
    '',
  ].join('\n');
}

/**
 * Run the checks, print the report and return the exit code
 */
export async function runStatusCommand(
  config: HealthConfig,
  deps: StatusCommandDeps = {}
): Promise<ExitCode> {
  const write = deps.write ?? ((text: string) => console.log(text));
  const healthDeps = { run: deps.run ?? runCommand, env: deps.env ?? process.env };

  const progress = spinner('Checking');
  const unregister = registerCleanup(() => progress.stop());

  const results = await runChecks(planChecks(config, healthDeps), {
    onStart: (component) => {
      progress.text = `Checking ${component}`;
      progress.start();
    },
    onResult: (result) => {
      progress.stop();
      if (config.debug) {
        console.error(DEBUG_INDICATORS[result.status](`${result.component}: ${result.details}`));
      }
    },
  });

  unregister();
  write(renderHealthReport(results));
  return exitCodeFor(summarizeHealth(results).healthy);
}
