/**
 * In-process stand-in for the shell executor
 */

import type { CommandOptions, CommandResult, CommandRunner } from '../../src/utils/shell-executor';

export interface CapturedCommand {
  command: string;
  args: string[];
  options: CommandOptions;
}

export type FakeOutcome = CommandResult | Error;

export interface FakeCommandRunner {
  run: CommandRunner;
  calls: CapturedCommand[];
}

/**
 * Answer each spawn with the outcome registered for its command;
 * an Error outcome rejects, as the real executor does
 */
export function createFakeRunner(outcomes: Record<string, FakeOutcome>): FakeCommandRunner {
  const calls: CapturedCommand[] = [];

  const run: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const outcome = outcomes[command];
    if (outcome === undefined) {
      throw new Error(`No fake outcome for ${command}`);
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  };

  return { run, calls };
}

export function exited(exitCode: number, stdout = '', stderr = ''): CommandResult {
  return { exitCode, stdout, stderr };
}
