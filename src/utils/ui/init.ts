/**
 * UI Initialization
 * @module utils/ui/init
 */

import chalk from 'chalk';
import { state } from './types';

export interface InitOptions {
  /** Override color detection (tests pass false) */
  colors?: boolean;
  /** Override interactive detection (spinners) */
  interactive?: boolean;
}

/**
 * Configure colors and interactivity (call once at startup)
 */
export function initUI(options: InitOptions = {}): void {
  const colors = options.colors ?? useColors();
  const level: chalk.Level = colors ? (chalk.level > 0 ? chalk.level : 1) : 0;

  state.chalk = new chalk.Instance({ level });
  state.colors = colors;
  state.interactive = options.interactive ?? isInteractive();
}

/**
 * Check if colors should be used
 * Respects NO_COLOR and FORCE_COLOR environment variables
 */
export function useColors(env: NodeJS.ProcessEnv = process.env): boolean {
  // FORCE_COLOR overrides all checks
  if (env.FORCE_COLOR) return true;
  if (env.NO_COLOR) return false;
  return !!process.stdout.isTTY;
}

/**
 * Check if interactive mode (TTY + not CI)
 */
export function isInteractive(env: NodeJS.ProcessEnv = process.env): boolean {
  return !!process.stdout.isTTY && !env.CI && !env.NO_COLOR && env.TERM !== 'dumb';
}
