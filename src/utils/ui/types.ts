/**
 * UI Types and shared state
 * @module utils/ui/types
 */

import chalk from 'chalk';

/**
 * Semantic color palette
 */
export const COLORS = {
  success: 'green',
  error: 'red',
  warning: 'yellow',
  info: 'cyan',
  command: 'yellowBright',
} as const;

export type ColorName = keyof typeof COLORS;

export interface UIState {
  chalk: chalk.Chalk;
  colors: boolean;
  interactive: boolean;
}

/**
 * Plain text until initUI() decides otherwise
 */
export const state: UIState = {
  chalk: new chalk.Instance({ level: 0 }),
  colors: false,
  interactive: false,
};
