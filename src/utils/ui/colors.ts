/**
 * Color helpers
 * @module utils/ui/colors
 */

import gradient from 'gradient-string';
import { COLORS, state, type ColorName } from './types';

export function color(text: string, name: ColorName): string {
  return state.chalk[COLORS[name]](text);
}

export function bold(text: string): string {
  return state.chalk.bold(text);
}

/**
 * Report titles; plain text when colors are off
 */
export function gradientText(text: string): string {
  if (!state.colors) return text;
  return gradient.atlas(text);
}
