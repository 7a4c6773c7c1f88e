/**
 * Text formatting
 * @module utils/ui/text
 */

import { bold, gradientText } from './colors';

export function header(text: string): string {
  return bold(gradientText(text));
}

export function hr(char = '-', width = 50): string {
  return char.repeat(width);
}

/**
 * Cut a detail string to its display budget
 */
export function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : text.slice(0, maxLength);
}
