/**
 * ASCII status indicators: [OK] [X] [!] [i]
 * @module utils/ui/indicators
 */

import { color } from './colors';

export function ok(message: string): string {
  return `${color('[OK]', 'success')} ${message}`;
}

export function fail(message: string): string {
  return `${color('[X]', 'error')} ${message}`;
}

export function warn(message: string): string {
  return `${color('[!]', 'warning')} ${message}`;
}

export function info(message: string): string {
  return `${color('[i]', 'info')} ${message}`;
}
