/**
 * Boxed messages
 * @module utils/ui/boxes
 */

import boxen from 'boxen';
import { state } from './types';

export function box(content: string, options: boxen.Options = {}): string {
  return boxen(content, { padding: { top: 0, bottom: 0, left: 1, right: 1 }, ...options });
}

export function errorBox(content: string): string {
  return box(content, { borderColor: state.colors ? 'red' : undefined });
}
