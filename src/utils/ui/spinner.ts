/**
 * Progress spinner
 * @module utils/ui/spinner
 */

import ora from 'ora';
import { state } from './types';

export interface Spinner {
  start(): Spinner;
  stop(): Spinner;
  text: string;
}

/**
 * ora on interactive terminals, a silent stand-in everywhere else
 * so progress never leaks into piped reports
 */
export function spinner(text: string): Spinner {
  if (state.interactive) {
    return ora({ text, stream: process.stderr });
  }

  const silent: Spinner = {
    text,
    start: () => silent,
    stop: () => silent,
  };
  return silent;
}
