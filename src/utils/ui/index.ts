/**
 * UI Module Barrel Export
 * @module utils/ui
 */

export { COLORS, state } from './types';
export type { ColorName, UIState } from './types';

export { initUI, useColors, isInteractive } from './init';
export type { InitOptions } from './init';

export { color, gradientText, bold } from './colors';
export { ok, fail, warn, info } from './indicators';
export { box, errorBox } from './boxes';
export { table } from './tables';
export type { TableOptions } from './tables';
export { header, hr, truncate } from './text';
export { spinner } from './spinner';
export type { Spinner } from './spinner';

