/**
 * Health report rendering
 *
 * Glyph and color are derived here from the status so the result type
 * stays free of presentation.
 */

import { bold, color, hr, table, header, truncate, type ColorName } from '../utils/ui';
import type { HealthResult, HealthStatus } from './types';

export type OverallHealth = 'HEALTHY' | 'DEGRADED' | 'UNHEALTHY';

export interface HealthSummary {
  fails: number;
  warns: number;
  overall: OverallHealth;
  /** Exit-code decision: true iff no FAIL */
  healthy: boolean;
}

export const REPORT_TITLE = 'KAGE BUNSHIN ENVIRONMENT STATUS';
export const DETAILS_WIDTH = 40;

const GLYPHS: Record<HealthStatus, string> = {
  OK: '✓',
  WARN: '!',
  FAIL: '✗',
};

const STATUS_COLORS: Record<HealthStatus, ColorName> = {
  OK: 'success',
  WARN: 'warning',
  FAIL: 'error',
};

const OVERALL_COLORS: Record<OverallHealth, ColorName> = {
  HEALTHY: 'success',
  DEGRADED: 'warning',
  UNHEALTHY: 'error',
};

export function statusGlyph(status: HealthStatus): string {
  return GLYPHS[status];
}

export function statusColor(status: HealthStatus): ColorName {
  return STATUS_COLORS[status];
}

export function summarizeHealth(results: readonly HealthResult[]): HealthSummary {
  const fails = results.filter((r) => r.status === 'FAIL').length;
  const warns = results.filter((r) => r.status === 'WARN').length;

  let overall: OverallHealth = 'HEALTHY';
  if (fails > 0) overall = 'UNHEALTHY';
  else if (warns > 0) overall = 'DEGRADED';

  return { fails, warns, overall, healthy: fails === 0 };
}

export function overallLine(summary: HealthSummary): string {
  switch (summary.overall) {
    case 'HEALTHY':
      return 'Overall: HEALTHY';
    case 'DEGRADED':
      return `Overall: DEGRADED (${summary.warns} warnings)`;
    case 'UNHEALTHY':
      return `Overall: UNHEALTHY (${summary.fails} failures)`;
  }
}

export function renderHealthReport(results: readonly HealthResult[]): string {
  const summary = summarizeHealth(results);

  const rows = results.map((r) => [
    r.component,
    color(`${statusGlyph(r.status)} ${r.status}`, statusColor(r.status)),
    truncate(r.details, DETAILS_WIDTH),
  ]);

  const lines = [
    '',
    header(REPORT_TITLE),
    hr('='),
    table(rows, { head: ['Component', 'Status', 'Details'] }),
    hr('-'),
    bold(color(overallLine(summary), OVERALL_COLORS[summary.overall])),
    '',
  ];

  return lines.join('\n');
}
