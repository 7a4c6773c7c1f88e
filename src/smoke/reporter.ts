/**
 * Smoke test report rendering
 */

import { bold, color, header, hr, table, truncate, type ColorName } from '../utils/ui';
import type { ProbeResult } from './types';

export const REPORT_TITLE = 'OLLAMA SMOKE TEST RESULTS';
export const DETAILS_WIDTH = 30;

export interface SmokeSummary {
  passed: number;
  total: number;
  /** Rounded pass rate, 0 when nothing ran */
  percent: number;
  /** Seconds, summed over probes */
  totalTime: number;
  /** Exit-code decision */
  allPassed: boolean;
}

export function summarizeSmoke(results: readonly ProbeResult[]): SmokeSummary {
  const passed = results.filter((r) => r.passed).length;
  const total = results.length;
  const totalTime = results.reduce((sum, r) => sum + r.duration, 0);
  const percent = total > 0 ? Math.round((passed / total) * 100) : 0;

  return { passed, total, percent, totalTime, allPassed: passed === total };
}

export function resultLabel(result: ProbeResult): 'PASS' | 'FAIL' {
  return result.passed ? 'PASS' : 'FAIL';
}

function resultColor(result: ProbeResult): ColorName {
  return result.passed ? 'success' : 'error';
}

/**
 * One line per finished probe while the run is in progress
 */
export function progressLine(result: ProbeResult): string {
  const glyph = result.passed ? '✓' : '✗';
  return `  ${color(glyph, resultColor(result))} ${result.name}: ${resultLabel(result)} (${result.duration.toFixed(1)}s)`;
}

export function summaryLine(summary: SmokeSummary): string {
  return `Summary: ${summary.passed}/${summary.total} passed (${summary.percent}%)`;
}

function summaryColor(summary: SmokeSummary): ColorName {
  if (summary.allPassed) return 'success';
  if (summary.passed > 0) return 'warning';
  return 'error';
}

export function renderSmokeReport(
  model: string,
  host: string,
  results: readonly ProbeResult[]
): string {
  const summary = summarizeSmoke(results);

  const rows = results.map((r) => [
    r.name,
    color(resultLabel(r), resultColor(r)),
    `${r.duration.toFixed(1)}s`,
    truncate(r.details, DETAILS_WIDTH),
  ]);

  const lines = [
    '',
    header(REPORT_TITLE),
    hr('='),
    `Model: ${model}`,
    `Host: ${host}`,
    '',
    table(rows, { head: ['Probe', 'Result', 'Time', 'Details'] }),
    hr('-'),
    bold(color(summaryLine(summary), summaryColor(summary))),
    `Total time: ${summary.totalTime.toFixed(1)}s`,
    '',
  ];

  return lines.join('\n');
}
