/**
 * Smoke Test Modules - Barrel Export
 */

export type {
  ProbeName,
  ProbeResult,
  Verdict,
  Validator,
  Probe,
  ProbeClient,
  ModelRun,
} from './types';

export {
  PROBES,
  QUICK_PROBE_COUNT,
  NAME_ERROR_KEYWORDS,
  selectProbes,
  validateFibonacci,
  validatePalindrome,
  validateFizzBuzz,
  validateJsonParse,
  validateErrorExplain,
} from './probes';

export { runProbe, runProbes, runAcrossModels } from './runner';
export type { ProbeHooks, Clock } from './runner';

export {
  summarizeSmoke,
  renderSmokeReport,
  progressLine,
  summaryLine,
  resultLabel,
} from './reporter';
export type { SmokeSummary } from './reporter';
