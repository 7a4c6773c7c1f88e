/**
 * Health Check Modules - Barrel Export
 */

export type { HealthStatus, HealthResult, HealthDeps, PlannedCheck } from './types';
export { healthResult } from './types';

export { checkApiServer, checkOllama } from './service-checks';
export { checkPostgres, checkTailscale, countOnlineNodes, psqlArgs } from './cli-checks';
export { checkNode } from './network-checks';

export { planChecks, runChecks } from './runner';
export type { RunHooks } from './runner';

export {
  summarizeHealth,
  renderHealthReport,
  overallLine,
  statusGlyph,
  statusColor,
} from './reporter';
export type { HealthSummary, OverallHealth } from './reporter';
