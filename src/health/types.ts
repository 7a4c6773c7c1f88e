/**
 * Health Check Types
 *
 * Core types for the infrastructure health checker.
 */

import type { CommandRunner } from '../utils/shell-executor';

/** Tri-state severity; WARN is degraded but not fatal */
export type HealthStatus = 'OK' | 'WARN' | 'FAIL';

export interface HealthResult {
  readonly component: string;
  readonly status: HealthStatus;
  readonly details: string;
}

export function healthResult(
  component: string,
  status: HealthStatus,
  details: string
): HealthResult {
  return Object.freeze({ component, status, details });
}

/**
 * Collaborators a check needs besides its config
 */
export interface HealthDeps {
  run: CommandRunner;
  env: NodeJS.ProcessEnv;
}

/**
 * A check bound to its inputs, ready for the runner
 */
export interface PlannedCheck {
  component: string;
  execute: () => Promise<HealthResult>;
}
