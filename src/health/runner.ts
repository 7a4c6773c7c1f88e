/**
 * Health check runner
 *
 * Fixed order: API, PostgreSQL, Ollama, Tailscale, then configured nodes.
 * Strictly sequential; one result per planned check.
 */

import { errorMessage } from '../errors';
import type { HealthConfig } from '../config';
import { checkApiServer, checkOllama, API_COMPONENT, OLLAMA_COMPONENT } from './service-checks';
import {
  checkPostgres,
  checkTailscale,
  POSTGRES_COMPONENT,
  TAILSCALE_COMPONENT,
} from './cli-checks';
import { checkNode } from './network-checks';
import { healthResult, type HealthDeps, type HealthResult, type PlannedCheck } from './types';

export interface RunHooks {
  onStart?: (component: string) => void;
  onResult?: (result: HealthResult) => void;
}

export function planChecks(config: HealthConfig, deps: HealthDeps): PlannedCheck[] {
  const core: PlannedCheck[] = [
    { component: API_COMPONENT, execute: () => checkApiServer(config) },
    { component: POSTGRES_COMPONENT, execute: () => checkPostgres(config, deps) },
    { component: OLLAMA_COMPONENT, execute: () => checkOllama(config) },
    { component: TAILSCALE_COMPONENT, execute: () => checkTailscale(config, deps) },
  ];

  const nodes = config.nodes.map(
    (target): PlannedCheck => ({
      component: `Node: ${target.label}`,
      execute: () => checkNode(target, config.timeouts.node),
    })
  );

  return [...core, ...nodes];
}

/**
 * Checks map their own failures; this only guards against a check that
 * breaks that contract so the run still yields one result per check.
 */
async function settle(check: PlannedCheck): Promise<HealthResult> {
  try {
    return await check.execute();
  } catch (error) {
    return healthResult(check.component, 'FAIL', errorMessage(error).slice(0, 50));
  }
}

/**
 * Fold the planned checks into an ordered list of results
 */
export function runChecks(
  checks: readonly PlannedCheck[],
  hooks: RunHooks = {}
): Promise<HealthResult[]> {
  return checks.reduce<Promise<HealthResult[]>>(async (previous, check) => {
    const done = await previous;
    hooks.onStart?.(check.component);
    const result = await settle(check);
    hooks.onResult?.(result);
    return [...done, result];
  }, Promise.resolve([]));
}
