/**
 * Probe runner
 *
 * Sequential, no retries. Generation failures become failed results
 * carrying the truncated error text.
 */

import { errorMessage } from '../errors';
import type { ModelRun, Probe, ProbeClient, ProbeResult } from './types';

export type Clock = () => number;

export interface ProbeHooks {
  onModelStart?: (model: string) => void;
  onResult?: (result: ProbeResult) => void;
  onModelDone?: (run: ModelRun) => void;
}

export async function runProbe(
  client: ProbeClient,
  model: string,
  probe: Probe,
  clock: Clock = Date.now
): Promise<ProbeResult> {
  const start = clock();
  try {
    const response = await client.generate(model, probe.prompt);
    const duration = (clock() - start) / 1000;
    const verdict = probe.validate(response);
    return Object.freeze({
      name: probe.name,
      passed: verdict.passed,
      duration,
      details: verdict.details,
      response,
    });
  } catch (error) {
    const duration = (clock() - start) / 1000;
    return Object.freeze({
      name: probe.name,
      passed: false,
      duration,
      details: `Error: ${errorMessage(error).slice(0, 40)}`,
      response: '',
    });
  }
}

export function runProbes(
  client: ProbeClient,
  model: string,
  probes: readonly Probe[],
  hooks: ProbeHooks = {},
  clock: Clock = Date.now
): Promise<ProbeResult[]> {
  return probes.reduce<Promise<ProbeResult[]>>(async (previous, probe) => {
    const done = await previous;
    const result = await runProbe(client, model, probe, clock);
    hooks.onResult?.(result);
    return [...done, result];
  }, Promise.resolve([]));
}

/**
 * Run the full probe set once per model, in the given order
 */
export function runAcrossModels(
  client: ProbeClient,
  models: readonly string[],
  probes: readonly Probe[],
  hooks: ProbeHooks = {},
  clock: Clock = Date.now
): Promise<ModelRun[]> {
  return models.reduce<Promise<ModelRun[]>>(async (previous, model) => {
    const done = await previous;
    hooks.onModelStart?.(model);
    const results = await runProbes(client, model, probes, hooks, clock);
    const run: ModelRun = { model, results };
    hooks.onModelDone?.(run);
    return [...done, run];
  }, Promise.resolve([]));
}
