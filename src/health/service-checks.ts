/**
 * HTTP Service Checks
 *
 * API server /health and the Ollama model list.
 */

import { ConnectionFailure, errorMessage } from '../errors';
import { OllamaClient } from '../ollama/client';
import { ensureOk, httpRequest } from '../utils/http';
import type { HealthConfig } from '../config';
import { healthResult, type HealthResult } from './types';

export const API_COMPONENT = 'API Server';
export const OLLAMA_COMPONENT = 'Ollama';

/**
 * GET {apiHost}/health: 200 is OK, any other non-error status is WARN
 */
export async function checkApiServer(config: HealthConfig): Promise<HealthResult> {
  const url = `${config.apiHost}/health`;

  try {
    const response = ensureOk(await httpRequest(url, { method: 'GET' }, config.timeouts.api), url);
    if (response.status === 200) {
      return healthResult(API_COMPONENT, 'OK', `${config.apiHost} responding`);
    }
    return healthResult(API_COMPONENT, 'WARN', `Status ${response.status}`);
  } catch (error) {
    if (error instanceof ConnectionFailure) {
      return healthResult(API_COMPONENT, 'FAIL', `Connection failed: ${error.reason}`);
    }
    return healthResult(API_COMPONENT, 'FAIL', errorMessage(error));
  }
}

/**
 * GET {ollamaHost}/api/tags: OK with a sample of names, WARN when empty
 */
export async function checkOllama(config: HealthConfig): Promise<HealthResult> {
  const client = new OllamaClient(config.ollamaHost);

  try {
    const models = await client.tags(config.timeouts.ollama);
    if (models.length === 0) {
      return healthResult(OLLAMA_COMPONENT, 'WARN', 'No models loaded');
    }
    const sample = models.slice(0, 3).join(', ');
    return healthResult(OLLAMA_COMPONENT, 'OK', `${models.length} models: ${sample}`);
  } catch (error) {
    if (error instanceof ConnectionFailure) {
      return healthResult(OLLAMA_COMPONENT, 'FAIL', `Unreachable: ${error.reason}`);
    }
    return healthResult(OLLAMA_COMPONENT, 'FAIL', errorMessage(error).slice(0, 50));
  }
}
