/**
 * Ollama HTTP client
 *
 * Only the two endpoints the diagnostics need: GET /api/tags and a
 * non-streamed POST /api/generate.
 */

import { ProtocolError } from '../errors';
import { ensureOk, httpRequest, isRecord, parseJson } from '../utils/http';

export const TAGS_TIMEOUT_MS = 10000;

/**
 * Extract model names from a /api/tags body: `{"models": [{"name": str}, ...]}`.
 * A missing `models` key means no models.
 */
export function parseModelNames(body: unknown): string[] {
  if (!isRecord(body)) {
    throw new ProtocolError('Model list is not a JSON object');
  }

  const models = body['models'] ?? [];
  if (!Array.isArray(models)) {
    throw new ProtocolError('Model list "models" is not an array');
  }

  return models.map((entry: unknown) => {
    const name = isRecord(entry) ? entry['name'] : undefined;
    if (typeof name !== 'string') {
      throw new ProtocolError('Model entry without a name');
    }
    return name;
  });
}

/**
 * Extract the completion text from a non-streamed /api/generate body
 */
export function parseGenerateResponse(body: unknown): string {
  if (!isRecord(body)) {
    throw new ProtocolError('Generate response is not a JSON object');
  }
  const text = body['response'];
  return typeof text === 'string' ? text : '';
}

export class OllamaClient {
  readonly host: string;

  constructor(
    host: string,
    private readonly generateTimeoutMs: number = 60000
  ) {
    this.host = host.replace(/\/+$/, '');
  }

  /**
   * Names of the installed models. Throws the typed network/protocol errors.
   */
  async tags(timeoutMs: number = TAGS_TIMEOUT_MS): Promise<string[]> {
    const url = `${this.host}/api/tags`;
    const response = ensureOk(await httpRequest(url, { method: 'GET' }, timeoutMs), url);
    return parseModelNames(parseJson(response));
  }

  /**
   * Like tags(), but an unreachable or confused server simply has no models
   */
  async listModels(): Promise<string[]> {
    try {
      return await this.tags();
    } catch {
      return [];
    }
  }

  async generate(model: string, prompt: string): Promise<string> {
    const url = `${this.host}/api/generate`;
    const response = ensureOk(
      await httpRequest(
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ model, prompt, stream: false }),
        },
        this.generateTimeoutMs
      ),
      url
    );
    return parseGenerateResponse(parseJson(response));
  }
}
