/**
 * HTTP helpers over the global fetch
 */

import { ConnectionFailure, ProtocolError, TimeoutFailure, errorMessage } from '../errors';

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * Short cause of a failed fetch: the socket error code when there is one
 * (ECONNREFUSED, ENOTFOUND), otherwise the innermost message.
 */
export function networkReason(error: unknown): string {
  if (!(error instanceof Error)) return String(error);

  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null) {
    if ('code' in cause && typeof cause.code === 'string') return cause.code;
    if ('message' in cause && typeof cause.message === 'string') return cause.message;
  }
  return error.message;
}

/**
 * Issue one request and read the whole body, both within `timeoutMs`.
 *
 * Network failures become ConnectionFailure, an expired bound becomes
 * TimeoutFailure. Every HTTP status resolves; see ensureOk.
 */
export async function httpRequest(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<HttpResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const body = await response.text();
    return { status: response.status, statusText: response.statusText, body };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutFailure(timeoutMs, url);
    }
    throw new ConnectionFailure(networkReason(error), url);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Reject 4xx/5xx the way an unreachable endpoint is rejected,
 * with the status text as reason
 */
export function ensureOk(response: HttpResponse, url: string): HttpResponse {
  if (response.status >= 400) {
    const reason = response.statusText || `HTTP ${response.status}`;
    throw new ConnectionFailure(reason, url, response.status);
  }
  return response;
}

/**
 * Parse a JSON body; the caller validates its shape
 */
export function parseJson(response: HttpResponse): unknown {
  try {
    return JSON.parse(response.body);
  } catch (error) {
    throw new ProtocolError(`Invalid JSON: ${errorMessage(error)}`);
  }
}

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
