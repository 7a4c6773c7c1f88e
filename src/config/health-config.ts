/**
 * Health checker configuration
 *
 * Read once from the environment at startup and passed down by reference.
 */

import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../errors';

export const SSH_PORT = 22;

export interface NodeTarget {
  host: string;
  label: string;
  port: number;
}

/** Per-check time bounds, in milliseconds */
export interface HealthTimeouts {
  api: number;
  postgres: number;
  ollama: number;
  tailscale: number;
  node: number;
}

export interface HealthConfig {
  readonly apiHost: string;
  readonly ollamaHost: string;
  readonly pgHost: string;
  readonly pgDatabase: string;
  readonly pgUser: string;
  /** Handed to psql as PGPASSFILE so it never prompts */
  readonly pgPassFile: string;
  readonly nodes: readonly NodeTarget[];
  readonly timeouts: Readonly<HealthTimeouts>;
  readonly debug: boolean;
}

export const DEFAULT_HEALTH_TIMEOUTS: Readonly<HealthTimeouts> = {
  api: 5000,
  postgres: 10000,
  ollama: 10000,
  tailscale: 5000,
  node: 3000,
};

export const HEALTH_DEFAULTS = {
  apiHost: 'http://localhost:8000',
  ollamaHost: 'http://localhost:11434',
  pgHost: 'localhost',
  pgDatabase: 'claude_memory',
  pgUser: 'claude_mcp',
} as const;

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Parse KB_NODES: comma separated `host=label` pairs.
 * A bare `host` is labelled with itself. Empty input means no node checks.
 */
export function parseNodeList(value: string | undefined): NodeTarget[] {
  if (!value || !value.trim()) return [];

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const eq = entry.indexOf('=');
      const host = (eq === -1 ? entry : entry.slice(0, eq)).trim();
      const label = (eq === -1 ? host : entry.slice(eq + 1)).trim();
      if (!host) {
        throw new ConfigError(`KB_NODES entry "${entry}" has no host`, 'KB_NODES');
      }
      return { host, label: label || host, port: SSH_PORT };
    });
}

function envOr(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = env[key];
  return value && value.trim() ? value.trim() : fallback;
}

export function loadHealthConfig(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): HealthConfig {
  return {
    apiHost: stripTrailingSlash(envOr(env, 'KB_API_HOST', HEALTH_DEFAULTS.apiHost)),
    ollamaHost: stripTrailingSlash(envOr(env, 'OLLAMA_HOST', HEALTH_DEFAULTS.ollamaHost)),
    pgHost: envOr(env, 'PG_HOST', HEALTH_DEFAULTS.pgHost),
    pgDatabase: envOr(env, 'PG_DATABASE', HEALTH_DEFAULTS.pgDatabase),
    pgUser: envOr(env, 'PG_USER', HEALTH_DEFAULTS.pgUser),
    pgPassFile: path.join(homeDir, '.pgpass'),
    nodes: parseNodeList(env['KB_NODES']),
    timeouts: DEFAULT_HEALTH_TIMEOUTS,
    debug: env['KB_DEBUG'] === '1' || env['KB_DEBUG'] === 'true',
  };
}
