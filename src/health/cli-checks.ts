/**
 * CLI-backed Checks
 *
 * PostgreSQL through psql and the Tailscale mesh through its status command.
 */

import { ProtocolError, TimeoutFailure, ToolMissingError, errorMessage } from '../errors';
import { isRecord } from '../utils/http';
import type { HealthConfig } from '../config';
import { healthResult, type HealthDeps, type HealthResult } from './types';

export const POSTGRES_COMPONENT = 'PostgreSQL';
export const TAILSCALE_COMPONENT = 'Tailscale';

/**
 * psql arguments for a non-interactive `SELECT 1`; -w never prompts for a password
 */
export function psqlArgs(config: HealthConfig): string[] {
  return [
    '-h',
    config.pgHost,
    '-U',
    config.pgUser,
    '-d',
    config.pgDatabase,
    '-c',
    'SELECT 1',
    '-t',
    '-A',
    '-w',
  ];
}

export async function checkPostgres(config: HealthConfig, deps: HealthDeps): Promise<HealthResult> {
  try {
    const result = await deps.run('psql', psqlArgs(config), {
      timeoutMs: config.timeouts.postgres,
      env: { ...deps.env, PGPASSFILE: config.pgPassFile },
    });

    if (result.exitCode === 0) {
      return healthResult(POSTGRES_COMPONENT, 'OK', `${config.pgDatabase}@${config.pgHost}`);
    }
    const stderr = result.stderr.trim().slice(0, 50);
    return healthResult(
      POSTGRES_COMPONENT,
      'FAIL',
      stderr || `psql exited with code ${result.exitCode}`
    );
  } catch (error) {
    if (error instanceof TimeoutFailure) {
      return healthResult(POSTGRES_COMPONENT, 'FAIL', 'Connection timeout');
    }
    if (error instanceof ToolMissingError) {
      return healthResult(POSTGRES_COMPONENT, 'WARN', error.message);
    }
    return healthResult(POSTGRES_COMPONENT, 'FAIL', errorMessage(error).slice(0, 50));
  }
}

/**
 * Nodes online according to `tailscale status --json`:
 * peers flagged Online plus the local node
 */
export function countOnlineNodes(status: unknown): number {
  if (!isRecord(status)) {
    throw new ProtocolError('Status output is not a JSON object');
  }

  const peers = status['Peer'] ?? {};
  if (!isRecord(peers)) {
    throw new ProtocolError('Status "Peer" is not an object');
  }

  const online = Object.values(peers).filter(
    (peer) => isRecord(peer) && peer['Online'] === true
  ).length;
  return online + 1;
}

export async function checkTailscale(config: HealthConfig, deps: HealthDeps): Promise<HealthResult> {
  try {
    const result = await deps.run('tailscale', ['status', '--json'], {
      timeoutMs: config.timeouts.tailscale,
      env: deps.env,
    });

    if (result.exitCode !== 0) {
      return healthResult(TAILSCALE_COMPONENT, 'FAIL', 'Status check failed');
    }
    const nodes = countOnlineNodes(JSON.parse(result.stdout));
    return healthResult(TAILSCALE_COMPONENT, 'OK', `${nodes} nodes online`);
  } catch (error) {
    if (error instanceof ToolMissingError) {
      return healthResult(TAILSCALE_COMPONENT, 'WARN', error.message);
    }
    return healthResult(TAILSCALE_COMPONENT, 'FAIL', errorMessage(error).slice(0, 50));
  }
}
