/**
 * Node reachability over raw TCP
 */

import * as net from 'net';
import type { NodeTarget } from '../config';
import { healthResult, type HealthResult, type HealthStatus } from './types';

/** Socket errors that mean the port answered "no" or the route is gone */
const CLOSED_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
]);

/**
 * Open and immediately close a TCP connection to target.host:target.port
 */
export function checkNode(target: NodeTarget, timeoutMs: number): Promise<HealthResult> {
  const component = `Node: ${target.label}`;

  return new Promise((resolve) => {
    let settled = false;
    const socket = net.createConnection({ host: target.host, port: target.port });

    const finish = (status: HealthStatus, details: string): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(healthResult(component, status, details));
    };

    socket.setTimeout(timeoutMs);

    socket.on('connect', () => finish('OK', `${target.host} reachable`));

    socket.on('timeout', () => finish('FAIL', `${target.host} timeout`));

    socket.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code && CLOSED_CODES.has(err.code)) {
        finish('FAIL', `${target.host} port ${target.port} closed`);
      } else {
        finish('FAIL', err.message.slice(0, 30));
      }
    });
  });
}
