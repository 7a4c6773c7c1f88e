/**
 * Unit tests for the psql and tailscale checks
 */
import { describe, it, expect } from 'vitest';

import { checkPostgres, checkTailscale, countOnlineNodes, psqlArgs } from '../../src/health';
import { loadHealthConfig } from '../../src/config';
import { ProtocolError, TimeoutFailure, ToolMissingError } from '../../src/errors';
import { createFakeRunner, exited } from '../mocks/fake-command-runner';

const config = loadHealthConfig({}, '/home/tester');
const env = { PATH: '/usr/bin' };

describe('checkPostgres', () => {
  it('should run SELECT 1 without a password prompt', async () => {
    const fake = createFakeRunner({ psql: exited(0, '1\n') });

    const result = await checkPostgres(config, { run: fake.run, env });

    expect(result).toEqual({
      component: 'PostgreSQL',
      status: 'OK',
      details: 'claude_memory@localhost',
    });
    expect(fake.calls).toEqual([
      {
        command: 'psql',
        args: ['-h', 'localhost', '-U', 'claude_mcp', '-d', 'claude_memory', '-c', 'SELECT 1', '-t', '-A', '-w'],
        options: {
          timeoutMs: 10000,
          env: { PATH: '/usr/bin', PGPASSFILE: '/home/tester/.pgpass' },
        },
      },
    ]);
  });

  it('should fail with the first 50 characters of stderr', async () => {
    const fake = createFakeRunner({
      psql: exited(2, '', '  FATAL:  password authentication failed for user "claude_mcp"\n'),
    });

    const result = await checkPostgres(config, { run: fake.run, env });

    expect(result).toEqual({
      component: 'PostgreSQL',
      status: 'FAIL',
      details: 'FATAL:  password authentication failed for user "c',
    });
  });

  it('should name the exit code when stderr is empty', async () => {
    const fake = createFakeRunner({ psql: exited(1) });

    expect((await checkPostgres(config, { run: fake.run, env })).details).toBe(
      'psql exited with code 1'
    );
  });

  it('should warn when psql is not installed', async () => {
    const fake = createFakeRunner({ psql: new ToolMissingError('psql') });

    expect(await checkPostgres(config, { run: fake.run, env })).toEqual({
      component: 'PostgreSQL',
      status: 'WARN',
      details: 'psql not in PATH',
    });
  });

  it('should fail on timeout', async () => {
    const fake = createFakeRunner({ psql: new TimeoutFailure(10000) });

    expect(await checkPostgres(config, { run: fake.run, env })).toEqual({
      component: 'PostgreSQL',
      status: 'FAIL',
      details: 'Connection timeout',
    });
  });

  it('should build arguments from the configured target', () => {
    const custom = loadHealthConfig(
      { PG_HOST: 'db.internal', PG_USER: 'reader', PG_DATABASE: 'memory' },
      '/home/tester'
    );
    expect(psqlArgs(custom).slice(0, 6)).toEqual(['-h', 'db.internal', '-U', 'reader', '-d', 'memory']);
  });
});

describe('countOnlineNodes', () => {
  it('should count online peers plus the local node', () => {
    expect(
      countOnlineNodes({
        Self: { Online: true },
        Peer: {
          'nodekey:a': { Online: true },
          'nodekey:b': { Online: false },
          'nodekey:c': { Online: true },
          'nodekey:d': {},
        },
      })
    ).toBe(3);
  });

  it('should count only the local node without peers', () => {
    expect(countOnlineNodes({})).toBe(1);
    expect(countOnlineNodes({ Peer: null })).toBe(1);
  });

  it('should reject unexpected shapes', () => {
    expect(() => countOnlineNodes([])).toThrow(ProtocolError);
    expect(() => countOnlineNodes({ Peer: ['a'] })).toThrow('Status "Peer" is not an object');
  });
});

describe('checkTailscale', () => {
  it('should report the number of online nodes', async () => {
    const status = {
      Peer: {
        'nodekey:a': { Online: true },
        'nodekey:b': { Online: false },
        'nodekey:c': { Online: true },
      },
    };
    const fake = createFakeRunner({ tailscale: exited(0, JSON.stringify(status)) });

    expect(await checkTailscale(config, { run: fake.run, env })).toEqual({
      component: 'Tailscale',
      status: 'OK',
      details: '3 nodes online',
    });
    expect(fake.calls[0]).toMatchObject({
      command: 'tailscale',
      args: ['status', '--json'],
      options: { timeoutMs: 5000 },
    });
  });

  it('should fail on a nonzero exit', async () => {
    const fake = createFakeRunner({ tailscale: exited(1, '', 'not logged in') });

    expect(await checkTailscale(config, { run: fake.run, env })).toEqual({
      component: 'Tailscale',
      status: 'FAIL',
      details: 'Status check failed',
    });
  });

  it('should warn when tailscale is not installed', async () => {
    const fake = createFakeRunner({ tailscale: new ToolMissingError('tailscale') });

    expect(await checkTailscale(config, { run: fake.run, env })).toEqual({
      component: 'Tailscale',
      status: 'WARN',
      details: 'tailscale not in PATH',
    });
  });

  it('should fail when the output is not JSON', async () => {
    const fake = createFakeRunner({ tailscale: exited(0, 'not json') });

    const result = await checkTailscale(config, { run: fake.run, env });

    expect(result.status).toBe('FAIL');
    expect(result.details).toMatch(/^Unexpected token/);
    expect(result.details.length).toBeLessThanOrEqual(50);
  });

  it('should fail on timeout', async () => {
    const fake = createFakeRunner({ tailscale: new TimeoutFailure(5000) });

    expect((await checkTailscale(config, { run: fake.run, env })).details).toBe(
      'Timed out after 5000ms'
    );
  });
});
