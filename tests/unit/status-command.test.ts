/**
 * Unit tests for the kb-status command
 */
import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';

import { parseStatusArgs, runStatusCommand, statusHelp } from '../../src/commands/status-command';
import { loadHealthConfig } from '../../src/config';
import { ConfigError, ExitCode, getCleanupCount } from '../../src/errors';
import { initUI } from '../../src/utils/ui';
import { createFakeRunner, exited } from '../mocks/fake-command-runner';
import { mockFetch, restoreFetch, connectionRefused } from '../mocks/mock-fetch';

describe('parseStatusArgs', () => {
  it('should run without arguments', () => {
    expect(parseStatusArgs([])).toBe('run');
  });

  it('should recognize help and version', () => {
    expect(parseStatusArgs(['--help'])).toBe('help');
    expect(parseStatusArgs(['-h'])).toBe('help');
    expect(parseStatusArgs(['--version'])).toBe('version');
    expect(parseStatusArgs(['-v'])).toBe('version');
  });

  it('should reject unknown options', () => {
    expect(() => parseStatusArgs(['--verbose'])).toThrow(ConfigError);
    expect(() => parseStatusArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });
});

describe('statusHelp', () => {
  it('should document usage and the node list variable', () => {
    initUI({ colors: false, interactive: false });
    const help = statusHelp();
    expect(help).toContain('Usage: kb-status [options]');
    expect(help).toContain('KB_NODES');
  });
});

describe('runStatusCommand', () => {
  beforeAll(() => initUI({ colors: false, interactive: false }));
  afterEach(() => restoreFetch());

  const config = loadHealthConfig({}, '/home/tester');

  it('should exit 0 when nothing fails', async () => {
    mockFetch([
      { url: /\/health$/, response: 'ok' },
      { url: /\/api\/tags$/, response: { models: [{ name: 'llama3:8b' }] } },
    ]);
    const fake = createFakeRunner({
      psql: exited(0, '1\n'),
      tailscale: exited(0, JSON.stringify({ Peer: {} })),
    });
    const output: string[] = [];

    const code = await runStatusCommand(config, {
      run: fake.run,
      env: {},
      write: (text) => output.push(text),
    });

    expect(code).toBe(ExitCode.SUCCESS);
    expect(output).toHaveLength(1);
    expect(output[0]?.split('\n').at(-2)).toBe('Overall: HEALTHY');
    expect(getCleanupCount()).toBe(0);
  });

  it('should exit 1 when a check fails', async () => {
    mockFetch([
      { url: /\/health$/, error: connectionRefused() },
      { url: /\/api\/tags$/, response: { models: [] } },
    ]);
    const fake = createFakeRunner({
      psql: exited(0, '1\n'),
      tailscale: exited(0, '{}'),
    });
    const output: string[] = [];

    const code = await runStatusCommand(config, {
      run: fake.run,
      env: {},
      write: (text) => output.push(text),
    });

    expect(code).toBe(ExitCode.GENERAL_ERROR);
    const lines = output[0]?.split('\n') ?? [];
    expect(lines.at(-2)).toBe('Overall: UNHEALTHY (1 failures)');
    expect(lines.find((line) => line.startsWith('API Server'))).toContain(
      'Connection failed: ECONNREFUSED'
    );
  });

  it('should print one indicator line per check in debug mode', async () => {
    mockFetch([
      { url: /\/health$/, response: 'ok' },
      { url: /\/api\/tags$/, response: { models: [] } },
    ]);
    const fake = createFakeRunner({
      psql: exited(2, '', 'no pg_hba.conf entry'),
      tailscale: exited(0, '{}'),
    });
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    try {
      await runStatusCommand(
        { ...config, debug: true },
        { run: fake.run, env: {}, write: () => {} }
      );

      expect(stderr.mock.calls.map((call) => call[0])).toEqual([
        '[OK] API Server: http://localhost:8000 responding',
        '[X] PostgreSQL: no pg_hba.conf entry',
        '[!] Ollama: No models loaded',
        '[OK] Tailscale: 1 nodes online',
      ]);
    } finally {
      stderr.mockRestore();
    }
  });
});
