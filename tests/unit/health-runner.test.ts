/**
 * Unit tests for the health check runner
 */
import { describe, it, expect, afterEach } from 'vitest';

import { planChecks, runChecks, healthResult, type PlannedCheck } from '../../src/health';
import { loadHealthConfig } from '../../src/config';
import { ToolMissingError } from '../../src/errors';
import { createFakeRunner, exited } from '../mocks/fake-command-runner';
import { mockFetch, restoreFetch } from '../mocks/mock-fetch';

describe('planChecks', () => {
  it('should order core checks before configured nodes', () => {
    const config = loadHealthConfig({ KB_NODES: '10.0.0.5=gpu-primary,10.0.0.6' }, '/home/tester');
    const fake = createFakeRunner({});

    expect(planChecks(config, { run: fake.run, env: {} }).map((c) => c.component)).toEqual([
      'API Server',
      'PostgreSQL',
      'Ollama',
      'Tailscale',
      'Node: gpu-primary',
      'Node: 10.0.0.6',
    ]);
  });
});

describe('runChecks', () => {
  afterEach(() => restoreFetch());

  it('should run checks one after another and report each result', async () => {
    const events: string[] = [];
    const check = (component: string): PlannedCheck => ({
      component,
      execute: async () => {
        events.push(`run ${component}`);
        return healthResult(component, 'OK', 'fine');
      },
    });

    const results = await runChecks([check('a'), check('b')], {
      onStart: (component) => events.push(`start ${component}`),
      onResult: (result) => events.push(`done ${result.component}`),
    });

    expect(results.map((r) => r.component)).toEqual(['a', 'b']);
    expect(events).toEqual(['start a', 'run a', 'done a', 'start b', 'run b', 'done b']);
  });

  it('should turn a throwing check into a FAIL result', async () => {
    const results = await runChecks([
      {
        component: 'Broken',
        execute: async () => {
          throw new Error('unexpected failure inside the check');
        },
      },
    ]);

    expect(results).toEqual([
      { component: 'Broken', status: 'FAIL', details: 'unexpected failure inside the check' },
    ]);
  });

  it('should produce one result per planned check against fakes', async () => {
    mockFetch([
      { url: 'http://localhost:8000/health', response: { status: 'ok' } },
      { url: 'http://localhost:11434/api/tags', response: { models: [] } },
    ]);
    const fake = createFakeRunner({
      psql: exited(0, '1\n'),
      tailscale: new ToolMissingError('tailscale'),
    });
    const config = loadHealthConfig({}, '/home/tester');

    const results = await runChecks(planChecks(config, { run: fake.run, env: {} }));

    expect(results).toEqual([
      { component: 'API Server', status: 'OK', details: 'http://localhost:8000 responding' },
      { component: 'PostgreSQL', status: 'OK', details: 'claude_memory@localhost' },
      { component: 'Ollama', status: 'WARN', details: 'No models loaded' },
      { component: 'Tailscale', status: 'WARN', details: 'tailscale not in PATH' },
    ]);
  });
});
