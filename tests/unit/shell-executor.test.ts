/**
 * Unit tests for the subprocess executor
 */
import { describe, it, expect } from 'vitest';

import { runCommand } from '../../src/utils/shell-executor';
import { TimeoutFailure, ToolMissingError } from '../../src/errors';

describe('runCommand', () => {
  it('should capture output and the exit code', async () => {
    const result = await runCommand(
      process.execPath,
      ['-e', 'process.stdout.write("hi"); process.stderr.write("oops"); process.exit(3)'],
      { timeoutMs: 5000 }
    );

    expect(result).toEqual({ exitCode: 3, stdout: 'hi', stderr: 'oops' });
  });

  it('should pass the given environment', async () => {
    const result = await runCommand(
      process.execPath,
      ['-e', 'process.stdout.write(process.env.PGPASSFILE || "")'],
      { timeoutMs: 5000, env: { PGPASSFILE: '/home/tester/.pgpass' } }
    );

    expect(result.stdout).toBe('/home/tester/.pgpass');
  });

  it('should reject with ToolMissingError for an unknown binary', async () => {
    const attempt = runCommand('kb-status-no-such-binary', [], { timeoutMs: 5000 });

    await expect(attempt).rejects.toBeInstanceOf(ToolMissingError);
    await expect(attempt).rejects.toThrow('kb-status-no-such-binary not in PATH');
  });

  it('should kill the child and reject on timeout', async () => {
    const attempt = runCommand(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], {
      timeoutMs: 100,
    });

    await expect(attempt).rejects.toBeInstanceOf(TimeoutFailure);
  });
});
