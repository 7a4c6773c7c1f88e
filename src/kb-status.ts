#!/usr/bin/env node

/**
 * kb-status: one-shot infrastructure health report
 */

import { handleError, withErrorHandling, UserAbortError } from './errors';
import { loadHealthConfig } from './config';
import { parseStatusArgs, runStatusCommand, statusHelp } from './commands/status-command';
import { initUI } from './utils/ui';
import { getVersion } from './utils/version';

const main = withErrorHandling(async () => {
  const action = parseStatusArgs(process.argv.slice(2));
  initUI();

  if (action === 'help') {
    console.log(statusHelp());
    return;
  }
  if (action === 'version') {
    console.log(`kb-status v${getVersion()}`);
    return;
  }

  process.on('SIGINT', () => handleError(new UserAbortError()));

  process.exitCode = await runStatusCommand(loadHealthConfig());
});

void main();
