#!/usr/bin/env node

/**
 * llm-smoke: coding-probe smoke test for Ollama models
 */

import { handleError, withErrorHandling, UserAbortError } from './errors';
import { parseSmokeArgs } from './config';
import { runSmokeCommand, smokeHelp } from './commands/smoke-command';
import { initUI } from './utils/ui';
import { getVersion } from './utils/version';

const main = withErrorHandling(async () => {
  const command = parseSmokeArgs(process.argv.slice(2));
  initUI();

  if (command.kind === 'help') {
    console.log(smokeHelp());
    return;
  }
  if (command.kind === 'version') {
    console.log(`llm-smoke v${getVersion()}`);
    return;
  }

  process.on('SIGINT', () => handleError(new UserAbortError()));

  process.exitCode = await runSmokeCommand(command.config);
});

void main();
