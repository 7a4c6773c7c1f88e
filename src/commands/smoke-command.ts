/**
 * llm-smoke command
 *
 * Usage:
 *   llm-smoke [-m model] [-H host] [-t seconds] [-q]   Test one model
 *   llm-smoke --all [-q]                                Test every installed model
 */

import { ExitCode, exitCodeFor } from '../errors';
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_SECONDS, type SmokeConfig } from '../config';
import { OllamaClient } from '../ollama/client';
import {
  progressLine,
  renderSmokeReport,
  runAcrossModels,
  selectProbes,
  summarizeSmoke,
  type ProbeClient,
} from '../smoke';
import { color, errorBox, info } from '../utils/ui';

export interface SmokeCommandDeps {
  client?: ProbeClient;
  write?: (text: string) => void;
}

export function smokeHelp(): string {
  return [
    '',
    'Usage: llm-smoke [options]',
    '',
    'Send fixed coding prompts to an Ollama server and check the answers.',
    '',
    'Options:',
    `  --model, -m <name>     Model to test (default: ${DEFAULT_MODEL})`,
    '  --host, -H <url>       Ollama host URL (default: $OLLAMA_HOST or http://localhost:11434)',
    '  --all, -a              Test all available models',
    '  --quick, -q            Quick test (fibonacci and palindrome only)',
    `  --timeout, -t <secs>   Request timeout (default: $OLLAMA_TIMEOUT or ${DEFAULT_TIMEOUT_SECONDS})`,
    '  --help, -h             Show this help message',
    '  --version, -v          Show version',
    '',
    'Exit status is 0 when every probe passed, 1 otherwise.',
    '',
  ].join('\n');
}

/**
 * Run the probes for one model, or for every model with --all,
 * print progress and reports, and return the exit code
 */
export async function runSmokeCommand(
  config: SmokeConfig,
  deps: SmokeCommandDeps = {}
): Promise<ExitCode> {
  const write = deps.write ?? ((text: string) => console.log(text));
  const client = deps.client ?? new OllamaClient(config.host, config.timeoutSeconds * 1000);
  const probes = selectProbes(config.quick);

  let models: string[] = [config.model];
  if (config.all) {
    models = await client.listModels();
    if (models.length === 0) {
      write(errorBox('No models found!'));
      return ExitCode.GENERAL_ERROR;
    }
    write(`Testing ${models.length} models...`);
  }

  if (config.debug) {
    console.error(info(`host=${config.host} timeout=${config.timeoutSeconds}s probes=${probes.length}`));
  }

  const runs = await runAcrossModels(client, models, probes, {
    onModelStart: (model) => {
      write(config.all ? `\n--- Testing ${color(model, 'info')} ---` : `Running smoke test for ${model}...`);
    },
    onResult: (result) => write(progressLine(result)),
    onModelDone: (run) => write(renderSmokeReport(run.model, config.host, run.results)),
  });

  return exitCodeFor(runs.every((run) => summarizeSmoke(run.results).allPassed));
}
