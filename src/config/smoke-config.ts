/**
 * Smoke test configuration: CLI flags over environment over defaults
 */

import { ConfigError } from '../errors';
import { stripTrailingSlash } from './health-config';

export const DEFAULT_MODEL = 'deepseek-coder:33b';
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
export const DEFAULT_TIMEOUT_SECONDS = 60;
/** Largest bound a Node timer can hold (2^31 - 1 ms), in whole seconds */
export const MAX_TIMEOUT_SECONDS = 2147483;

export interface SmokeConfig {
  readonly host: string;
  readonly model: string;
  readonly timeoutSeconds: number;
  /** Test every model from /api/tags instead of `model` */
  readonly all: boolean;
  /** Run only the first two probes */
  readonly quick: boolean;
  readonly debug: boolean;
}

export type SmokeCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; config: SmokeConfig };

interface RawFlags {
  model?: string;
  host?: string;
  timeout?: string;
  all: boolean;
  quick: boolean;
  help: boolean;
  version: boolean;
}

const VALUE_FLAGS: Record<string, 'model' | 'host' | 'timeout'> = {
  '--model': 'model',
  '-m': 'model',
  '--host': 'host',
  '-H': 'host',
  '--timeout': 'timeout',
  '-t': 'timeout',
};

const BOOLEAN_FLAGS: Record<string, 'all' | 'quick' | 'help' | 'version'> = {
  '--all': 'all',
  '-a': 'all',
  '--quick': 'quick',
  '-q': 'quick',
  '--help': 'help',
  '-h': 'help',
  '--version': 'version',
  '-v': 'version',
};

function readFlags(args: string[]): RawFlags {
  const flags: RawFlags = { all: false, quick: false, help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);

    const valueKey = VALUE_FLAGS[name];
    if (valueKey) {
      let value: string | undefined;
      if (eq !== -1) {
        value = arg.slice(eq + 1);
      } else {
        value = args[i + 1];
        i++;
      }
      if (value === undefined || value === '' || (eq === -1 && value.startsWith('-'))) {
        throw new ConfigError(`Missing value for ${name}`, name);
      }
      flags[valueKey] = value;
      continue;
    }

    const boolKey = BOOLEAN_FLAGS[name];
    if (boolKey && eq === -1) {
      flags[boolKey] = true;
      continue;
    }

    throw new ConfigError(`Unknown option: ${arg}`, arg);
  }

  return flags;
}

function parseTimeout(value: string, source: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`${source} must be a positive number of seconds, got "${value}"`, source);
  }
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new ConfigError(`${source} must be at most ${MAX_TIMEOUT_SECONDS} seconds, got "${value}"`, source);
  }
  return seconds;
}

/**
 * Resolve argv (without node and script) and the environment into a command
 */
export function parseSmokeArgs(
  args: string[],
  env: NodeJS.ProcessEnv = process.env
): SmokeCommand {
  const flags = readFlags(args);

  if (flags.help) return { kind: 'help' };
  if (flags.version) return { kind: 'version' };

  let timeoutSeconds = DEFAULT_TIMEOUT_SECONDS;
  if (flags.timeout !== undefined) {
    timeoutSeconds = parseTimeout(flags.timeout, '--timeout');
  } else if (env['OLLAMA_TIMEOUT']) {
    timeoutSeconds = parseTimeout(env['OLLAMA_TIMEOUT'], 'OLLAMA_TIMEOUT');
  }

  return {
    kind: 'run',
    config: {
      host: stripTrailingSlash(flags.host ?? (env['OLLAMA_HOST'] || DEFAULT_OLLAMA_HOST)),
      model: flags.model ?? DEFAULT_MODEL,
      timeoutSeconds,
      all: flags.all,
      quick: flags.quick,
      debug: env['KB_DEBUG'] === '1' || env['KB_DEBUG'] === 'true',
    },
  };
}
