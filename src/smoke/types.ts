/**
 * Smoke Test Types
 */

export type ProbeName = 'fibonacci' | 'palindrome' | 'fizzbuzz' | 'json_parse' | 'error_explain';

export interface ProbeResult {
  readonly name: string;
  readonly passed: boolean;
  /** Wall-clock seconds spent in the generation call */
  readonly duration: number;
  readonly details: string;
  /** Raw model output; empty when generation failed */
  readonly response: string;
}

/**
 * Outcome of a validator: pass/fail and which rule decided it
 */
export interface Verdict {
  passed: boolean;
  details: string;
}

export type Validator = (response: string) => Verdict;

export interface Probe {
  name: ProbeName;
  prompt: string;
  validate: Validator;
}

/**
 * What the runner needs from an LLM server; OllamaClient satisfies it
 */
export interface ProbeClient {
  generate(model: string, prompt: string): Promise<string>;
  listModels(): Promise<string[]>;
}

export interface ModelRun {
  model: string;
  results: ProbeResult[];
}
