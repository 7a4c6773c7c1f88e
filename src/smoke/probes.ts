/**
 * Probe catalogue
 *
 * Each probe is a fixed prompt plus a validator over the raw response.
 * Validators are plain keyword checks; generated code is never executed.
 * The first failing rule names the verdict.
 */

import type { Probe, Verdict } from './types';

const pass = (details: string): Verdict => ({ passed: true, details });
const reject = (details: string): Verdict => ({ passed: false, details });

const NO_FUNCTION = 'No function definition found';

export function validateFibonacci(response: string): Verdict {
  const lower = response.toLowerCase();
  if (!lower.includes('def ')) return reject(NO_FUNCTION);
  if (!lower.includes('fibonacci')) return reject('Function name not found');
  if (!lower.includes('return')) return reject('No return statement');
  return pass('Function generated correctly');
}

/**
 * Reversal alone still passes, with a weaker reason than reversal plus
 * case normalization
 */
export function validatePalindrome(response: string): Verdict {
  if (!response.toLowerCase().includes('def ')) return reject(NO_FUNCTION);

  const hasReverse = response.includes('[::-1]') || response.toLowerCase().includes('reversed');
  const hasLower = response.includes('.lower()') || response.includes('lower');

  if (hasReverse && hasLower) return pass('Handles case and reversal');
  if (hasReverse) return pass('Uses string reversal');
  return reject('Missing palindrome logic');
}

export function validateFizzBuzz(response: string): Verdict {
  const lower = response.toLowerCase();
  if (!lower.includes('def ')) return reject(NO_FUNCTION);

  const hasFizz = lower.includes('fizz');
  const hasBuzz = lower.includes('buzz');
  const hasMod = response.includes('%');

  if (hasFizz && hasBuzz && hasMod) return pass('Loop with modulo logic');
  return reject('Missing FizzBuzz logic');
}

export function validateJsonParse(response: string): Verdict {
  const lower = response.toLowerCase();
  if (!lower.includes('json')) return reject('No json module usage');
  // json.loads or json.load
  if (lower.includes('load')) return pass('Uses json.loads()');
  return reject('Missing JSON parsing');
}

export const NAME_ERROR_KEYWORDS: readonly string[] = [
  'not defined',
  'undefined',
  "doesn't exist",
  'not exist',
  'variable',
  'declared',
];

export function validateErrorExplain(response: string): Verdict {
  const lower = response.toLowerCase();
  if (NAME_ERROR_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    return pass('Identified NameError issue');
  }
  return reject('Did not explain error');
}

export const PROBES: readonly Probe[] = [
  {
    name: 'fibonacci',
    prompt:
      'Write a Python function called fibonacci(n) that returns the nth fibonacci number. Just the code, no explanation.',
    validate: validateFibonacci,
  },
  {
    name: 'palindrome',
    prompt:
      'Write a Python function is_palindrome(s) that returns True if string s is a palindrome (ignoring case and spaces). Just the code.',
    validate: validatePalindrome,
  },
  {
    name: 'fizzbuzz',
    prompt: 'Write a Python function fizzbuzz(n) that prints FizzBuzz from 1 to n. Just the code.',
    validate: validateFizzBuzz,
  },
  {
    name: 'json_parse',
    prompt:
      'Write a Python function get_name(json_str) that parses a JSON string and returns the "name" field. Just the code.',
    validate: validateJsonParse,
  },
  {
    name: 'error_explain',
    prompt: "Explain this Python error in one sentence:\n```\nNameError: name 'x' is not defined\n```",
    validate: validateErrorExplain,
  },
];

export const QUICK_PROBE_COUNT = 2;

/**
 * Quick mode keeps the first two probes, full mode all five
 */
export function selectProbes(quick: boolean): readonly Probe[] {
  return quick ? PROBES.slice(0, QUICK_PROBE_COUNT) : PROBES;
}
