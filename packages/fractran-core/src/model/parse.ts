import { ConfigurationError } from '../errors.js';
import type { Fraction, Program, Verbosity } from './program.js';

function integerAt(value: unknown, path: string, code: 'E_NUMERATOR' | 'E_DENOMINATOR' | 'E_START'): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) {
    if (!Number.isSafeInteger(value)) {
      throw new ConfigurationError(code, path, `${value} exceeds the safe integer range; pass a bigint`);
    }
    return BigInt(value);
  }
  const shown = typeof value === 'number' ? String(value) : typeof value;
  throw new ConfigurationError(code, path, `expected an integer, got ${shown}`);
}

function pairOf(value: unknown, path: string): [unknown, unknown] {
  if (Array.isArray(value) && value.length === 2) {
    return [value[0], value[1]];
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value) && 'numerator' in value && 'denominator' in value) {
    return [value.numerator, value.denominator];
  }
  throw new ConfigurationError('E_FRACTION_SHAPE', path, 'each fraction must be a [numerator, denominator] pair');
}

export function parseFraction(value: unknown, index: number): Fraction {
  const path = `/${index}`;
  const [rawNumerator, rawDenominator] = pairOf(value, path);
  const numerator = integerAt(rawNumerator, `${path}/0`, 'E_NUMERATOR');
  const denominator = integerAt(rawDenominator, `${path}/1`, 'E_DENOMINATOR');
  if (numerator < 0n) {
    throw new ConfigurationError('E_NUMERATOR', `${path}/0`, `numerator ${numerator} is negative`);
  }
  if (denominator < 1n) {
    throw new ConfigurationError('E_DENOMINATOR', `${path}/1`, `denominator ${denominator} must be positive`);
  }
  // Lowest terms are not checked. The engine treats kn/kd like n/d; synthesized guards test the stored denominator.
  return Object.freeze({ numerator, denominator });
}

export function parseProgram(input: unknown): Program {
  if (!Array.isArray(input)) {
    throw new ConfigurationError('E_FRACTION_SHAPE', '/', 'program must be an array of fractions');
  }
  return Object.freeze(input.map((value, index) => parseFraction(value, index)));
}

export function parseStart(value: unknown): bigint {
  const start = integerAt(value, '/start', 'E_START');
  if (start < 1n) {
    throw new ConfigurationError('E_START', '/start', `starting value ${start} must be positive`);
  }
  return start;
}

export function parseMaxSteps(value: unknown): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1) {
    throw new ConfigurationError('E_MAX_STEPS', '/maxSteps', `expected a positive integer, got ${String(value)}`);
  }
  return value;
}

export function parseVerbosity(value: unknown): Verbosity {
  if (value === 0 || value === 1 || value === 2) return value;
  throw new ConfigurationError('E_VERBOSITY', '/verbosity', `expected 0, 1 or 2, got ${String(value)}`);
}
