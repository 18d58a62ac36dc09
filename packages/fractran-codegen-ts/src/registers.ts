import { factorize, parseStart } from '@fractran/core';
import type { IntegerLike, Program } from '@fractran/core';

/** Prime (register name) → exponent, ascending by prime. */
export type RegisterSet = ReadonlyMap<bigint, number>;

export const comparePrimes = (a: bigint, b: bigint): number => (a < b ? -1 : a > b ? 1 : 0);

function sorted(registers: Map<bigint, number>): RegisterSet {
  return new Map([...registers.entries()].sort(([a], [b]) => comparePrimes(a, b)));
}

/** Every prime of every numerator and denominator, all at 0. */
export function programRegisters(program: Program): RegisterSet {
  const registers = new Map<bigint, number>();
  for (const { numerator, denominator } of program) {
    for (const prime of factorize(numerator).keys()) registers.set(prime, 0);
    for (const prime of factorize(denominator).keys()) registers.set(prime, 0);
  }
  return sorted(registers);
}

/**
 * Program registers overlaid with the starting state's factorization. Primes
 * of the start that no fraction mentions come along as inert registers.
 */
export function initialRegisters(program: Program, start: IntegerLike): RegisterSet {
  const registers = new Map(programRegisters(program));
  for (const [prime, exponent] of factorize(parseStart(start))) {
    registers.set(prime, exponent);
  }
  return sorted(registers);
}

export function renderRegisters(program: Program): string {
  const primes = [...programRegisters(program).keys()];
  if (primes.length === 0) return '0 registers';
  const noun = primes.length === 1 ? 'register' : 'registers';
  return `${primes.length} ${noun}: ${primes.join(', ')}`;
}
