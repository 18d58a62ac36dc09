import { ConfigurationError } from '../errors.js';

/** Prime → exponent, in ascending prime order. Empty for 0 and 1. */
export type PrimeFactorization = ReadonlyMap<bigint, number>;

function toBigInt(n: bigint | number): bigint {
  if (typeof n === 'bigint') return n;
  if (!Number.isInteger(n)) {
    throw new ConfigurationError('E_FACTOR_INPUT', '/', `${n} is not an integer`);
  }
  return BigInt(n);
}

/**
 * Trial division by every candidate d with d*d <= remaining. Whatever is left
 * above 1 afterwards is a single prime: n has at most one factor above its root.
 */
export function factorize(n: bigint | number): PrimeFactorization {
  let rest = toBigInt(n);
  if (rest < 0n) {
    throw new ConfigurationError('E_FACTOR_INPUT', '/', `${rest} is negative`);
  }
  const factors = new Map<bigint, number>();
  for (let d = 2n; d * d <= rest; d += d === 2n ? 1n : 2n) {
    while (rest % d === 0n) {
      factors.set(d, (factors.get(d) ?? 0) + 1);
      rest /= d;
    }
  }
  if (rest > 1n) {
    factors.set(rest, (factors.get(rest) ?? 0) + 1);
  }
  return factors;
}

export function expand(factors: PrimeFactorization): bigint {
  let n = 1n;
  for (const [prime, exponent] of factors) {
    n *= prime ** BigInt(exponent);
  }
  return n;
}

export function formatFactorization(factors: PrimeFactorization): string {
  if (factors.size === 0) return '1';
  return Array.from(factors, ([prime, exponent]) => `${prime}^${exponent}`).join(' * ');
}

export function formatState(n: bigint): string {
  return formatFactorization(factorize(n));
}
