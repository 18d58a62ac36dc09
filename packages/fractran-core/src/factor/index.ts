export { factorize, expand, formatFactorization, formatState } from './factorize.js';
export type { PrimeFactorization } from './factorize.js';
