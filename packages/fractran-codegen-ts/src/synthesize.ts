import {
  defaultMaxSteps,
  factorize,
  formatFraction,
  fractionLabel,
  parseMaxSteps,
} from '@fractran/core';
import type { Fraction, IntegerLike, Program } from '@fractran/core';
import type { Branch, ElseBranch, Guard, RegisterModule, Stmt } from './ast.js';
import { initialRegisters } from './registers.js';

export interface SynthesizeOptions {
  /** Defaults to 2. */
  start?: IntegerLike;
  /** Defaults to FRACTRAN_MAX_STEPS, or 100. */
  maxIterations?: number;
}

function guardsFor(fraction: Fraction): Guard[] {
  if (fraction.numerator === 0n) return [];
  return Array.from(factorize(fraction.denominator), ([register, atLeast]) => ({ register, atLeast }));
}

function actionsFor(fraction: Fraction): Stmt[] {
  if (fraction.numerator === 0n) {
    return [{ kind: 'clear' }];
  }
  const actions: Stmt[] = [];
  for (const [register, exponent] of factorize(fraction.denominator)) {
    actions.push({ kind: 'adjust', register, delta: -exponent });
  }
  for (const [register, exponent] of factorize(fraction.numerator)) {
    actions.push({ kind: 'adjust', register, delta: exponent });
  }
  return actions;
}

function describe(fraction: Fraction, index: number): string {
  return `fraction ${fractionLabel(index)} (${formatFraction(fraction)})`;
}

/**
 * Builds the guarded-branch chain: first match wins, mirroring the engine's
 * scan. A denominator of 1 or a numerator of 0 is always eligible, so it closes
 * the chain (as the first branch or as `else`) and everything after it is
 * unreachable.
 */
function buildChain(program: Program): Stmt[] {
  const branches: Branch[] = [];
  const unreachable: Stmt[] = [];
  let otherwise: ElseBranch | null = null;
  let closed = false;

  for (const [index, fraction] of program.entries()) {
    const note = describe(fraction, index);
    if (closed) {
      unreachable.push({ kind: 'comment', text: `${note} is unreachable` });
      continue;
    }
    const body = actionsFor(fraction);
    if (fraction.denominator === 1n || fraction.numerator === 0n) {
      closed = true;
      if (index > 0) {
        otherwise = { note, body };
        continue;
      }
    }
    branches.push({ guards: guardsFor(fraction), note, body });
  }

  if (!closed) {
    otherwise = { note: 'no fraction applies', body: [{ kind: 'clear' }] };
  }
  return [{ kind: 'if', branches, otherwise }, ...unreachable];
}

export function synthesize(program: Program, options: SynthesizeOptions = {}): RegisterModule {
  const init = initialRegisters(program, options.start ?? 2);
  const maxIterations = parseMaxSteps(options.maxIterations ?? defaultMaxSteps());

  const body: Stmt[] = [
    { kind: 'comment', text: 'Starting conditions', section: true },
    {
      kind: 'declare',
      registers: Array.from(init, ([register, value]) => ({ register, value })),
    },
    { kind: 'comment', text: 'Main loop', section: true },
    {
      kind: 'loop',
      maxIterations,
      body: [...buildChain(program), { kind: 'print' }],
    },
  ];
  return { registers: [...init.keys()], body };
}
