import { formatState } from '../factor/factorize.js';
import type { Fraction, Program, TraceEntry } from '../model/program.js';

// A..Z, then AA, AB, ... (bijective base 26).
export function fractionLabel(index: number): string {
  let n = index + 1;
  let label = '';
  while (n > 0) {
    const r = (n - 1) % 26;
    label = String.fromCharCode(65 + r) + label;
    n = Math.floor((n - 1) / 26);
  }
  return label;
}

export function formatFraction(fraction: Fraction): string {
  return `${fraction.numerator}/${fraction.denominator}`;
}

function formatEntryState(entry: TraceEntry): string {
  if (entry.state === 0n) return `0 (${entry.halt ?? 'halted'})`;
  return formatState(entry.state);
}

/**
 * One line per entry: the state's factorization, followed by the fraction that
 * produced the next entry, if one did.
 */
export function renderTrace(program: Program, entries: readonly TraceEntry[]): string {
  return entries
    .map((entry, i) => {
      const base = formatEntryState(entry);
      const next = entries[i + 1];
      if (next?.fraction === undefined) return base;
      const fraction = program[next.fraction];
      return `${base}  *${formatFraction(fraction)} (${fractionLabel(next.fraction)})`;
    })
    .join('\n');
}
