import { readFileSync } from 'node:fs';
import type { FractionInput } from '../../src/model/program.js';

const FIXTURES = new URL('../../../../fixtures/', import.meta.url);

function isPair(value: unknown): value is [number, number] {
  return Array.isArray(value) && value.length === 2 && value.every((v) => typeof v === 'number');
}

export function loadFractions(name: string): FractionInput[] {
  const parsed: unknown = JSON.parse(readFileSync(new URL(name, FIXTURES), 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || !('fractions' in parsed) || !Array.isArray(parsed.fractions)) {
    throw new Error(`fixture ${name} has no fractions`);
  }
  const fractions: unknown[] = parsed.fractions;
  return fractions.map((value, i) => {
    if (!isPair(value)) throw new Error(`fixture ${name} fraction ${i} is not a numeric pair`);
    return value;
  });
}

export const PRIMEGAME_SEQUENCE = [
  2n, 15n, 825n, 725n, 1925n, 2275n, 425n, 390n, 330n, 290n,
  770n, 910n, 170n, 156n, 132n, 116n, 308n, 364n, 68n, 4n,
  30n, 225n, 12375n, 10875n, 28875n,
];
