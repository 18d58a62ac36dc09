import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import { ConfigurationError, parseProgram, parseStart } from '@fractran/core';
import type { FractionInput, Program } from '@fractran/core';

type IntegerText = number | string;

export interface ProgramFile {
  name?: string;
  start?: IntegerText;
  fractions: Array<[IntegerText, IntegerText] | string>;
}

export interface LoadedProgram {
  name: string | undefined;
  start: bigint | undefined;
  program: Program;
}

const SCHEMA_URL = new URL('../../../schema/fractran-program.schema.json', import.meta.url);

const ajv = new Ajv({ allErrors: true, strict: false });
const validateProgramFile: ValidateFunction<ProgramFile> = ajv.compile<ProgramFile>(
  JSON.parse(readFileSync(SCHEMA_URL, 'utf-8')),
);

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return 'unknown error';
  }
  return errors
    .map((error) => `${error.instancePath || '/'} ${error.message ?? 'validation error'}`)
    .join(', ');
}

function toBigInt(value: IntegerText, path: string): bigint {
  if (typeof value === 'string') return BigInt(value);
  if (!Number.isSafeInteger(value)) {
    throw new ConfigurationError('E_PROGRAM_FILE', path, `${value} is not exact; write it as a decimal string`);
  }
  return BigInt(value);
}

/** Parses an `n/d` token into a bigint pair. */
export function parseFractionToken(token: string, path: string): FractionInput {
  const match = /^(\d+)\/(\d+)$/.exec(token);
  if (!match) {
    throw new ConfigurationError('E_FRACTION_SHAPE', path, `expected n/d, got ${JSON.stringify(token)}`);
  }
  const [, numerator, denominator] = match;
  return [BigInt(numerator), BigInt(denominator)];
}

export function parseProgramFile(value: unknown, label: string): LoadedProgram {
  if (!validateProgramFile(value)) {
    throw new ConfigurationError('E_PROGRAM_FILE', label, formatErrors(validateProgramFile.errors));
  }
  const pairs = value.fractions.map((fraction, index): FractionInput => {
    const path = `/fractions/${index}`;
    if (typeof fraction === 'string') return parseFractionToken(fraction, path);
    const [numerator, denominator] = fraction;
    return [toBigInt(numerator, `${path}/0`), toBigInt(denominator, `${path}/1`)];
  });
  const { start } = value;
  return {
    name: value.name,
    start: start === undefined ? undefined : parseStart(toBigInt(start, '/start')),
    program: parseProgram(pairs),
  };
}

export async function loadProgramFile(filePath: string): Promise<LoadedProgram> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('E_PROGRAM_FILE', filePath, `cannot read: ${reason}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('E_PROGRAM_FILE', filePath, `invalid JSON: ${reason}`);
  }
  return parseProgramFile(parsed, filePath);
}
