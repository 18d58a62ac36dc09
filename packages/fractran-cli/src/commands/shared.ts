import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError, parseProgram, parseStart } from '@fractran/core';
import type { Program } from '@fractran/core';
import { bigIntFlag, type ParsedFlags } from '../args.js';
import { loadProgramFile, parseFractionToken } from '../program-file.js';

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export interface ProgramSource {
  program: Program;
  start: bigint;
}

/** Fractions come from `n/d` positionals or `--program`, never both. `--start` beats the file's start. */
export async function resolveProgram(parsed: ParsedFlags): Promise<ProgramSource> {
  const file = parsed.values['--program'];
  const startFlag = parsed.values['--start'];
  const override = startFlag === undefined ? undefined : parseStart(bigIntFlag(startFlag));

  if (file !== undefined) {
    if (parsed.positionals.length > 0) {
      throw new ConfigurationError('E_USAGE', '--program', 'give fractions on the command line or in a file, not both');
    }
    const loaded = await loadProgramFile(file);
    return { program: loaded.program, start: override ?? loaded.start ?? 2n };
  }

  if (parsed.positionals.length === 0) {
    throw new ConfigurationError('E_USAGE', '/', 'no fractions given; pass n/d tokens or --program <file>');
  }
  const pairs = parsed.positionals.map((token, index) => parseFractionToken(token, `/argv/${index}`));
  return { program: parseProgram(pairs), start: override ?? 2n };
}

/** Writes `text` to `--out` when given and reports where; otherwise prints it. */
export async function deliver(text: string, parsed: ParsedFlags, io: CliIo): Promise<void> {
  const out = parsed.values['--out'];
  if (out === undefined) {
    io.stdout(text);
    return;
  }
  await mkdir(path.dirname(out), { recursive: true });
  await writeFile(out, text, 'utf-8');
  io.stdout(`wrote ${out}\n`);
}
