import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { parseProgram } from '@fractran/core';
import { render, synthesize } from '@fractran/codegen';
import { HELP_TEXT, main } from '../src/index.js';
import type { CliIo } from '../src/index.js';

const fixture = (name: string): string => fileURLToPath(new URL(`../../../fixtures/${name}`, import.meta.url));

interface Captured extends CliIo {
  out: string;
  err: string;
}

function capture(): Captured {
  const io: Captured = {
    out: '',
    err: '',
    stdout: (text) => {
      io.out += text;
    },
    stderr: (text) => {
      io.err += text;
    },
  };
  return io;
}

const HALVE_FROM_8 = [
  '2^3  *1/2 (A)',
  '2^2  *1/2 (A)',
  '2^1  *1/2 (A)',
  '1',
  '0 (halted)',
  'halt=halted steps=3 state=1',
  '',
].join('\n');

describe('fractran run', () => {
  it('runs fractions given on the command line', async () => {
    const io = capture();
    expect(await main(['run', '1/2', '--start', '8'], io)).toBe(0);
    expect(io.out).toBe(HALVE_FROM_8);
    expect(io.err).toBe('');
  });

  it('reads a program file with a string start', async () => {
    const io = capture();
    expect(await main(['run', '--program', fixture('halve.json')], io)).toBe(0);
    expect(io.out).toBe(HALVE_FROM_8);
  });

  it('caps PRIMEGAME and reports the last live state', async () => {
    const io = capture();
    expect(await main(['run', '--program', fixture('primegame.json'), '--max-steps=3'], io)).toBe(0);
    expect(io.out).toBe(
      [
        '2^1  *15/2 (L)',
        '3^1 * 5^1  *55/1 (N)',
        '3^1 * 5^2 * 11^1',
        '0 (capped)',
        'halt=capped steps=2 state=825',
        '',
      ].join('\n'),
    );
  });

  it('prints step diagnostics before the trace', async () => {
    const io = capture();
    expect(await main(['run', '1/2', '--start', '4', '--verbose', '1', '--max-steps', '100'], io)).toBe(0);
    expect(io.out.split('\n')).toEqual([
      'Success! N_1 = 1/2*4 = 2 = 2^1',
      'Success! N_2 = 1/2*2 = 1 = 1',
      'Halt: no fraction applies to N_2 = 1',
      '2^2  *1/2 (A)',
      '2^1  *1/2 (A)',
      '1',
      '0 (halted)',
      'halt=halted steps=2 state=1',
      '',
    ]);
  });

  it('writes to --out and says where', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'fractran-cli-'));
    try {
      const target = path.join(dir, 'nested', 'trace.txt');
      const io = capture();
      expect(await main(['run', '1/2', '--start', '8', '--out', target], io)).toBe(0);
      expect(io.out).toBe(`wrote ${target}\n`);
      expect(await readFile(target, 'utf-8')).toBe(HALVE_FROM_8);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('fractran registers', () => {
  it('lists the registers of a program file', async () => {
    const io = capture();
    expect(await main(['registers', '--program', fixture('primegame.json')], io)).toBe(0);
    expect(io.out).toBe('10 registers: 2, 3, 5, 7, 11, 13, 17, 19, 23, 29\n');
  });
});

describe('fractran codegen', () => {
  const halve = synthesize(parseProgram([[1, 2]]), { start: 8, maxIterations: 7 });

  it('emits TypeScript by default', async () => {
    const io = capture();
    expect(await main(['codegen', '1/2', '--start', '8', '--max-iterations', '7'], io)).toBe(0);
    expect(io.out).toBe(render(halve, 'ts'));
  });

  it('emits C on request', async () => {
    const io = capture();
    expect(await main(['codegen', '1/2', '--start', '8', '--max-iterations', '7', '--target', 'c'], io)).toBe(0);
    expect(io.out).toBe(render(halve, 'c'));
    expect(io.out.startsWith('#include <stdio.h>\n')).toBe(true);
  });

  it('rejects an unknown target', async () => {
    const io = capture();
    expect(await main(['codegen', '1/2', '--target', 'wasm'], io)).toBe(1);
    expect(io.err).toBe('E_USAGE --target: expected ts or c, got wasm\n');
    expect(io.out).toBe('');
  });
});

describe('fractran usage errors', () => {
  it('prints help', async () => {
    const io = capture();
    expect(await main(['--help'], io)).toBe(0);
    expect(io.out).toBe(`${HELP_TEXT}\n`);
  });

  it('rejects an unknown command', async () => {
    const io = capture();
    expect(await main(['frobnicate'], io)).toBe(1);
    expect(io.err.startsWith('unknown command: frobnicate\n')).toBe(true);
  });

  it('rejects a malformed fraction token', async () => {
    const io = capture();
    expect(await main(['run', '3/x'], io)).toBe(1);
    expect(io.err).toBe('E_FRACTION_SHAPE /argv/0: expected n/d, got "3/x"\n');
  });

  it('rejects a zero start', async () => {
    const io = capture();
    expect(await main(['run', '1/2', '--start', '0'], io)).toBe(1);
    expect(io.err).toBe('E_START /start: starting value 0 must be positive\n');
  });

  it('rejects an unknown flag', async () => {
    const io = capture();
    expect(await main(['run', '1/2', '--bogus'], io)).toBe(1);
    expect(io.err).toBe('E_USAGE --bogus: unknown flag\n');
  });

  it('requires a program', async () => {
    const io = capture();
    expect(await main(['registers'], io)).toBe(1);
    expect(io.err).toBe('E_USAGE /: no fractions given; pass n/d tokens or --program <file>\n');
  });

  it('refuses fractions from two sources', async () => {
    const io = capture();
    expect(await main(['registers', '3/2', '--program', fixture('halve.json')], io)).toBe(1);
    expect(io.err).toBe('E_USAGE --program: give fractions on the command line or in a file, not both\n');
  });

  it('rejects a verbosity out of range', async () => {
    const io = capture();
    expect(await main(['run', '1/2', '--verbose', '3'], io)).toBe(1);
    expect(io.err).toBe('E_VERBOSITY /verbosity: expected 0, 1 or 2, got 3\n');
  });
});
