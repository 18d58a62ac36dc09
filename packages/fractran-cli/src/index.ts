import { isConfigurationError } from '@fractran/core';
import { runCodegen } from './commands/codegen.js';
import { runRegisters } from './commands/registers.js';
import { runRun } from './commands/run.js';
import { processIo, type CliIo } from './commands/shared.js';

export const HELP_TEXT =
  `fractran — run FRACTRAN programs and synthesize register machines\n\n` +
  `Usage:\n` +
  `  fractran --help                          Show this message\n` +
  `  fractran run [n/d ...] [flags]           Run a program and print its trace\n` +
  `  fractran registers [n/d ...] [flags]     List the prime registers a program uses\n` +
  `  fractran codegen [n/d ...] [flags]       Emit an equivalent register program\n` +
  `\n` +
  `Flags:\n` +
  `  --program <file>       Read fractions (and start) from a JSON program file\n` +
  `  --start <n>            Starting value (default 2)\n` +
  `  --max-steps <n>        Trace length cap for run (default FRACTRAN_MAX_STEPS or 100)\n` +
  `  --verbose 0|1|2        Step diagnostics for run\n` +
  `  --target ts|c          Output language for codegen (default ts)\n` +
  `  --max-iterations <n>   Loop cap for codegen (default FRACTRAN_MAX_STEPS or 100)\n` +
  `  --out <file>           Write the output to a file\n` +
  `\n` +
  `Exit codes:\n` +
  `  0 — success\n` +
  `  1 — usage or configuration error\n` +
  `  2 — unexpected failure`;

type Command = (args: readonly string[], io: CliIo) => Promise<number>;

const commands: Readonly<Record<string, Command>> = Object.freeze({
  run: runRun,
  registers: runRegisters,
  codegen: runCodegen,
});

export async function main(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    io.stdout(`${HELP_TEXT}\n`);
    return 0;
  }
  const [name, ...rest] = argv;
  const command = Object.hasOwn(commands, name) ? commands[name] : undefined;
  if (command === undefined) {
    io.stderr(`unknown command: ${name}\n${HELP_TEXT}\n`);
    return 1;
  }
  try {
    return await command(rest, io);
  } catch (error) {
    if (isConfigurationError(error)) {
      io.stderr(`${error.message}\n`);
      return 1;
    }
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
    return 2;
  }
}

export { parseFlagArgs } from './args.js';
export type { ParsedFlags } from './args.js';
export { loadProgramFile, parseProgramFile, parseFractionToken } from './program-file.js';
export type { LoadedProgram, ProgramFile } from './program-file.js';
export { processIo } from './commands/shared.js';
export type { CliIo } from './commands/shared.js';
