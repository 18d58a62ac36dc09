import { ConfigurationError, parseMaxSteps } from '@fractran/core';
import { isTarget, render, synthesize } from '@fractran/codegen';
import { numberFlag, parseFlagArgs } from '../args.js';
import { deliver, resolveProgram, type CliIo } from './shared.js';

export const CODEGEN_USAGE =
  'Usage: fractran codegen [n/d ...] [--program <file>] [--start <n>] [--target ts|c] [--max-iterations <n>] [--out <file>]\n';

export async function runCodegen(args: readonly string[], io: CliIo): Promise<number> {
  const parsed = parseFlagArgs(
    args,
    ['--program', '--start', '--target', '--max-iterations', '--out'],
    ['--help', '-h'],
  );
  if (parsed.toggles.has('--help') || parsed.toggles.has('-h')) {
    io.stdout(CODEGEN_USAGE);
    return 0;
  }
  const target = parsed.values['--target'] ?? 'ts';
  if (!isTarget(target)) {
    throw new ConfigurationError('E_USAGE', '--target', `expected ts or c, got ${target}`);
  }
  const { program, start } = await resolveProgram(parsed);
  const iterationsFlag = parsed.values['--max-iterations'];

  const module = synthesize(program, {
    start,
    maxIterations: iterationsFlag === undefined ? undefined : parseMaxSteps(numberFlag(iterationsFlag)),
  });
  await deliver(render(module, target), parsed, io);
  return 0;
}
