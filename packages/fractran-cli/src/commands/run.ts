import { FractranEngine, parseMaxSteps, parseVerbosity } from '@fractran/core';
import { numberFlag, parseFlagArgs } from '../args.js';
import { deliver, resolveProgram, type CliIo } from './shared.js';

export const RUN_USAGE =
  'Usage: fractran run [n/d ...] [--program <file>] [--start <n>] [--max-steps <n>] [--verbose 0|1|2] [--out <file>]\n';

export async function runRun(args: readonly string[], io: CliIo): Promise<number> {
  const parsed = parseFlagArgs(
    args,
    ['--program', '--start', '--max-steps', '--verbose', '--out'],
    ['--help', '-h'],
  );
  if (parsed.toggles.has('--help') || parsed.toggles.has('-h')) {
    io.stdout(RUN_USAGE);
    return 0;
  }
  const { program, start } = await resolveProgram(parsed);
  const maxStepsFlag = parsed.values['--max-steps'];
  const verboseFlag = parsed.values['--verbose'];

  const engine = new FractranEngine(program, {
    start,
    maxSteps: maxStepsFlag === undefined ? undefined : parseMaxSteps(numberFlag(maxStepsFlag)),
    verbosity: verboseFlag === undefined ? 0 : parseVerbosity(numberFlag(verboseFlag)),
    sink: (line) => io.stdout(`${line}\n`),
  });
  const result = engine.run();

  await deliver(
    `${engine.render()}\nhalt=${result.halt} steps=${result.steps} state=${result.state}\n`,
    parsed,
    io,
  );
  return 0;
}
