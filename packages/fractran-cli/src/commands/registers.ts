import { renderRegisters } from '@fractran/codegen';
import { parseFlagArgs } from '../args.js';
import { deliver, resolveProgram, type CliIo } from './shared.js';

export const REGISTERS_USAGE = 'Usage: fractran registers [n/d ...] [--program <file>] [--out <file>]\n';

export async function runRegisters(args: readonly string[], io: CliIo): Promise<number> {
  const parsed = parseFlagArgs(args, ['--program', '--out'], ['--help', '-h']);
  if (parsed.toggles.has('--help') || parsed.toggles.has('-h')) {
    io.stdout(REGISTERS_USAGE);
    return 0;
  }
  const { program } = await resolveProgram(parsed);
  await deliver(`${renderRegisters(program)}\n`, parsed, io);
  return 0;
}
