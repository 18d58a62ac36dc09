import type { Branch, Guard, RegisterModule, Stmt } from '../ast.js';
import { LineWriter } from './writer.js';

// C has no zero-length arrays; keep one dummy slot when there are no registers.
const SIZE = 'REGISTER_COUNT > 0 ? REGISTER_COUNT : 1';

const PRELUDE = [
  'static int any_nonzero(void) {',
  '  for (int i = 0; i < REGISTER_COUNT; i++) {',
  '    if (registers[i] > 0) return 1;',
  '  }',
  '  return 0;',
  '}',
  '',
  'static void clear_registers(void) {',
  '  for (int i = 0; i < REGISTER_COUNT; i++) registers[i] = 0;',
  '}',
  '',
  'static void print_registers(void) {',
  '  for (int i = 0; i < REGISTER_COUNT; i++) {',
  '    printf("%s%s^%lld", i > 0 ? " * " : "", primes[i], registers[i]);',
  '  }',
  '  printf("\\n");',
  '}',
];

class CEmitter {
  private readonly slots: ReadonlyMap<bigint, number>;

  constructor(module: RegisterModule) {
    this.slots = new Map(module.registers.map((register, i) => [register, i]));
  }

  private reg(register: bigint): string {
    const slot = this.slots.get(register);
    if (slot === undefined) throw new Error(`undeclared register ${register}`);
    return `registers[${slot}]`;
  }

  private condition(guards: readonly Guard[]): string {
    if (guards.length === 0) return '1';
    return guards.map((g) => `${this.reg(g.register)} >= ${g.atLeast}`).join(' && ');
  }

  private branch(out: LineWriter, keyword: string, branch: Branch): void {
    out.line(`${keyword} (${this.condition(branch.guards)}) { /* ${branch.note} */`);
    out.indented(() => this.block(out, branch.body));
  }

  block(out: LineWriter, body: readonly Stmt[]): void {
    for (const stmt of body) this.stmt(out, stmt);
  }

  stmt(out: LineWriter, stmt: Stmt): void {
    switch (stmt.kind) {
      case 'comment':
        if (stmt.section) out.gap();
        out.line(`// ${stmt.text}`);
        break;
      case 'declare': {
        const primes = stmt.registers.map(({ register }) => `"${register}"`);
        const values = stmt.registers.map(({ value }) => String(value));
        out.line(`static const char *primes[${SIZE}] = {${primes.length > 0 ? primes.join(', ') : '""'}};`);
        out.line(`static long long registers[${SIZE}] = {${values.length > 0 ? values.join(', ') : '0'}};`);
        break;
      }
      case 'loop': {
        const { body, maxIterations } = stmt;
        out.line('long counter = 0;');
        out.line('while (any_nonzero()) {');
        out.indented(() => {
          out.line('counter += 1;');
          this.block(out, body);
          out.line(`if (counter >= ${maxIterations}) break;`);
        });
        out.line('}');
        break;
      }
      case 'if': {
        const [first, ...rest] = stmt.branches;
        if (first === undefined) {
          if (stmt.otherwise) this.block(out, stmt.otherwise.body);
          break;
        }
        this.branch(out, 'if', first);
        for (const branch of rest) this.branch(out, '} else if', branch);
        if (stmt.otherwise) {
          const { note, body } = stmt.otherwise;
          out.line(`} else { /* ${note} */`);
          out.indented(() => this.block(out, body));
        }
        out.line('}');
        break;
      }
      case 'adjust':
        out.line(`${this.reg(stmt.register)} ${stmt.delta < 0 ? '-=' : '+='} ${Math.abs(stmt.delta)};`);
        break;
      case 'clear':
        out.line('clear_registers();');
        break;
      case 'print':
        out.line('print_registers();');
        break;
      default: {
        const _: never = stmt;
        throw new Error('unknown statement');
      }
    }
  }
}

/**
 * Declarations (everything up to and including `declare`) go to file scope,
 * the rest into `main`.
 */
export function renderC(module: RegisterModule): string {
  const emitter = new CEmitter(module);
  const split = module.body.findIndex((stmt) => stmt.kind === 'declare') + 1;

  const out = new LineWriter();
  out.line('#include <stdio.h>');
  out.line();
  out.line(`#define REGISTER_COUNT ${module.registers.length}`);
  emitter.block(out, module.body.slice(0, split));
  out.line();
  for (const text of PRELUDE) out.line(text);
  out.line();
  out.line('int main(void) {');
  out.indented(() => {
    emitter.block(out, module.body.slice(split));
    out.line('return 0;');
  });
  out.line('}');
  return out.toString();
}
