import type { Branch, Guard, RegisterModule, Stmt } from '../ast.js';
import { LineWriter } from './writer.js';

const reg = (register: bigint): string => `registers["${register}"]`;

function condition(guards: readonly Guard[]): string {
  if (guards.length === 0) return 'true';
  return guards.map((g) => `${reg(g.register)} >= ${g.atLeast}`).join(' && ');
}

function emitBranch(out: LineWriter, keyword: string, branch: Branch): void {
  out.line(`${keyword} (${condition(branch.guards)}) { // ${branch.note}`);
  out.indented(() => emitBlock(out, branch.body));
}

function emitBlock(out: LineWriter, body: readonly Stmt[]): void {
  for (const stmt of body) emitStmt(out, stmt);
}

function emitStmt(out: LineWriter, stmt: Stmt): void {
  switch (stmt.kind) {
    case 'comment':
      if (stmt.section) out.gap();
      out.line(`// ${stmt.text}`);
      break;
    case 'declare': {
      const { registers } = stmt;
      if (registers.length === 0) {
        out.line('const registers: Record<string, number> = {};');
        break;
      }
      out.line('const registers: Record<string, number> = {');
      out.indented(() => {
        for (const { register, value } of registers) out.line(`"${register}": ${value},`);
      });
      out.line('};');
      break;
    }
    case 'loop': {
      const { body, maxIterations } = stmt;
      out.line('let counter = 0;');
      out.line('while (Object.values(registers).some((value) => value > 0)) {');
      out.indented(() => {
        out.line('counter += 1;');
        emitBlock(out, body);
        out.line(`if (counter >= ${maxIterations}) break;`);
      });
      out.line('}');
      break;
    }
    case 'if': {
      const [first, ...rest] = stmt.branches;
      if (first === undefined) {
        if (stmt.otherwise) emitBlock(out, stmt.otherwise.body);
        break;
      }
      emitBranch(out, 'if', first);
      for (const branch of rest) emitBranch(out, '} else if', branch);
      if (stmt.otherwise) {
        const { note, body } = stmt.otherwise;
        out.line(`} else { // ${note}`);
        out.indented(() => emitBlock(out, body));
      }
      out.line('}');
      break;
    }
    case 'adjust':
      out.line(`${reg(stmt.register)} ${stmt.delta < 0 ? '-=' : '+='} ${Math.abs(stmt.delta)};`);
      break;
    case 'clear':
      out.line('for (const prime of Object.keys(registers)) registers[prime] = 0;');
      break;
    case 'print':
      out.line(
        'console.log(Object.entries(registers).map(([prime, exponent]) => prime + "^" + exponent).join(" * "));',
      );
      break;
    default: {
      const _: never = stmt;
      throw new Error('unknown statement');
    }
  }
}

export function renderTypeScript(module: RegisterModule): string {
  const out = new LineWriter();
  emitBlock(out, module.body);
  return out.toString();
}
