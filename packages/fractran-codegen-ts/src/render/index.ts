import type { RegisterModule } from '../ast.js';
import { renderC } from './c.js';
import { renderTypeScript } from './typescript.js';

export type Target = 'ts' | 'c';

export type Renderer = (module: RegisterModule) => string;

export const renderers: Readonly<Record<Target, Renderer>> = Object.freeze({
  ts: renderTypeScript,
  c: renderC,
});

export function isTarget(value: string): value is Target {
  return Object.prototype.hasOwnProperty.call(renderers, value);
}

export function render(module: RegisterModule, target: Target = 'ts'): string {
  return renderers[target](module);
}

export { renderC, renderTypeScript };
export { LineWriter } from './writer.js';
