export type { Branch, ElseBranch, Guard, RegisterInit, RegisterModule, Stmt } from './ast.js';
export { programRegisters, initialRegisters, renderRegisters, comparePrimes } from './registers.js';
export type { RegisterSet } from './registers.js';
export { synthesize } from './synthesize.js';
export type { SynthesizeOptions } from './synthesize.js';
export { render, renderers, isTarget, renderC, renderTypeScript, LineWriter } from './render/index.js';
export type { Renderer, Target } from './render/index.js';
