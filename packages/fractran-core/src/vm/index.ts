export { FractranEngine } from './engine.js';
export type { EngineOptions, RunOptions, RunResult } from './engine.js';
export { ExecutionTrace } from './trace.js';
export { fractionLabel, formatFraction, renderTrace } from './render.js';
