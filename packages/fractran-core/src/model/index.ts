export type {
  Fraction,
  Program,
  IntegerLike,
  FractionInput,
  HaltReason,
  TraceEntry,
  Verbosity,
  DiagnosticSink,
} from './program.js';
export { parseFraction, parseProgram, parseStart, parseMaxSteps, parseVerbosity } from './parse.js';
