import { formatState } from '../factor/factorize.js';
import { emit } from '../events/log.js';
import { defaultMaxSteps } from '../util/env.js';
import { parseMaxSteps, parseProgram, parseStart, parseVerbosity } from '../model/parse.js';
import type {
  DiagnosticSink,
  Fraction,
  FractionInput,
  HaltReason,
  IntegerLike,
  Program,
  TraceEntry,
  Verbosity,
} from '../model/program.js';
import { ExecutionTrace } from './trace.js';
import { renderTrace } from './render.js';

export interface EngineOptions {
  /** Defaults to 2. */
  start?: IntegerLike;
  /** Defaults to FRACTRAN_MAX_STEPS, or 100. */
  maxSteps?: number;
  verbosity?: Verbosity;
  sink?: DiagnosticSink;
}

export interface RunOptions {
  /** Resets the trace to this value before running. */
  start?: IntegerLike;
  verbosity?: Verbosity;
  maxSteps?: number;
}

export interface RunResult {
  /** Last state before the halt marker. */
  state: bigint;
  halt: HaltReason;
  /** Fractions applied during this call. */
  steps: number;
}

const stdoutSink: DiagnosticSink = (line) => {
  process.stdout.write(line + '\n');
};

/**
 * FRACTRAN interpreter over arbitrary-precision state. An instance owns its
 * trace; it is not safe to drive one instance from several callers at once.
 */
export class FractranEngine {
  readonly program: Program;
  private history: ExecutionTrace;
  private readonly maxSteps: number;
  private readonly verbosity: Verbosity;
  private readonly sink: DiagnosticSink;

  constructor(fractions: readonly (FractionInput | Fraction)[], options: EngineOptions = {}) {
    const program = parseProgram(fractions);
    const start = parseStart(options.start ?? 2);
    const maxSteps = parseMaxSteps(options.maxSteps ?? defaultMaxSteps());
    const verbosity = parseVerbosity(options.verbosity ?? 0);

    this.program = program;
    this.history = new ExecutionTrace(start);
    this.maxSteps = maxSteps;
    this.verbosity = verbosity;
    this.sink = options.sink ?? stdoutSink;
  }

  get trace(): readonly TraceEntry[] {
    return this.history.entries();
  }

  get states(): bigint[] {
    return this.history.entries().map((entry) => entry.state);
  }

  get transitions(): number[] {
    const out: number[] = [];
    for (const entry of this.history.entries()) {
      if (entry.fraction !== undefined) out.push(entry.fraction);
    }
    return out;
  }

  get current(): bigint {
    return this.history.current;
  }

  get haltReason(): HaltReason | undefined {
    return this.history.haltReason;
  }

  /** Applies the first fraction that divides evenly, or appends a halt. */
  step(verbosity: Verbosity = this.verbosity): TraceEntry {
    const current = this.history.current;
    const index = this.history.length;

    if (current === 0n) {
      return this.history.append({ state: 0n, halt: this.history.haltReason ?? 'halted' });
    }

    for (const [position, fraction] of this.program.entries()) {
      const { numerator, denominator } = fraction;
      if (verbosity === 2) {
        this.sink(`trying ${numerator}/${denominator} * ${current}`);
      }
      emit({ kind: 'Attempt', step: index, fraction: position, state: current.toString() });

      const product = numerator * current;
      if (product % denominator === 0n) {
        const next = product / denominator;
        if (verbosity > 0) {
          this.sink(`Success! N_${index} = ${numerator}/${denominator}*${current} = ${next} = ${formatState(next)}`);
        }
        emit({ kind: 'Apply', step: index, fraction: position, from: current.toString(), to: next.toString() });
        return this.history.append({ state: next, fraction: position });
      }
    }

    if (verbosity > 0) {
      this.sink(`Halt: no fraction applies to N_${index - 1} = ${current}`);
    }
    emit({ kind: 'Halt', step: index, reason: 'halted' });
    return this.history.append({ state: 0n, halt: 'halted' });
  }

  run(options: RunOptions = {}): RunResult {
    const verbosity = options.verbosity === undefined ? this.verbosity : parseVerbosity(options.verbosity);
    const maxSteps = options.maxSteps === undefined ? this.maxSteps : parseMaxSteps(options.maxSteps);
    if (options.start !== undefined) {
      this.history = new ExecutionTrace(parseStart(options.start));
    }

    let steps = 0;
    while (this.history.current !== 0n) {
      if (this.history.length >= maxSteps) {
        this.cap(maxSteps, verbosity);
      } else if (this.step(verbosity).fraction !== undefined) {
        steps += 1;
      }
    }

    return {
      state: this.history.lastLive,
      halt: this.history.haltReason ?? 'halted',
      steps,
    };
  }

  // The trace holds at most maxSteps live states before the capped 0.
  private cap(maxSteps: number, verbosity: Verbosity): void {
    if (verbosity > 0) {
      this.sink(`Capped: step budget of ${maxSteps} exhausted`);
    }
    emit({ kind: 'Halt', step: this.history.length, reason: 'capped' });
    this.history.append({ state: 0n, halt: 'capped' });
  }

  render(): string {
    return renderTrace(this.program, this.history.entries());
  }
}
