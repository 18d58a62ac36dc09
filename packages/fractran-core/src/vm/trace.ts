import type { HaltReason, TraceEntry } from '../model/program.js';

/** Append-only step history. Entry 0 is the starting state. */
export class ExecutionTrace {
  private readonly items: TraceEntry[];

  constructor(start: bigint) {
    this.items = [Object.freeze({ state: start })];
  }

  get length(): number {
    return this.items.length;
  }

  get tail(): TraceEntry {
    return this.items[this.items.length - 1];
  }

  get current(): bigint {
    return this.tail.state;
  }

  get haltReason(): HaltReason | undefined {
    return this.tail.halt;
  }

  /** Last state before any halt marker. */
  get lastLive(): bigint {
    for (let i = this.items.length - 1; i >= 0; i -= 1) {
      if (this.items[i].state !== 0n) return this.items[i].state;
    }
    return 0n;
  }

  append(entry: TraceEntry): TraceEntry {
    const frozen = Object.freeze({ ...entry });
    this.items.push(frozen);
    return frozen;
  }

  entries(): readonly TraceEntry[] {
    return this.items.slice();
  }
}
