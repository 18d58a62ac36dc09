export interface Fraction {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/** Ordered; position is priority for the scan rule. */
export type Program = readonly Fraction[];

export type IntegerLike = number | bigint;

export type FractionInput = readonly [IntegerLike, IntegerLike];

export type HaltReason = 'halted' | 'capped';

export interface TraceEntry {
  readonly state: bigint;
  /** Index of the fraction whose application produced this state. */
  readonly fraction?: number;
  readonly halt?: HaltReason;
}

/** 0 silent, 1 successful matches, 2 every attempted fraction. */
export type Verbosity = 0 | 1 | 2;

export type DiagnosticSink = (line: string) => void;
