export interface Attempt {
  kind: 'Attempt';
  step: number;
  fraction: number;
  state: string;
}

export interface Apply {
  kind: 'Apply';
  step: number;
  fraction: number;
  from: string;
  to: string;
}

export interface Halt {
  kind: 'Halt';
  step: number;
  reason: 'halted' | 'capped';
}

export type StepEvent =
  | Attempt
  | Apply
  | Halt;
