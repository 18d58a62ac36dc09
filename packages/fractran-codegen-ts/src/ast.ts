export interface RegisterInit {
  readonly register: bigint;
  readonly value: number;
}

/** `register >= atLeast`. */
export interface Guard {
  readonly register: bigint;
  readonly atLeast: number;
}

export interface Branch {
  /** Empty means unconditional. */
  readonly guards: readonly Guard[];
  readonly note: string;
  readonly body: readonly Stmt[];
}

export interface ElseBranch {
  readonly note: string;
  readonly body: readonly Stmt[];
}

export type Stmt =
  | { readonly kind: 'comment'; readonly text: string; readonly section?: boolean }
  | { readonly kind: 'declare'; readonly registers: readonly RegisterInit[] }
  | { readonly kind: 'loop'; readonly maxIterations: number; readonly body: readonly Stmt[] }
  | { readonly kind: 'if'; readonly branches: readonly Branch[]; readonly otherwise: ElseBranch | null }
  | { readonly kind: 'adjust'; readonly register: bigint; readonly delta: number }
  | { readonly kind: 'clear' }
  | { readonly kind: 'print' };

export interface RegisterModule {
  /** Declared registers, ascending by prime. */
  readonly registers: readonly bigint[];
  readonly body: readonly Stmt[];
}
