import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { FractranEngine } from '../src/vm/index.js';
import { ConfigurationError } from '../src/errors.js';
import { loadFractions, PRIMEGAME_SEQUENCE } from './helpers/programs.js';

const quiet = () => undefined;

describe('FractranEngine', () => {
  it('reproduces the PRIMEGAME sequence from 2', () => {
    const engine = new FractranEngine(loadFractions('primegame.json'), { sink: quiet });
    const result = engine.run({ maxSteps: 25 });
    expect(engine.states).toEqual([...PRIMEGAME_SEQUENCE, 0n]);
    expect(result).toEqual({ state: 28875n, halt: 'capped', steps: 24 });
    expect(engine.transitions.slice(0, 9)).toEqual([11, 13, 4, 5, 10, 0, 1, 9, 4]);
  });

  it('halts naturally when no fraction applies', () => {
    const engine = new FractranEngine([[1, 2]], { start: 8 });
    const result = engine.run();
    expect(engine.states).toEqual([8n, 4n, 2n, 1n, 0n]);
    expect(result).toEqual({ state: 1n, halt: 'halted', steps: 3 });
    expect(engine.haltReason).toBe('halted');
  });

  it('uses a denominator-1 fraction as the fallback, so only the cap halts', () => {
    const engine = new FractranEngine([[3, 2], [1, 1]], { start: 2 });
    const result = engine.run({ maxSteps: 6 });
    expect(engine.states).toEqual([2n, 3n, 3n, 3n, 3n, 3n, 0n]);
    expect(engine.transitions).toEqual([0, 1, 1, 1, 1]);
    expect(result.halt).toBe('capped');
  });

  it('caps when the trace would exceed the budget', () => {
    const engine = new FractranEngine([[1, 2]], { start: 8 });
    engine.run({ maxSteps: 3 });
    expect(engine.states).toEqual([8n, 4n, 2n, 0n]);
    expect(engine.trace[3]).toEqual({ state: 0n, halt: 'capped' });
  });

  it('never holds more live states than the budget', () => {
    const engine = new FractranEngine([[1, 1]], { start: 5 });
    const result = engine.run({ maxSteps: 1 });
    expect(engine.states).toEqual([5n, 0n]);
    expect(result).toEqual({ state: 5n, halt: 'capped', steps: 0 });
  });

  it('caps a resumed run that is already past the budget', () => {
    const engine = new FractranEngine([[1, 1]], { start: 5 });
    engine.step();
    engine.step();
    const result = engine.run({ maxSteps: 2 });
    expect(engine.states).toEqual([5n, 5n, 5n, 0n]);
    expect(result).toEqual({ state: 5n, halt: 'capped', steps: 0 });
  });

  it('defaults the start value to 2', () => {
    const engine = new FractranEngine([[3, 2]]);
    expect(engine.current).toBe(2n);
  });

  it('keeps a halt absorbing across further runs', () => {
    const engine = new FractranEngine([[1, 2]], { start: 2 });
    engine.run();
    const again = engine.run();
    expect(engine.states).toEqual([2n, 1n, 0n]);
    expect(again).toEqual({ state: 1n, halt: 'halted', steps: 0 });
    const entry = engine.step();
    expect(entry).toEqual({ state: 0n, halt: 'halted' });
    expect(engine.states).toEqual([2n, 1n, 0n, 0n]);
  });

  it('resets the trace when run is given a start value', () => {
    const engine = new FractranEngine([[1, 3]], { start: 9 });
    engine.run();
    engine.run({ start: 27 });
    expect(engine.states).toEqual([27n, 9n, 3n, 1n, 0n]);
  });

  it('zero numerators drive the state to 0 through a transition', () => {
    const engine = new FractranEngine([[0, 5], [1, 2]], { start: 10 });
    engine.run();
    expect(engine.trace).toEqual([{ state: 10n }, { state: 0n, fraction: 0 }]);
    expect(engine.haltReason).toBeUndefined();
  });

  it('accepts fractions that are not in lowest terms', () => {
    const engine = new FractranEngine([[2, 4]], { start: 8 });
    engine.run();
    expect(engine.program[0]).toEqual({ numerator: 2n, denominator: 4n });
    expect(engine.states).toEqual([8n, 4n, 2n, 1n, 0n]);
  });

  it('works past the safe integer range', () => {
    const engine = new FractranEngine([[3n ** 40n, 2n]], { start: 2n ** 60n });
    engine.run({ maxSteps: 1000 });
    expect(engine.states.at(-2)).toBe(3n ** 2400n);
  });

  it('writes diagnostics to the sink by verbosity', () => {
    const lines: string[] = [];
    const engine = new FractranEngine([[1, 2]], { start: 8, sink: (line) => lines.push(line) });
    engine.run({ verbosity: 2 });
    expect(lines).toEqual([
      'trying 1/2 * 8',
      'Success! N_1 = 1/2*8 = 4 = 2^2',
      'trying 1/2 * 4',
      'Success! N_2 = 1/2*4 = 2 = 2^1',
      'trying 1/2 * 2',
      'Success! N_3 = 1/2*2 = 1 = 1',
      'trying 1/2 * 1',
      'Halt: no fraction applies to N_3 = 1',
    ]);

    lines.length = 0;
    engine.run({ start: 4, verbosity: 1, maxSteps: 2 });
    expect(lines).toEqual([
      'Success! N_1 = 1/2*4 = 2 = 2^1',
      'Capped: step budget of 2 exhausted',
    ]);

    lines.length = 0;
    engine.run({ start: 4 });
    expect(lines).toEqual([]);
  });

  describe('construction', () => {
    it('rejects a non-integer start value', () => {
      expect(() => new FractranEngine([[1, 2]], { start: 2.5 })).toThrow(ConfigurationError);
      expect(() => new FractranEngine([[1, 2]], { start: 2.5 })).toThrow(/^E_START \/start/);
    });

    it('rejects non-positive start values', () => {
      expect(() => new FractranEngine([[1, 2]], { start: 0 })).toThrow(/E_START/);
    });

    it('rejects non-integer fraction elements', () => {
      expect(() => new FractranEngine([[1, 2], [1.5, 2]])).toThrow(/^E_NUMERATOR \/1\/0/);
      expect(() => new FractranEngine([[1, 2.25]])).toThrow(/^E_DENOMINATOR \/0\/1/);
    });

    it('rejects zero or negative denominators and negative numerators', () => {
      expect(() => new FractranEngine([[1, 0]])).toThrow(/E_DENOMINATOR/);
      expect(() => new FractranEngine([[-1, 3]])).toThrow(/E_NUMERATOR/);
    });

    it('rejects bad step budgets without touching the trace', () => {
      expect(() => new FractranEngine([[1, 2]], { maxSteps: 0 })).toThrow(/E_MAX_STEPS/);
      const engine = new FractranEngine([[1, 2]]);
      expect(() => engine.run({ maxSteps: 1.5 })).toThrow(/E_MAX_STEPS/);
      expect(engine.states).toEqual([2n]);
    });
  });

  it('law: each step appends exactly the first applicable product or 0', () => {
    const fractionArb = fc.tuple(fc.integer({ min: 0, max: 30 }), fc.integer({ min: 1, max: 30 }));
    fc.assert(
      fc.property(
        fc.array(fractionArb, { minLength: 1, maxLength: 6 }),
        fc.integer({ min: 1, max: 1_000_000 }),
        (fractions, start) => {
          const engine = new FractranEngine(fractions, { start, sink: quiet });
          const before = engine.trace.length;
          const s = BigInt(start);
          const match = fractions.findIndex(([n, d]) => (BigInt(n) * s) % BigInt(d) === 0n);
          const entry = engine.step();
          expect(engine.trace.length).toBe(before + 1);
          if (match < 0) {
            expect(entry).toEqual({ state: 0n, halt: 'halted' });
          } else {
            const [n, d] = fractions[match];
            expect(entry).toEqual({ state: (BigInt(n) * s) / BigInt(d), fraction: match });
          }
        },
      ),
    );
  });
});
