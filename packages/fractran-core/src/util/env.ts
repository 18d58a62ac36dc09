// Centralized, cached environment settings for the runtime.
const DEFAULT_MAX_STEPS = 100;

let _events: boolean | undefined;
let _eventsStdout: boolean | undefined;
let _maxSteps: number | undefined;

function flag(name: string): boolean {
  const v = (process.env[name] || '').toLowerCase();
  return v === '1' || v === 'true';
}

export function eventsEnabled(): boolean {
  if (_events === undefined) {
    _events = flag('FRACTRAN_EVENTS');
  }
  return _events;
}

export function eventsToStdout(): boolean {
  if (_eventsStdout === undefined) {
    _eventsStdout = flag('FRACTRAN_EVENTS_STDOUT');
  }
  return _eventsStdout;
}

// Falls back to the default when the variable is unset or not a positive integer.
export function defaultMaxSteps(): number {
  if (_maxSteps === undefined) {
    const parsed = Number(process.env.FRACTRAN_MAX_STEPS ?? '');
    _maxSteps = Number.isSafeInteger(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_STEPS;
  }
  return _maxSteps;
}

// For tests only: reset the cached settings.
export function __resetEnvCacheForTests__(): void {
  _events = undefined;
  _eventsStdout = undefined;
  _maxSteps = undefined;
}
