import type { StepEvent } from './tags.js';
import { eventsEnabled, eventsToStdout, __resetEnvCacheForTests__ } from '../util/env.js';

const log: StepEvent[] = [];

export function emit(event: StepEvent): void {
  if (!eventsEnabled()) return;
  if (eventsToStdout()) {
    process.stdout.write(JSON.stringify(event) + '\n');
  }
  log.push(event);
}

export function flush(): StepEvent[] {
  const out = log.slice();
  log.length = 0;
  return out;
}

export function resetEventsForTest(): void {
  __resetEnvCacheForTests__();
  log.length = 0;
}
