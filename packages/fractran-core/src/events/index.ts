export * from './tags.js';
export { emit, flush, resetEventsForTest } from './log.js';
