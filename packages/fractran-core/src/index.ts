export * from './model/index.js';
export * from './factor/index.js';
export * from './vm/index.js';
export * as events from './events/index.js';
export { ConfigurationError, isConfigurationError } from './errors.js';
export type { ConfigurationErrorCode } from './errors.js';
export { defaultMaxSteps } from './util/env.js';
