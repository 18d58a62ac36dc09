export type ConfigurationErrorCode =
  | 'E_START'
  | 'E_FRACTION_SHAPE'
  | 'E_NUMERATOR'
  | 'E_DENOMINATOR'
  | 'E_MAX_STEPS'
  | 'E_VERBOSITY'
  | 'E_FACTOR_INPUT'
  | 'E_PROGRAM_FILE'
  | 'E_USAGE';

/**
 * Caller-input failure raised at a construction boundary. Never retried.
 * The message is `<code> <path>: <reason>` so it stays greppable in CLI output.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  readonly path: string;

  constructor(code: ConfigurationErrorCode, path: string, reason: string) {
    super(`${code} ${path}: ${reason}`);
    this.name = 'ConfigurationError';
    this.code = code;
    this.path = path;
  }
}

export function isConfigurationError(value: unknown): value is ConfigurationError {
  return value instanceof ConfigurationError;
}
