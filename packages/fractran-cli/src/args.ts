import { ConfigurationError } from '@fractran/core';

export interface ParsedFlags {
  values: Partial<Record<string, string>>;
  toggles: Set<string>;
  positionals: string[];
}

export function parseFlagArgs(
  args: readonly string[],
  valueFlags: readonly string[],
  toggleFlags: readonly string[] = [],
): ParsedFlags {
  const valueSet = new Set(valueFlags);
  const toggleSet = new Set(toggleFlags);
  const values: Partial<Record<string, string>> = {};
  const toggles = new Set<string>();
  const positionals: string[] = [];
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (!token.startsWith('-')) {
      positionals.push(token);
      index += 1;
      continue;
    }
    if (toggleSet.has(token)) {
      toggles.add(token);
      index += 1;
      continue;
    }
    if (!token.startsWith('--')) {
      throw new ConfigurationError('E_USAGE', token, 'unknown flag');
    }
    const [flag, inline] = token.split('=', 2);
    if (toggleSet.has(flag)) {
      if (inline !== undefined) {
        throw new ConfigurationError('E_USAGE', flag, 'flag does not take a value');
      }
      toggles.add(flag);
      index += 1;
      continue;
    }
    if (!valueSet.has(flag)) {
      throw new ConfigurationError('E_USAGE', flag, 'unknown flag');
    }
    if (inline !== undefined) {
      values[flag] = inline;
      index += 1;
      continue;
    }
    const next = args[index + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new ConfigurationError('E_USAGE', flag, 'missing value');
    }
    values[flag] = next;
    index += 2;
  }
  return { values, toggles, positionals };
}

const DECIMAL = /^\d+$/;

/** Decimal flag text as a bigint; anything else passes through for the core parsers to reject. */
export function bigIntFlag(text: string): bigint | string {
  return DECIMAL.test(text) ? BigInt(text) : text;
}

export function numberFlag(text: string): number | string {
  return DECIMAL.test(text) ? Number(text) : text;
}
