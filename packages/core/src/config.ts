/**
 * hintpack configuration
 *
 * Call options win over environment switches, which win over defaults.
 */

import { validateAddress } from './address.js';
import { warn } from './logger.js';
import type { ConvertOptions, IdentifierValidator } from './types.js';

export interface ConverterConfig {
  validator: IdentifierValidator;
  strictNumeric: boolean;
  fixedWidthIntegers: boolean;
}

function envFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  const normalized = value.toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized !== '0' && normalized !== 'false') {
    warn(`ignoring unrecognized ${name} value`, { value });
  }
  return false;
}

/**
 * Merge call options with `HINTPACK_STRICT_NUMERIC` / `HINTPACK_FIXED_WIDTH`.
 *
 * @param env - Defaults to `process.env`
 */
export function resolveConfig(
  options: ConvertOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ConverterConfig {
  return {
    validator: options.validator ?? validateAddress,
    strictNumeric: options.strictNumeric ?? envFlag(env, 'HINTPACK_STRICT_NUMERIC') ?? false,
    fixedWidthIntegers: options.fixedWidthIntegers ?? envFlag(env, 'HINTPACK_FIXED_WIDTH') ?? false,
  };
}
