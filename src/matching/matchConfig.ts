/**
 * Match configuration resolution.
 *
 * The two tunables are validated before any record is matched; an
 * out-of-range value is a configuration error for the caller.
 */

import { z, ZodError } from 'zod';
import { AppError } from '../utils/AppError';
import { DEFAULT_FUZZY_THRESHOLD, DEFAULT_ISSUE_PENALTY } from './constants';
import type { MatchConfig, MatchOptions } from './types';

const unitInterval = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .finite(`${name} must be a finite number`)
    .min(0, `${name} must be between 0 and 1`)
    .max(1, `${name} must be between 0 and 1`);

export const matchConfigSchema = z.object({
  fuzzyThreshold: unitInterval('fuzzyThreshold').default(DEFAULT_FUZZY_THRESHOLD),
  issuePenalty: unitInterval('issuePenalty').default(DEFAULT_ISSUE_PENALTY),
});

/**
 * Fills in defaults and checks both values lie in [0, 1].
 *
 * @throws AppError (INVALID_CONFIG) when a value is out of range
 *
 * @example
 * resolveMatchConfig({ fuzzyThreshold: 0.9 }) // { fuzzyThreshold: 0.9, issuePenalty: 0.05 }
 * resolveMatchConfig({ fuzzyThreshold: 1.5 }) // throws
 */
export function resolveMatchConfig(options: MatchOptions = {}): MatchConfig {
  try {
    return matchConfigSchema.parse(options);
  } catch (error) {
    if (error instanceof ZodError) {
      const messages = error.errors.map((err) => err.message).join('; ');
      throw AppError.invalidConfig(`Invalid match configuration: ${messages}`);
    }
    throw error;
  }
}

export default resolveMatchConfig;
