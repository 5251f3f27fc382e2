import { z } from 'zod';
import type { EnvConfig } from '../types';
import { DEFAULT_FUZZY_THRESHOLD, DEFAULT_ISSUE_PENALTY } from '../matching/constants';

// Unset falls back to the default, set but blank is an error
const unitInterval = (fallback: number) =>
  z
    .string()
    .trim()
    .min(1, 'must not be empty')
    .pipe(z.coerce.number().min(0).max(1))
    .optional()
    .transform((value) => value ?? fallback);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  FUZZY_THRESHOLD: unitInterval(DEFAULT_FUZZY_THRESHOLD),
  ISSUE_PENALTY: unitInterval(DEFAULT_ISSUE_PENALTY),
});

/**
 * Parse environment variables, failing fast on invalid values
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const details = parsed.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return parsed.data;
};

export const env = parseEnv();

export default env;
