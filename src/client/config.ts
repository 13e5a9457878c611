/**
 * Client configuration from environment variables
 *
 * - `ACLED_API_KEY` (required)
 * - `ACLED_EMAIL` (required)
 * - `ACLED_BASE_URL` (optional)
 * - `ACLED_PAGE_SIZE` (optional, positive integer)
 */

import { z } from 'zod';
import type { ClientConfig } from './types.js';
import { ConfigurationError } from './errors.js';

// An empty variable counts as unset
const emptyAsUnset = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  ACLED_API_KEY: z.string().min(1),
  ACLED_EMAIL: z.string().min(1),
  ACLED_BASE_URL: z.preprocess(emptyAsUnset, z.string().url().optional()),
  ACLED_PAGE_SIZE: z.preprocess(
    emptyAsUnset,
    z
      .string()
      .regex(/^\d+$/)
      .pipe(z.coerce.number().int().positive())
      .optional()
  ),
});

/**
 * Build a client configuration from the environment
 *
 * @throws ConfigurationError naming every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const variables = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigurationError(`Invalid or missing environment variables: ${variables.join(', ')}`);
  }

  const { ACLED_API_KEY, ACLED_EMAIL, ACLED_BASE_URL, ACLED_PAGE_SIZE } = result.data;
  return {
    key: ACLED_API_KEY,
    email: ACLED_EMAIL,
    baseUrl: ACLED_BASE_URL,
    pageSize: ACLED_PAGE_SIZE,
  };
}
