/**
 * Environment variable validation using Zod.
 *
 * Every variable is optional; the resource layer works without any
 * environment at all. Invalid values fail fast with every issue listed.
 */

import { z } from 'zod';
import { logger } from './logger.js';

/**
 * Environment variable schema.
 *
 * Optional (with defaults):
 * - RESOURCE_API_URL: API root used by resources that do not declare one
 * - RESOURCE_DATA_TYPE: content type requested and decoded (default: application/json)
 * - LOG_LEVEL: minimum log level (default: info)
 * - NODE_ENV: environment mode (default: development)
 */
const envSchema = z.object({
  RESOURCE_API_URL: z
    .string()
    .url('RESOURCE_API_URL must be an absolute URL')
    .optional(),

  RESOURCE_DATA_TYPE: z
    .string()
    .min(1, 'RESOURCE_DATA_TYPE cannot be empty')
    .default('application/json'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates environment variables and returns typed config.
 *
 * @throws Error listing every invalid variable
 */
export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');

    logger.error('Environment validation failed', {
      errors: result.error.errors.map((e) => ({
        path: e.path,
        message: e.message,
      })),
    });

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  logger.debug('Environment validated', {
    apiUrl: result.data.RESOURCE_API_URL,
    dataType: result.data.RESOURCE_DATA_TYPE,
  });

  return result.data;
}

let _env: Env | null = null;

/**
 * Gets the validated environment configuration, validating on first use.
 */
export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}

/**
 * Drops the memoized configuration so the next getEnv() re-reads process.env.
 */
export function resetEnv(): void {
  _env = null;
}
