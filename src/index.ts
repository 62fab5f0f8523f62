export * from './services/resource/index.js';
export {
  ResourceError,
  ResourceHttpError,
  ServerUnreachableError,
  InvalidCallError,
  InvalidConfigError,
  isRetryableHttpStatus,
} from './lib/errors.js';
export { createLogger, logger } from './lib/logger.js';
export type { Logger, LogLevel, LogData } from './lib/logger.js';
export { getEnv, validateEnv, resetEnv } from './lib/env.js';
export type { Env } from './lib/env.js';
