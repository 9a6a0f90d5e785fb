/**
 * AI Response Cache
 *
 * Public entry point.
 */

export * from './cache/index.js';
export * from './errors/index.js';
export type { KeyValueStore } from './store/key-value-store.js';
export { RedisKeyValueStore, parseRedisInfo, type RedisStoreConfig } from './store/redis-store.js';
export {
  ENV_SCHEMA,
  getEnvDef,
  validateEnv,
  maskValue,
  loadConfigFromEnv,
  type EnvVarDef,
  type EnvConfig,
  type ValidationResult,
} from './config/env-schema.js';
export { logger, createLogger, getLogger, type Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { createCacheApp, createCacheRouter, createCacheHandlers, ApiServerError } from './server/index.js';
