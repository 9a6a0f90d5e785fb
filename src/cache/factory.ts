/**
 * Response cache factory
 *
 * Wires store, monitor and cache together. Each call builds a fresh
 * monitor unless one is supplied, so nothing is shared between caches.
 */

import { logger } from '../utils/logger.js';
import { RedisKeyValueStore } from '../store/redis-store.js';
import type { KeyValueStore } from '../store/key-value-store.js';
import { loadConfigFromEnv, validateEnv } from '../config/env-schema.js';
import type { MonitorConfig, TieredCacheConfig } from './cache-config.js';
import { PerformanceMonitor } from './performance-monitor.js';
import { TieredResponseCache } from './tiered-response-cache.js';

export interface ResponseCacheOptions {
  /** Redis URL; ignored when `store` is given */
  redisUrl?: string;
  redisConnectTimeoutMs?: number;
  redisCommandTimeoutMs?: number;
  store?: KeyValueStore | null;
  monitor?: PerformanceMonitor;
  cache?: Partial<TieredCacheConfig>;
  monitorConfig?: Partial<MonitorConfig>;
}

export function createResponseCache(options: ResponseCacheOptions = {}): TieredResponseCache {
  let store: KeyValueStore | null;
  if (options.store !== undefined) {
    store = options.store;
  } else if (options.redisUrl) {
    store = new RedisKeyValueStore({
      url: options.redisUrl,
      connectTimeoutMs: options.redisConnectTimeoutMs,
      commandTimeoutMs: options.redisCommandTimeoutMs,
    });
  } else {
    logger.info('No Redis URL configured, response cache is memory-only');
    store = null;
  }

  const monitor = options.monitor ?? new PerformanceMonitor(options.monitorConfig);
  return new TieredResponseCache(options.cache ?? {}, { store, monitor });
}

/**
 * Build a cache from environment variables (see ENV_SCHEMA). Schema
 * warnings are logged; out-of-range values still fail configuration.
 */
export function createResponseCacheFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Pick<ResponseCacheOptions, 'store' | 'monitor'> = {}
): TieredResponseCache {
  const validation = validateEnv(env);
  for (const warning of validation.warnings) {
    logger.warn(`Environment: ${warning}`);
  }

  const config = loadConfigFromEnv(env);
  return createResponseCache({
    redisUrl: config.redisUrl,
    redisConnectTimeoutMs: config.redisConnectTimeoutMs,
    redisCommandTimeoutMs: config.redisCommandTimeoutMs,
    cache: config.cache,
    monitorConfig: config.monitor,
    ...overrides,
  });
}
