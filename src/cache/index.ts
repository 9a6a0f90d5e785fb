/**
 * Cache Module
 *
 * Tiered AI response cache with its key generator and performance monitor.
 */

export {
  TieredResponseCache,
  type TieredResponseCacheDeps,
  type CacheTier,
  type MissReason,
  type InvalidationStatus,
  type CacheHitEvent,
  type CacheMissEvent,
  type CacheSetEvent,
  type CacheInvalidateEvent,
  type StoreStatus,
  type CacheStats,
  type PerformanceSummary,
} from './tiered-response-cache.js';

export {
  CacheKeyGenerator,
  escapeKeySegment,
  type CacheOptions,
  type CacheKeyGeneratorConfig,
  type TextTier,
} from './cache-key-generator.js';

export { MemoryCacheTier } from './memory-tier.js';

export {
  encodePayload,
  decodePayload,
  isCacheEntry,
  MARKER_RAW,
  MARKER_DEFLATE,
  type CacheEntry,
  type CodecOptions,
  type EncodedPayload,
} from './payload-codec.js';

export * from './performance-monitor.js';
export * from './metrics.js';
export * from './cache-config.js';
export * from './factory.js';
