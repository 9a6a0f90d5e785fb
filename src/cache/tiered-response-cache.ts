/**
 * Tiered Response Cache
 *
 * Caches AI operation results keyed on (text, operation, options, question):
 * - Tier 1: bounded in-process map with FIFO eviction (see MemoryCacheTier)
 * - Tier 2: external key-value store with size-tiered TTLs and optional
 *   zlib compression
 *
 * Store unavailability never reaches the caller: reads degrade to misses and
 * writes to tier-1 only. Contract violations (empty operation, non-object
 * values, unserializable options) still throw.
 */

import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { logger } from '../utils/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { escapeGlob } from '../utils/glob-matcher.js';
import { CacheDataError, CacheStoreError } from '../errors/index.js';
import type { KeyValueStore } from '../store/key-value-store.js';
import { resolveCacheConfig, type TieredCacheConfig } from './cache-config.js';
import { CacheKeyGenerator, escapeKeySegment, type CacheOptions } from './cache-key-generator.js';
import { MemoryCacheTier } from './memory-tier.js';
import { decodePayload, encodePayload, isCacheEntry, MARKER_DEFLATE, type CacheEntry } from './payload-codec.js';
import {
  PerformanceMonitor,
  type InvalidationFrequencyStats,
  type InvalidationRecommendation,
  type MemoryUsageStats,
  type MemoryWarning,
  type PerformanceStats,
  type StoreMemoryStats,
} from './performance-monitor.js';
import type { MemoryUsageMetric } from './metrics.js';

// ============================================================================
// Types
// ============================================================================

export interface TieredResponseCacheDeps {
  /** Tier-2 store; null runs the cache in memory-only mode */
  store: KeyValueStore | null;
  /** Injected so each cache (or test) can own an isolated monitor */
  monitor?: PerformanceMonitor;
}

export type CacheTier = 'memory' | 'store';

export type MissReason = 'key_not_found' | 'connection_failed' | 'store_error' | 'corrupt_entry';

export type InvalidationStatus = 'success' | 'no_keys_found' | 'connection_failed' | 'store_error';

export interface CacheHitEvent {
  key: string;
  tier: CacheTier;
}

export interface CacheMissEvent {
  key: string;
  reason: MissReason;
}

export interface CacheSetEvent {
  key: string;
  ttl: number;
  compressed: boolean;
  stored: boolean;
}

export interface CacheInvalidateEvent {
  pattern: string;
  count: number;
  type: 'manual' | 'memory';
  status: InvalidationStatus;
}

export interface StoreStatus {
  status: 'connected' | 'unavailable' | 'disabled' | 'error';
  keys?: number;
  memoryUsed?: string;
  memoryUsedBytes?: number;
  connectedClients?: number;
  error?: string;
}

export interface CacheStats {
  store: StoreStatus;
  memory: {
    entries: number;
    limit: number;
    /** "<entries>/<limit>" */
    utilization: string;
  };
  performance: PerformanceStats;
}

export interface PerformanceSummary {
  hitRatio: number;
  totalOperations: number;
  cacheHits: number;
  cacheMisses: number;
  recentAvgKeyGenerationTime: number;
  recentAvgCacheOperationTime: number;
  totalInvalidations: number;
  totalKeysInvalidated: number;
  memoryUsage?: MemoryUsageStats;
}

/** Number of trailing measurements averaged in the performance summary */
const SUMMARY_WINDOW = 10;
/** Diagnostic tier for text longer than every configured TTL tier */
const OVERFLOW_TEXT_TIER = 'xlarge';

function average(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

function toInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

// ============================================================================
// Tiered Response Cache
// ============================================================================

export class TieredResponseCache extends EventEmitter {
  readonly config: TieredCacheConfig;
  readonly monitor: PerformanceMonitor;
  readonly keyGenerator: CacheKeyGenerator;

  private readonly store: KeyValueStore | null;
  private readonly memoryTier: MemoryCacheTier<CacheEntry>;

  constructor(config: Partial<TieredCacheConfig>, deps: TieredResponseCacheDeps) {
    super();
    this.config = resolveCacheConfig(config);
    this.store = deps.store;
    this.monitor = deps.monitor ?? new PerformanceMonitor();
    this.keyGenerator = new CacheKeyGenerator(
      { textHashThreshold: this.config.textHashThreshold, keyPrefix: this.config.keyPrefix },
      this.monitor
    );
    this.memoryTier = new MemoryCacheTier<CacheEntry>(this.config.memoryCacheSize);
  }

  // --------------------------------------------------------------------------
  // Read / write
  // --------------------------------------------------------------------------

  /**
   * Look up a cached result. Tier 1 is checked first and a hit there never
   * touches the store; a tier-2 hit is copied into tier 1.
   */
  async get(
    text: string,
    operation: string,
    options?: CacheOptions | null,
    question?: string | null
  ): Promise<CacheEntry | null> {
    const start = performance.now();
    const key = this.keyGenerator.generateCacheKey(text, operation, options, question);
    const textTier = this.getTextTier(text);

    const memoryEntry = this.memoryTier.get(key);
    if (memoryEntry !== undefined) {
      this.monitor.recordCacheOperationTime('get', performance.now() - start, true, text.length, {
        operationType: operation,
        cacheTier: 'memory',
        textTier,
      });
      logger.debug(`Memory cache hit for ${operation}`, { textTier });
      this.emit('cache:hit', { key, tier: 'memory' } satisfies CacheHitEvent);
      return memoryEntry;
    }

    if (!(await this.connectStore())) {
      return this.recordMiss(key, operation, text.length, start, 'connection_failed', textTier);
    }

    let raw: Buffer | null;
    try {
      raw = await this.requireStore().get(key);
    } catch (error) {
      this.logStoreFailure('get', error, { operation });
      return this.recordMiss(key, operation, text.length, start, 'store_error', textTier);
    }

    if (raw === null) {
      return this.recordMiss(key, operation, text.length, start, 'key_not_found', textTier);
    }

    let entry: CacheEntry;
    try {
      entry = await decodePayload(raw);
    } catch (error) {
      if (!(error instanceof CacheDataError)) throw error;
      logger.error(`Discarding corrupt cache entry for ${operation}`, error, { key });
      return this.recordMiss(key, operation, text.length, start, 'corrupt_entry', textTier);
    }

    this.updateMemoryCache(key, entry);

    this.monitor.recordCacheOperationTime('get', performance.now() - start, true, text.length, {
      operationType: operation,
      cacheTier: 'store',
      textTier,
      compressed: raw[0] === MARKER_DEFLATE,
    });
    logger.debug(`Store cache hit for ${operation}`, { textTier });
    this.emit('cache:hit', { key, tier: 'store' } satisfies CacheHitEvent);
    return entry;
  }

  /**
   * Store a result in both tiers. The value is stamped with `cached_at`;
   * tier 1 is updated even when the store write fails or is skipped.
   *
   * @throws TypeError when `value` is not a plain JSON object
   */
  async set(
    text: string,
    operation: string,
    options: CacheOptions | null | undefined,
    value: CacheEntry,
    question?: string | null
  ): Promise<void> {
    if (!isCacheEntry(value)) {
      throw new TypeError('Cached value must be a JSON object');
    }

    const start = performance.now();
    const key = this.keyGenerator.generateCacheKey(text, operation, options, question);

    const entry: CacheEntry = { ...value, cached_at: new Date().toISOString() };
    const encoded = await encodePayload(entry, {
      compressionThreshold: this.config.compressionThreshold,
      compressionLevel: this.config.compressionLevel,
    });

    if (encoded.compressed) {
      this.monitor.recordCompressionRatio(
        encoded.originalSize,
        encoded.payloadSize,
        encoded.compressionTime,
        operation
      );
    }

    const ttl = this.getTtlForText(text, operation);
    let status: 'success' | 'failed' | 'skipped';
    let reason: MissReason | null = null;

    if (await this.connectStore()) {
      try {
        await this.requireStore().set(key, encoded.envelope, ttl);
        status = 'success';
      } catch (error) {
        this.logStoreFailure('set', error, { operation });
        status = 'failed';
        reason = 'store_error';
      }
    } else {
      status = 'skipped';
      reason = 'connection_failed';
    }

    this.updateMemoryCache(key, entry);

    this.monitor.recordCacheOperationTime('set', performance.now() - start, status === 'success', text.length, {
      operationType: operation,
      status,
      reason,
      ttl,
      compressed: encoded.compressed,
      payloadSize: encoded.envelope.length,
      textTier: this.getTextTier(text),
    });
    logger.debug(`Cached response for ${operation}`, {
      status,
      ttl,
      bytes: encoded.envelope.length,
      compressed: encoded.compressed,
    });
    this.emit('cache:set', {
      key,
      ttl,
      compressed: encoded.compressed,
      stored: status === 'success',
    } satisfies CacheSetEvent);
  }

  // --------------------------------------------------------------------------
  // TTL policy
  // --------------------------------------------------------------------------

  /**
   * TTL (seconds) from the first size tier whose bound covers the text,
   * else `defaultTtl`. A per-operation TTL can only shorten the result.
   */
  getTtlForText(text: string, operation?: string): number {
    const tier = this.config.ttlTiers.find((t) => text.length <= t.maxTextLength);
    const tierTtl = tier ? tier.ttl : this.config.defaultTtl;
    const operationTtl = operation !== undefined ? this.config.operationTtls[operation] : undefined;
    return operationTtl !== undefined ? Math.min(tierTtl, operationTtl) : tierTtl;
  }

  getTextTier(text: string): string {
    const tier = this.config.ttlTiers.find((t) => text.length <= t.maxTextLength);
    return tier ? tier.name : OVERFLOW_TEXT_TIER;
  }

  /**
   * Insert into tier 1 with FIFO eviction and overwrite-touch.
   * A tier-1 size of 0 stores nothing.
   */
  updateMemoryCache(key: string, value: CacheEntry): void {
    const evicted = this.memoryTier.update(key, value);
    if (evicted !== undefined) {
      logger.debug('Evicted oldest memory cache entry', { key: evicted });
    }
  }

  // --------------------------------------------------------------------------
  // Invalidation
  // --------------------------------------------------------------------------

  /**
   * Delete every tier-2 key in this cache's namespace containing `pattern`
   * as a substring. An empty pattern matches all keys. Tier 1 is left as is;
   * use invalidateMemoryCache() for that.
   *
   * @returns number of keys deleted
   */
  async invalidatePattern(pattern: string, operationContext: string = ''): Promise<number> {
    const match = `${escapeGlob(this.config.keyPrefix)}*${escapeGlob(pattern)}*`;
    return this.invalidateMatching(match, pattern, operationContext);
  }

  async invalidateAll(operationContext: string = 'manual_clear_all'): Promise<number> {
    return this.invalidatePattern('', operationContext);
  }

  /**
   * Delete tier-2 keys tagged with `operation`. The match is anchored at the
   * operation segment, so text that merely contains `op:<operation>|` is kept.
   */
  async invalidateByOperation(operation: string, operationContext?: string): Promise<number> {
    const segment = `op:${escapeKeySegment(operation)}|`;
    return this.invalidateMatching(
      `${escapeGlob(this.config.keyPrefix)}${escapeGlob(segment)}*`,
      segment,
      operationContext ?? `operation_specific_${operation}`
    );
  }

  /**
   * Clear tier 1 only. Tier-2 entries stay until their TTL expires.
   *
   * @returns number of entries removed
   */
  invalidateMemoryCache(operationContext: string = 'memory_cache_clear'): number {
    const start = performance.now();
    const removed = this.memoryTier.clear();

    this.monitor.recordInvalidationEvent(
      'memory_cache',
      removed,
      performance.now() - start,
      'memory',
      operationContext,
      { status: 'success', invalidationTarget: 'memory_cache_only' }
    );
    logger.info(`Cleared memory cache (${removed} entries)`, { operationContext });
    this.emit('cache:invalidate', {
      pattern: 'memory_cache',
      count: removed,
      type: 'memory',
      status: 'success',
    } satisfies CacheInvalidateEvent);
    return removed;
  }

  // --------------------------------------------------------------------------
  // Stats
  // --------------------------------------------------------------------------

  async getCacheStats(): Promise<CacheStats> {
    const store = await this.getStoreStatus();

    this.recordMemoryUsage(
      store.memoryUsedBytes !== undefined ? { memoryUsedBytes: store.memoryUsedBytes, keys: store.keys } : undefined
    );

    const entries = this.memoryTier.size;
    const limit = this.memoryTier.limit;
    return {
      store,
      memory: {
        entries,
        limit,
        utilization: `${entries}/${limit}`,
      },
      performance: this.monitor.getPerformanceStats(),
    };
  }

  getCacheHitRatio(): number {
    return this.monitor.calculateHitRate();
  }

  getPerformanceSummary(): PerformanceSummary {
    const stats = this.monitor.getPerformanceStats();
    const invalidation = this.monitor.getInvalidationFrequencyStats();
    const recent = this.monitor.getRecentDurations(SUMMARY_WINDOW);

    const summary: PerformanceSummary = {
      hitRatio: stats.cacheHitRate,
      totalOperations: stats.totalCacheOperations,
      cacheHits: stats.cacheHits,
      cacheMisses: stats.cacheMisses,
      recentAvgKeyGenerationTime: average(recent.keyGeneration),
      recentAvgCacheOperationTime: average(recent.cacheOperations),
      totalInvalidations: invalidation.totalInvalidations,
      totalKeysInvalidated: invalidation.totalKeysInvalidated,
    };
    if (stats.memoryUsage) {
      summary.memoryUsage = stats.memoryUsage;
    }
    return summary;
  }

  recordMemoryUsage(storeStats?: StoreMemoryStats): MemoryUsageMetric {
    return this.monitor.recordMemoryUsage(this.memoryTier.entriesSnapshot(), {
      storeStats,
      memoryCacheSizeLimit: this.memoryTier.limit,
    });
  }

  getMemoryUsageStats(): MemoryUsageStats {
    return this.monitor.getMemoryUsageStats();
  }

  getMemoryWarnings(): MemoryWarning[] {
    return this.monitor.getMemoryWarnings();
  }

  getInvalidationFrequencyStats(): InvalidationFrequencyStats {
    return this.monitor.getInvalidationFrequencyStats();
  }

  getInvalidationRecommendations(): InvalidationRecommendation[] {
    return this.monitor.getInvalidationRecommendations();
  }

  resetPerformanceStats(): void {
    this.monitor.resetStats();
  }

  /** Tier-1 keys, oldest first */
  memoryCacheKeys(): string[] {
    return this.memoryTier.keys();
  }

  get memoryCacheEntryCount(): number {
    return this.memoryTier.size;
  }

  async close(): Promise<void> {
    if (this.store) {
      await this.store.close();
    }
    this.removeAllListeners();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async connectStore(): Promise<boolean> {
    if (!this.store) {
      return false;
    }
    try {
      return await this.store.connect();
    } catch (error) {
      this.logStoreFailure('connect', error);
      return false;
    }
  }

  private requireStore(): KeyValueStore {
    if (!this.store) {
      throw new CacheStoreError('connect', 'No key-value store configured');
    }
    return this.store;
  }

  private async getStoreStatus(): Promise<StoreStatus> {
    const store = this.store;
    if (!store) {
      return { status: 'disabled' };
    }
    if (!(await this.connectStore())) {
      return { status: 'unavailable' };
    }
    try {
      const [keys, info] = await Promise.all([
        store.scanKeys(`${escapeGlob(this.config.keyPrefix)}*`),
        store.info(),
      ]);
      return {
        status: 'connected',
        keys: keys.length,
        memoryUsed: info.used_memory_human ?? 'unknown',
        memoryUsedBytes: toInt(info.used_memory),
        connectedClients: toInt(info.connected_clients),
      };
    } catch (error) {
      this.logStoreFailure('info', error);
      return { status: 'error', error: getErrorMessage(error) };
    }
  }

  /** Scan with a ready-made glob, delete the hits and record the event under `pattern` */
  private async invalidateMatching(match: string, pattern: string, operationContext: string): Promise<number> {
    const start = performance.now();

    if (!(await this.connectStore())) {
      logger.warn(`Cannot invalidate '${pattern}': store unavailable`, { operationContext });
      this.recordInvalidation(pattern, 0, start, operationContext, 'connection_failed');
      return 0;
    }

    try {
      const store = this.requireStore();
      const keys = await store.scanKeys(match);
      if (keys.length === 0) {
        logger.debug(`No cache keys matched '${pattern}'`, { operationContext });
        this.recordInvalidation(pattern, 0, start, operationContext, 'no_keys_found', { searchPattern: match });
        return 0;
      }

      const deleted = await store.delete(...keys);
      logger.info(`Invalidated ${deleted} cache entries matching '${pattern}'`, { operationContext });
      this.recordInvalidation(pattern, deleted, start, operationContext, 'success', {
        searchPattern: match,
        keysFound: keys.length,
      });
      return deleted;
    } catch (error) {
      this.logStoreFailure('invalidate', error, { pattern, operationContext });
      this.recordInvalidation(pattern, 0, start, operationContext, 'store_error', {
        error: getErrorMessage(error),
      });
      return 0;
    }
  }

  private recordMiss(
    key: string,
    operation: string,
    textLength: number,
    start: number,
    reason: MissReason,
    textTier: string
  ): null {
    this.monitor.recordCacheOperationTime('get', performance.now() - start, false, textLength, {
      operationType: operation,
      reason,
      textTier,
    });
    this.emit('cache:miss', { key, reason } satisfies CacheMissEvent);
    return null;
  }

  private recordInvalidation(
    pattern: string,
    keysInvalidated: number,
    start: number,
    operationContext: string,
    status: InvalidationStatus,
    extra: Record<string, string | number> = {}
  ): void {
    this.monitor.recordInvalidationEvent(
      pattern,
      keysInvalidated,
      performance.now() - start,
      'manual',
      operationContext,
      { ...extra, status }
    );
    this.emit('cache:invalidate', {
      pattern,
      count: keysInvalidated,
      type: 'manual',
      status,
    } satisfies CacheInvalidateEvent);
  }

  private logStoreFailure(operation: string, error: unknown, context: Record<string, unknown> = {}): void {
    const failure = new CacheStoreError(operation, `Store ${operation} failed: ${getErrorMessage(error)}`, {
      cause: toError(error),
      context,
    });
    logger.warn(failure.message, { ...context, code: failure.code });
  }
}
