/**
 * Unit tests for TieredResponseCache
 *
 * Tests cover:
 * 1. Round trips through both tiers
 * 2. Key sensitivity to options
 * 3. TTL policy and compression
 * 4. Tier-1 bounds and eviction
 * 5. Degraded operation when the store is down or failing
 * 6. Invalidation
 * 7. Statistics
 */

jest.mock('../../../src/utils/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { logger } from '../../../src/utils/logger';
import {
  TieredResponseCache,
  type CacheHitEvent,
  type CacheInvalidateEvent,
  type CacheMissEvent,
  type CacheSetEvent,
} from '../../../src/cache/tiered-response-cache';
import { PerformanceMonitor } from '../../../src/cache/performance-monitor';
import { MARKER_DEFLATE, MARKER_RAW } from '../../../src/cache/payload-codec';
import { CacheConfigurationError, CacheDataError, CacheKeyError } from '../../../src/errors';
import { FakeKeyValueStore } from '../../helpers/fake-store';

function lastCacheOp(monitor: PerformanceMonitor) {
  const ops = monitor.exportMetrics().cacheOperationTimes;
  return ops[ops.length - 1];
}

describe('TieredResponseCache', () => {
  let store: FakeKeyValueStore;
  let monitor: PerformanceMonitor;
  let cache: TieredResponseCache;
  let misses: CacheMissEvent[];
  let hits: CacheHitEvent[];

  beforeEach(() => {
    jest.clearAllMocks();
    store = new FakeKeyValueStore();
    monitor = new PerformanceMonitor();
    cache = new TieredResponseCache({}, { store, monitor });
    misses = [];
    hits = [];
    cache.on('cache:miss', (e: CacheMissEvent) => misses.push(e));
    cache.on('cache:hit', (e: CacheHitEvent) => hits.push(e));
  });

  afterEach(async () => {
    await cache.close();
  });

  describe('construction', () => {
    it('rejects an invalid configuration', () => {
      expect(() => new TieredResponseCache({ compressionLevel: 10 }, { store: null })).toThrow(
        CacheConfigurationError
      );
    });

    it('creates its own monitor when none is given', () => {
      const own = new TieredResponseCache({}, { store: null });
      expect(own.monitor).toBeInstanceOf(PerformanceMonitor);
      expect(own.monitor).not.toBe(monitor);
    });
  });

  describe('get and set', () => {
    it('returns the stored value stamped with cached_at', async () => {
      await cache.set('hello', 'summarize', { max_length: 50 }, { summary: 'hi' });
      const result = await cache.get('hello', 'summarize', { max_length: 50 });

      expect(result).not.toBeNull();
      expect(result?.summary).toBe('hi');
      const cachedAt = result?.cached_at;
      expect(typeof cachedAt).toBe('string');
      expect(new Date(String(cachedAt)).toISOString()).toBe(cachedAt);
    });

    it('misses with key_not_found for an unknown key', async () => {
      expect(await cache.get('nothing', 'summarize')).toBeNull();
      expect(misses).toEqual([{ key: expect.stringContaining('txt:nothing'), reason: 'key_not_found' }]);
    });

    it('keys entries on their options', async () => {
      await cache.set('some text', 'summarize', { max_length: 50 }, { summary: 'short' });

      expect(await cache.get('some text', 'summarize', { max_length: 51 })).toBeNull();
      expect((await cache.get('some text', 'summarize', { max_length: 50 }))?.summary).toBe('short');
    });

    it('keys entries on the question', async () => {
      await cache.set('doc', 'qa', null, { answer: 'yes' }, 'is it?');

      expect(await cache.get('doc', 'qa')).toBeNull();
      expect(await cache.get('doc', 'qa', null, 'is it not?')).toBeNull();
      expect((await cache.get('doc', 'qa', null, 'is it?'))?.answer).toBe('yes');
    });

    it('serves tier-1 hits without touching the store', async () => {
      await cache.set('hello', 'summarize', null, { summary: 'hi' });
      await cache.get('hello', 'summarize');

      expect(store.calls.get).toBe(0);
      expect(hits).toEqual([{ key: expect.any(String), tier: 'memory' }]);
      expect(lastCacheOp(monitor).additionalData).toEqual({
        operationType: 'summarize',
        cacheTier: 'memory',
        textTier: 'small',
      });
    });

    it('reads through to the store and back-fills tier 1', async () => {
      await cache.set('hello', 'summarize', null, { summary: 'hi' });

      const other = new TieredResponseCache({}, { store, monitor: new PerformanceMonitor() });
      const otherHits: CacheHitEvent[] = [];
      other.on('cache:hit', (e: CacheHitEvent) => otherHits.push(e));

      expect((await other.get('hello', 'summarize'))?.summary).toBe('hi');
      expect((await other.get('hello', 'summarize'))?.summary).toBe('hi');
      expect(store.calls.get).toBe(1);
      expect(otherHits.map((e) => e.tier)).toEqual(['store', 'memory']);
      expect(other.memoryCacheEntryCount).toBe(1);
    });

    it('rejects a value that is not an object', async () => {
      await expect(cache.set('t', 'op', null, null as any)).rejects.toThrow('Cached value must be a JSON object');
      await expect(cache.set('t', 'op', null, ['a'] as any)).rejects.toThrow(TypeError);
    });

    it('records no key-generation time for a rejected value', async () => {
      await expect(cache.set('t', 'op', null, 'plain' as any)).rejects.toThrow(TypeError);
      expect(monitor.exportMetrics().keyGenerationTimes).toHaveLength(0);
      expect(store.calls.set).toBe(0);
      expect(store.calls.set).toBe(0);
    });

    it('rejects an empty operation', async () => {
      await expect(cache.get('t', '')).rejects.toThrow(CacheKeyError);
    });

    it('emits a set event', async () => {
      const sets: CacheSetEvent[] = [];
      cache.on('cache:set', (e: CacheSetEvent) => sets.push(e));
      await cache.set('hello', 'summarize', null, { summary: 'hi' });

      expect(sets).toEqual([{ key: expect.any(String), ttl: 7200, compressed: false, stored: true }]);
    });
  });

  describe('TTL policy', () => {
    it('picks the TTL from the text size tier', () => {
      expect(cache.getTtlForText('a'.repeat(500))).toBe(7200);
      expect(cache.getTtlForText('a'.repeat(501))).toBe(3600);
      expect(cache.getTtlForText('a'.repeat(5000))).toBe(3600);
      expect(cache.getTtlForText('a'.repeat(5001))).toBe(1800);
      expect(cache.getTtlForText('a'.repeat(50001))).toBe(900);
    });

    it('names the text tier', () => {
      expect(cache.getTextTier('')).toBe('small');
      expect(cache.getTextTier('a'.repeat(600))).toBe('medium');
      expect(cache.getTextTier('a'.repeat(50001))).toBe('xlarge');
    });

    it('lets an operation TTL shorten but never lengthen the tier TTL', () => {
      const custom = new TieredResponseCache(
        { operationTtls: { translate: 60, classify: 100000 } },
        { store: null }
      );
      expect(custom.getTtlForText('short', 'translate')).toBe(60);
      expect(custom.getTtlForText('short', 'classify')).toBe(7200);
      expect(custom.getTtlForText('short', 'summarize')).toBe(7200);
    });

    it('sorts configured tiers by bound', () => {
      const custom = new TieredResponseCache(
        {
          ttlTiers: [
            { name: 'big', maxTextLength: 100, ttl: 10 },
            { name: 'tiny', maxTextLength: 10, ttl: 99 },
          ],
          defaultTtl: 5,
        },
        { store: null }
      );
      expect(custom.getTtlForText('a'.repeat(10))).toBe(99);
      expect(custom.getTtlForText('a'.repeat(11))).toBe(10);
      expect(custom.getTtlForText('a'.repeat(101))).toBe(5);
    });

    it('writes entries with the computed TTL', async () => {
      await cache.set('a'.repeat(600), 'summarize', null, { summary: 'x' });
      expect([...store.ttls.values()]).toEqual([3600]);
    });
  });

  describe('compression', () => {
    it('stores small payloads raw', async () => {
      await cache.set('hello', 'summarize', null, { summary: 'hi' });
      const [envelope] = [...store.data.values()];
      expect(envelope[0]).toBe(MARKER_RAW);
      expect(monitor.getPerformanceStats().compression).toBeUndefined();
    });

    it('compresses large payloads and records the ratio', async () => {
      const summary = 'lorem ipsum '.repeat(200);
      await cache.set('hello', 'summarize', null, { summary });

      const [envelope] = [...store.data.values()];
      expect(envelope[0]).toBe(MARKER_DEFLATE);
      expect(monitor.getPerformanceStats().compression?.totalOperations).toBe(1);

      const other = new TieredResponseCache({}, { store, monitor: new PerformanceMonitor() });
      expect((await other.get('hello', 'summarize'))?.summary).toBe(summary);
    });
  });

  describe('memory tier', () => {
    it('evicts the oldest entry past its bound', async () => {
      const small = new TieredResponseCache({ memoryCacheSize: 2 }, { store });
      await small.set('a', 'op', null, { v: 1 });
      await small.set('b', 'op', null, { v: 2 });
      await small.set('c', 'op', null, { v: 3 });

      expect(small.memoryCacheKeys().map((k) => k.split('|')[1])).toEqual(['txt:b', 'txt:c']);
    });

    it('stores nothing in tier 1 with a size of 0', async () => {
      const none = new TieredResponseCache({ memoryCacheSize: 0 }, { store });
      await none.set('hello', 'summarize', null, { summary: 'hi' });

      expect(none.memoryCacheEntryCount).toBe(0);
      expect((await none.get('hello', 'summarize'))?.summary).toBe('hi');
      expect(store.calls.get).toBe(1);
    });

    it('rejects a non-string key', () => {
      expect(() => cache.updateMemoryCache(null as any, {})).toThrow(TypeError);
    });
  });

  describe('degraded operation', () => {
    it('keeps working in tier 1 when the store is unreachable', async () => {
      store.connected = false;
      const sets: CacheSetEvent[] = [];
      cache.on('cache:set', (e: CacheSetEvent) => sets.push(e));

      await cache.set('hello', 'summarize', null, { summary: 'hi' });
      expect(store.calls.set).toBe(0);
      expect(sets[0].stored).toBe(false);
      expect(lastCacheOp(monitor).additionalData).toMatchObject({ status: 'skipped', reason: 'connection_failed' });

      expect((await cache.get('hello', 'summarize'))?.summary).toBe('hi');
    });

    it('misses with connection_failed when the store is unreachable', async () => {
      store.connected = false;
      expect(await cache.get('hello', 'summarize')).toBeNull();
      expect(misses[0].reason).toBe('connection_failed');
    });

    it('treats a rejected connect as unreachable', async () => {
      jest.spyOn(store, 'connect').mockRejectedValue(new Error('refused'));
      expect(await cache.get('hello', 'summarize')).toBeNull();
      expect(misses[0].reason).toBe('connection_failed');
      expect(logger.warn).toHaveBeenCalledWith('Store connect failed: refused', { code: 'CACHE_STORE_ERROR' });
    });

    it('runs memory-only without a store', async () => {
      const memoryOnly = new TieredResponseCache({}, { store: null });
      await memoryOnly.set('hello', 'summarize', null, { summary: 'hi' });
      expect((await memoryOnly.get('hello', 'summarize'))?.summary).toBe('hi');
      expect(await memoryOnly.get('other', 'summarize')).toBeNull();
      expect(await memoryOnly.invalidateAll()).toBe(0);
    });

    it('misses with store_error when a read fails', async () => {
      store.failWith = new Error('boom');
      expect(await cache.get('hello', 'summarize')).toBeNull();
      expect(misses[0].reason).toBe('store_error');
      expect(logger.warn).toHaveBeenCalledWith('Store get failed: boom', {
        operation: 'summarize',
        code: 'CACHE_STORE_ERROR',
      });
    });

    it('still fills tier 1 when a write fails', async () => {
      store.failWith = new Error('boom');
      await cache.set('hello', 'summarize', null, { summary: 'hi' });

      expect(cache.memoryCacheEntryCount).toBe(1);
      expect(lastCacheOp(monitor).cacheHit).toBe(false);
      expect(lastCacheOp(monitor).additionalData).toMatchObject({ status: 'failed', reason: 'store_error' });
    });

    it('discards a corrupt entry as a miss', async () => {
      const key = cache.keyGenerator.generateCacheKey('hello', 'summarize');
      store.data.set(key, Buffer.from([MARKER_DEFLATE, 1, 2, 3]));

      expect(await cache.get('hello', 'summarize')).toBeNull();
      expect(misses).toEqual([{ key, reason: 'corrupt_entry' }]);
      expect(logger.error).toHaveBeenCalledWith(
        'Discarding corrupt cache entry for summarize',
        expect.any(CacheDataError),
        { key }
      );
      expect(cache.memoryCacheEntryCount).toBe(0);
    });
  });

  describe('invalidation', () => {
    let invalidations: CacheInvalidateEvent[];

    beforeEach(() => {
      invalidations = [];
      cache.on('cache:invalidate', (e: CacheInvalidateEvent) => invalidations.push(e));
    });

    it('clears every key in the namespace and leaves tier 1 alone', async () => {
      await cache.set('one', 'summarize', null, { v: 1 });
      await cache.set('two', 'translate', null, { v: 2 });
      store.data.set('other:key', Buffer.from([MARKER_RAW]));

      expect(await cache.invalidateAll()).toBe(2);
      expect([...store.data.keys()]).toEqual(['other:key']);
      expect(cache.memoryCacheEntryCount).toBe(2);
      expect(invalidations).toEqual([{ pattern: '', count: 2, type: 'manual', status: 'success' }]);

      const [event] = monitor.exportMetrics().invalidationEvents;
      expect(event.operationContext).toBe('manual_clear_all');
      expect(event.additionalData).toEqual({ searchPattern: 'ai_cache:**', keysFound: 2, status: 'success' });
    });

    it('clears only the named operation', async () => {
      await cache.set('one', 'summarize', null, { v: 1 });
      await cache.set('two', 'translate', null, { v: 2 });

      expect(await cache.invalidateByOperation('sum')).toBe(0);
      expect(await cache.invalidateByOperation('summarize')).toBe(1);
      expect([...store.data.keys()]).toEqual([cache.keyGenerator.generateCacheKey('two', 'translate')]);

      const events = monitor.exportMetrics().invalidationEvents;
      expect(events.map((e) => e.pattern)).toEqual(['op:sum|', 'op:summarize|']);
      expect(events[1].operationContext).toBe('operation_specific_summarize');
      expect(invalidations.map((e) => e.status)).toEqual(['no_keys_found', 'success']);
      expect(events[1].additionalData).toEqual({
        searchPattern: 'ai_cache:op:summarize|*',
        keysFound: 1,
        status: 'success',
      });
    });

    it('keeps other operations whose text contains the operation tag', async () => {
      await cache.set('please run op:summarize', 'sentiment', null, { label: 'neutral' });
      await cache.set('hello', 'summarize', null, { summary: 'hi' });
      const kept = cache.keyGenerator.generateCacheKey('please run op:summarize', 'sentiment');

      expect(await cache.invalidateByOperation('summarize')).toBe(1);
      expect([...store.data.keys()]).toEqual([kept]);
    });

    it('escapes glob characters in the key prefix', async () => {
      const prefixed = new TieredResponseCache({ keyPrefix: 'a*:' }, { store, monitor });
      await prefixed.set('one', 'summarize', null, { v: 1 });
      store.data.set('ab:op:summarize|txt:x|opts:0', Buffer.from([MARKER_RAW]));

      expect(await prefixed.invalidateAll()).toBe(1);
      expect([...store.data.keys()]).toEqual(['ab:op:summarize|txt:x|opts:0']);
      await prefixed.close();
    });

    it('treats glob characters in the pattern literally', async () => {
      await cache.set('one', 'summarize', null, { v: 1 });
      expect(await cache.invalidatePattern('*')).toBe(0);
      expect(store.data.size).toBe(1);
    });

    it('reports connection_failed when the store is down', async () => {
      store.connected = false;
      expect(await cache.invalidatePattern('x', 'test')).toBe(0);
      expect(invalidations).toEqual([{ pattern: 'x', count: 0, type: 'manual', status: 'connection_failed' }]);
    });

    it('reports store_error when the scan fails', async () => {
      store.failWith = new Error('scan failed');
      expect(await cache.invalidatePattern('x')).toBe(0);
      expect(invalidations[0].status).toBe('store_error');
      expect(monitor.exportMetrics().invalidationEvents[0].additionalData).toEqual({
        error: 'scan failed',
        status: 'store_error',
      });
    });

    it('clears tier 1 on request', async () => {
      await cache.set('one', 'summarize', null, { v: 1 });
      await cache.set('two', 'summarize', null, { v: 2 });

      expect(cache.invalidateMemoryCache()).toBe(2);
      expect(cache.memoryCacheEntryCount).toBe(0);
      expect(store.data.size).toBe(2);

      const [event] = monitor.exportMetrics().invalidationEvents;
      expect(event).toMatchObject({
        pattern: 'memory_cache',
        keysInvalidated: 2,
        invalidationType: 'memory',
        operationContext: 'memory_cache_clear',
        additionalData: { status: 'success', invalidationTarget: 'memory_cache_only' },
      });
    });
  });

  describe('statistics', () => {
    it('reports store, tier-1 and performance figures', async () => {
      await cache.set('one', 'summarize', null, { v: 1 });
      const stats = await cache.getCacheStats();

      expect(stats.store).toEqual({
        status: 'connected',
        keys: 1,
        memoryUsed: '2.00K',
        memoryUsedBytes: 2048,
        connectedClients: 3,
      });
      expect(stats.memory).toEqual({ entries: 1, limit: 100, utilization: '1/100' });
      expect(stats.performance.totalCacheOperations).toBe(1);
      expect(monitor.exportMetrics().memoryUsageMeasurements).toHaveLength(1);
    });

    it('counts only keys under a prefix that contains glob characters', async () => {
      const prefixed = new TieredResponseCache({ keyPrefix: 'a*:' }, { store, monitor });
      store.data.set('a*:x', Buffer.from([MARKER_RAW]));
      store.data.set('ab:x', Buffer.from([MARKER_RAW]));

      expect((await prefixed.getCacheStats()).store).toMatchObject({ status: 'connected', keys: 1 });
      await prefixed.close();
    });

    it('reports the store as disabled, unavailable or in error', async () => {
      expect((await new TieredResponseCache({}, { store: null }).getCacheStats()).store).toEqual({
        status: 'disabled',
      });

      store.connected = false;
      expect((await cache.getCacheStats()).store).toEqual({ status: 'unavailable' });

      store.connected = true;
      store.failWith = new Error('info failed');
      expect((await cache.getCacheStats()).store).toEqual({ status: 'error', error: 'info failed' });
    });

    it('tracks the hit ratio across gets and sets', async () => {
      await cache.set('one', 'summarize', null, { v: 1 });
      await cache.get('one', 'summarize');
      await cache.get('two', 'summarize');
      await cache.get('one', 'summarize');

      expect(cache.getCacheHitRatio()).toBe(50);
      const summary = cache.getPerformanceSummary();
      expect(summary).toMatchObject({
        hitRatio: 50,
        totalOperations: 4,
        cacheHits: 2,
        cacheMisses: 1,
        totalInvalidations: 0,
        totalKeysInvalidated: 0,
      });
    });

    it('resets performance statistics', async () => {
      await cache.set('one', 'summarize', null, { v: 1 });
      cache.resetPerformanceStats();
      expect(cache.getPerformanceSummary().totalOperations).toBe(0);
    });
  });

  it('closes its store', async () => {
    await cache.close();
    expect(store.calls.close).toBe(1);
  });
});
