/**
 * Performance Metric Records
 *
 * Immutable measurement records kept by the PerformanceMonitor.
 * Durations are milliseconds, timestamps are epoch milliseconds.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Free-form diagnostic metadata. Surfaced in exports and logs only;
 * nothing in the cache reads it back.
 */
export type AdditionalData = Readonly<Record<string, string | number | boolean | null>>;

export type CacheOperationType = 'get' | 'set' | 'delete' | 'invalidate';

export type InvalidationType = 'manual' | 'automatic' | 'memory' | 'ttl';

export interface KeyGenerationMetric {
  readonly duration: number;
  readonly textLength: number;
  readonly operationType: string;
  readonly additionalData: AdditionalData;
  readonly timestamp: number;
}

export interface CacheOperationMetric {
  readonly operationType: CacheOperationType;
  readonly duration: number;
  readonly cacheHit: boolean;
  readonly textLength: number;
  readonly additionalData: AdditionalData;
  readonly timestamp: number;
}

export interface CompressionMetric {
  readonly originalSize: number;
  readonly compressedSize: number;
  /** compressedSize / originalSize; lower is better */
  readonly compressionRatio: number;
  readonly compressionTime: number;
  readonly operationType: string;
  readonly timestamp: number;
}

export interface MemoryUsageMetric {
  readonly totalCacheSizeBytes: number;
  readonly cacheEntryCount: number;
  readonly avgEntrySizeBytes: number;
  readonly memoryCacheSizeBytes: number;
  readonly memoryCacheEntryCount: number;
  /** Configured tier-1 bound, when known */
  readonly memoryCacheSizeLimit: number | null;
  readonly processMemoryMb: number;
  /** Total size relative to the warning threshold, in percent */
  readonly cacheUtilizationPercent: number;
  readonly warningThresholdReached: boolean;
  readonly additionalData: AdditionalData;
  readonly timestamp: number;
}

export interface InvalidationMetric {
  readonly pattern: string;
  readonly keysInvalidated: number;
  readonly duration: number;
  readonly invalidationType: InvalidationType;
  readonly operationContext: string;
  readonly additionalData: AdditionalData;
  readonly timestamp: number;
}

export type TimestampedMetric = { readonly timestamp: number };

// ============================================================================
// Factories
// ============================================================================

export function createKeyGenerationMetric(
  fields: Omit<KeyGenerationMetric, 'timestamp'>,
  timestamp: number = Date.now()
): KeyGenerationMetric {
  return Object.freeze({ ...fields, additionalData: Object.freeze({ ...fields.additionalData }), timestamp });
}

export function createCacheOperationMetric(
  fields: Omit<CacheOperationMetric, 'timestamp'>,
  timestamp: number = Date.now()
): CacheOperationMetric {
  return Object.freeze({ ...fields, additionalData: Object.freeze({ ...fields.additionalData }), timestamp });
}

/**
 * Build a compression record. A ratio of 0 (or none) with a positive
 * original size is derived from the sizes; otherwise the given ratio stands.
 */
export function createCompressionMetric(
  fields: Omit<CompressionMetric, 'timestamp' | 'compressionRatio'> & { compressionRatio?: number },
  timestamp: number = Date.now()
): CompressionMetric {
  let compressionRatio = fields.compressionRatio ?? 0;
  if (compressionRatio === 0 && fields.originalSize > 0) {
    compressionRatio = fields.compressedSize / fields.originalSize;
  }
  return Object.freeze({ ...fields, compressionRatio, timestamp });
}

export function createMemoryUsageMetric(
  fields: Omit<MemoryUsageMetric, 'timestamp'>,
  timestamp: number = Date.now()
): MemoryUsageMetric {
  return Object.freeze({ ...fields, additionalData: Object.freeze({ ...fields.additionalData }), timestamp });
}

export function createInvalidationMetric(
  fields: Omit<InvalidationMetric, 'timestamp'>,
  timestamp: number = Date.now()
): InvalidationMetric {
  return Object.freeze({ ...fields, additionalData: Object.freeze({ ...fields.additionalData }), timestamp });
}

// ============================================================================
// Aggregation helpers
// ============================================================================

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function max(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let result = values[0];
  for (const v of values) if (v > result) result = v;
  return result;
}

export function min(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let result = values[0];
  for (const v of values) if (v < result) result = v;
  return result;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
