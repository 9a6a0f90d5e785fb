/**
 * Performance Monitor
 *
 * Accumulates timing and size measurements for the response cache:
 * key generation, cache operations, compression, memory snapshots and
 * invalidation events. Every list is pruned by age and by count on append
 * and again before any aggregate is computed.
 *
 * All mutation happens in synchronous methods, so on Node's single-threaded
 * event loop each append-and-prune step and each counter update runs to
 * completion before another request can observe the monitor.
 */

import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { resolveMonitorConfig, type MonitorConfig } from './cache-config.js';
import {
  createCacheOperationMetric,
  createCompressionMetric,
  createInvalidationMetric,
  createKeyGenerationMetric,
  createMemoryUsageMetric,
  max,
  mean,
  median,
  min,
  sum,
  type AdditionalData,
  type CacheOperationMetric,
  type CacheOperationType,
  type CompressionMetric,
  type InvalidationMetric,
  type InvalidationType,
  type KeyGenerationMetric,
  type MemoryUsageMetric,
  type TimestampedMetric,
} from './metrics.js';

// ============================================================================
// Types
// ============================================================================

export interface DurationSummary {
  totalOperations: number;
  avgDuration: number;
  medianDuration: number;
  maxDuration: number;
  minDuration: number;
  /** Measurements above the configured per-kind threshold */
  slowOperations: number;
}

export interface KeyGenerationStats extends DurationSummary {
  avgTextLength: number;
  maxTextLength: number;
}

export interface OperationTypeStats {
  count: number;
  avgDuration: number;
  maxDuration: number;
}

export interface CacheOperationStats extends DurationSummary {
  byOperationType: Record<string, OperationTypeStats>;
}

export interface CompressionStats {
  totalOperations: number;
  avgCompressionRatio: number;
  medianCompressionRatio: number;
  /** Lowest ratio seen (smallest output relative to input) */
  bestCompressionRatio: number;
  worstCompressionRatio: number;
  avgCompressionTime: number;
  maxCompressionTime: number;
  totalBytesProcessed: number;
  totalBytesSaved: number;
  overallSavingsPercent: number;
}

export interface EmptyMemoryUsageStats {
  noMeasurements: true;
  warningThresholdMb: number;
  criticalThresholdMb: number;
}

export interface ActiveMemoryUsageStats {
  noMeasurements: false;
  current: {
    totalCacheSizeMb: number;
    memoryCacheSizeMb: number;
    cacheEntryCount: number;
    memoryCacheEntryCount: number;
    avgEntrySizeBytes: number;
    processMemoryMb: number;
    cacheUtilizationPercent: number;
    warningThresholdReached: boolean;
  };
  thresholds: {
    warningThresholdMb: number;
    criticalThresholdMb: number;
    warningThresholdReached: boolean;
    criticalThresholdReached: boolean;
  };
  trends: {
    totalMeasurements: number;
    avgTotalCacheSizeMb: number;
    maxTotalCacheSizeMb: number;
    avgMemoryCacheSizeMb: number;
    avgEntryCount: number;
    maxEntryCount: number;
    growthRateMbPerHour?: number;
  };
}

export type MemoryUsageStats = EmptyMemoryUsageStats | ActiveMemoryUsageStats;

export type AlertLevel = 'normal' | 'warning' | 'critical';

export interface PatternCount {
  pattern: string;
  count: number;
}

export interface EmptyInvalidationStats {
  noInvalidations: true;
  totalInvalidations: number;
  totalKeysInvalidated: number;
  warningThresholdPerHour: number;
  criticalThresholdPerHour: number;
}

export interface ActiveInvalidationStats {
  noInvalidations: false;
  totalInvalidations: number;
  totalKeysInvalidated: number;
  rates: {
    lastHour: number;
    last24Hours: number;
    averagePerHour: number;
  };
  thresholds: {
    warningPerHour: number;
    criticalPerHour: number;
    currentAlertLevel: AlertLevel;
  };
  patterns: {
    /** Top ten patterns among the most recent events, most frequent first */
    mostCommonPatterns: PatternCount[];
    invalidationTypes: Partial<Record<InvalidationType, number>>;
  };
  efficiency: {
    avgKeysPerInvalidation: number;
    avgDuration: number;
    maxDuration: number;
  };
}

export type InvalidationFrequencyStats = EmptyInvalidationStats | ActiveInvalidationStats;

export interface PerformanceStats {
  timestamp: string;
  retentionHours: number;
  cacheHitRate: number;
  totalCacheOperations: number;
  cacheHits: number;
  cacheMisses: number;
  keyGeneration?: KeyGenerationStats;
  cacheOperations?: CacheOperationStats;
  compression?: CompressionStats;
  memoryUsage?: MemoryUsageStats;
  invalidation?: InvalidationFrequencyStats;
}

export type Severity = 'info' | 'warning' | 'critical';

export interface InvalidationRecommendation {
  severity: Severity;
  issue: string;
  message: string;
  suggestions: string[];
}

export interface MemoryWarning {
  severity: Severity;
  message: string;
  recommendations: string[];
}

export interface SlowKeyGeneration {
  duration: number;
  textLength: number;
  operationType: string;
  timestamp: string;
  timesSlower: number;
}

export interface SlowCacheOperation {
  duration: number;
  operationType: CacheOperationType;
  textLength: number;
  timestamp: string;
  timesSlower: number;
}

export interface SlowCompression {
  compressionTime: number;
  originalSize: number;
  compressionRatio: number;
  operationType: string;
  timestamp: string;
  timesSlower: number;
}

export interface SlowInvalidation {
  duration: number;
  pattern: string;
  keysInvalidated: number;
  invalidationType: InvalidationType;
  timestamp: string;
  timesSlower: number;
}

export interface SlowOperations {
  keyGeneration: SlowKeyGeneration[];
  cacheOperations: SlowCacheOperation[];
  compression: SlowCompression[];
  invalidation: SlowInvalidation[];
}

/** Store-side figures folded into a memory snapshot */
export interface StoreMemoryStats {
  memoryUsedBytes?: number;
  keys?: number;
}

export interface MemorySnapshotOptions {
  storeStats?: StoreMemoryStats;
  memoryCacheSizeLimit?: number;
  additionalData?: AdditionalData;
}

export interface MetricsExport {
  keyGenerationTimes: KeyGenerationMetric[];
  cacheOperationTimes: CacheOperationMetric[];
  compressionRatios: CompressionMetric[];
  memoryUsageMeasurements: MemoryUsageMetric[];
  invalidationEvents: InvalidationMetric[];
  cacheHits: number;
  cacheMisses: number;
  totalOperations: number;
  totalInvalidations: number;
  totalKeysInvalidated: number;
  exportTimestamp: string;
}

const MS_PER_HOUR = 3600 * 1000;
const BYTES_PER_MB = 1024 * 1024;
/** Window of most recent invalidation events used for pattern analysis */
const RECENT_INVALIDATION_WINDOW = 50;
const TOP_PATTERN_COUNT = 10;
/** Tier-1 fill level (percent) that produces an informational warning */
const MEMORY_CACHE_FULL_PERCENT = 90;

function toMb(bytes: number): number {
  return bytes / BYTES_PER_MB;
}

function isoTime(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

// ============================================================================
// Performance Monitor
// ============================================================================

export class PerformanceMonitor {
  readonly config: MonitorConfig;

  private keyGenerationTimes: KeyGenerationMetric[] = [];
  private cacheOperationTimes: CacheOperationMetric[] = [];
  private compressionRatios: CompressionMetric[] = [];
  private memoryUsageMeasurements: MemoryUsageMetric[] = [];
  private invalidationEvents: InvalidationMetric[] = [];

  private cacheHits = 0;
  private cacheMisses = 0;
  private totalOperations = 0;
  private totalInvalidations = 0;
  private totalKeysInvalidated = 0;

  constructor(config: Partial<MonitorConfig> = {}) {
    this.config = resolveMonitorConfig(config);
  }

  // --------------------------------------------------------------------------
  // Recording
  // --------------------------------------------------------------------------

  recordKeyGenerationTime(
    duration: number,
    textLength: number,
    operationType: string = '',
    additionalData: AdditionalData = {}
  ): KeyGenerationMetric {
    const metric = createKeyGenerationMetric({ duration, textLength, operationType, additionalData });
    this.keyGenerationTimes.push(metric);
    this.keyGenerationTimes = this.prune(this.keyGenerationTimes);

    if (duration > this.config.keyGenerationThresholdMs) {
      logger.warn(
        `Slow key generation: ${duration.toFixed(2)}ms for ${textLength} chars ` +
          `(threshold ${this.config.keyGenerationThresholdMs}ms)`,
        { operationType }
      );
    }
    return metric;
  }

  recordCacheOperationTime(
    operationType: CacheOperationType,
    duration: number,
    cacheHit: boolean,
    textLength: number = 0,
    additionalData: AdditionalData = {}
  ): CacheOperationMetric {
    const metric = createCacheOperationMetric({ operationType, duration, cacheHit, textLength, additionalData });
    this.cacheOperationTimes.push(metric);
    this.cacheOperationTimes = this.prune(this.cacheOperationTimes);

    this.totalOperations++;
    if (operationType === 'get') {
      if (cacheHit) {
        this.cacheHits++;
      } else {
        this.cacheMisses++;
      }
    }

    if (duration > this.config.cacheOperationThresholdMs) {
      logger.warn(
        `Slow cache ${operationType}: ${duration.toFixed(2)}ms ` +
          `(threshold ${this.config.cacheOperationThresholdMs}ms)`,
        { textLength }
      );
    }
    return metric;
  }

  recordCompressionRatio(
    originalSize: number,
    compressedSize: number,
    compressionTime: number,
    operationType: string = ''
  ): CompressionMetric {
    const metric = createCompressionMetric({
      originalSize,
      compressedSize,
      compressionRatio: originalSize > 0 ? compressedSize / originalSize : 1.0,
      compressionTime,
      operationType,
    });
    this.compressionRatios.push(metric);
    this.compressionRatios = this.prune(this.compressionRatios);

    logger.debug(
      `Compression: ${originalSize} -> ${compressedSize} bytes ` +
        `(ratio ${metric.compressionRatio.toFixed(2)}, ${compressionTime.toFixed(2)}ms)`,
      { operationType }
    );
    return metric;
  }

  /**
   * Snapshot the approximate footprint of the tier-1 map, optionally adding
   * the external store's own memory figures.
   */
  recordMemoryUsage(
    memoryCache: Iterable<readonly [string, unknown]>,
    options: MemorySnapshotOptions = {}
  ): MemoryUsageMetric {
    let memoryCacheSizeBytes = 0;
    let memoryCacheEntryCount = 0;
    for (const [key, value] of memoryCache) {
      memoryCacheSizeBytes += this.estimateEntrySize(key, value);
      memoryCacheEntryCount++;
    }

    const avgEntrySizeBytes = memoryCacheEntryCount > 0 ? memoryCacheSizeBytes / memoryCacheEntryCount : 0;

    let totalCacheSizeBytes = memoryCacheSizeBytes;
    let cacheEntryCount = memoryCacheEntryCount;
    const storeStats = options.storeStats;
    if (storeStats?.memoryUsedBytes !== undefined) {
      totalCacheSizeBytes += storeStats.memoryUsedBytes;
      cacheEntryCount += storeStats.keys ?? 0;
    }

    const { memoryWarningThresholdBytes, memoryCriticalThresholdBytes } = this.config;
    const warningThresholdReached = totalCacheSizeBytes >= memoryWarningThresholdBytes;

    const metric = createMemoryUsageMetric({
      totalCacheSizeBytes,
      cacheEntryCount,
      avgEntrySizeBytes,
      memoryCacheSizeBytes,
      memoryCacheEntryCount,
      memoryCacheSizeLimit: options.memoryCacheSizeLimit ?? null,
      processMemoryMb: toMb(process.memoryUsage().rss),
      cacheUtilizationPercent: (totalCacheSizeBytes / memoryWarningThresholdBytes) * 100,
      warningThresholdReached,
      additionalData: options.additionalData ?? {},
    });
    this.memoryUsageMeasurements.push(metric);
    this.memoryUsageMeasurements = this.prune(this.memoryUsageMeasurements);

    if (totalCacheSizeBytes >= memoryCriticalThresholdBytes) {
      logger.error(
        `Critical cache memory usage: ${toMb(totalCacheSizeBytes).toFixed(1)}MB ` +
          `(>${toMb(memoryCriticalThresholdBytes).toFixed(1)}MB threshold)`
      );
    } else if (warningThresholdReached) {
      logger.warn(
        `High cache memory usage: ${toMb(totalCacheSizeBytes).toFixed(1)}MB ` +
          `(>${toMb(memoryWarningThresholdBytes).toFixed(1)}MB threshold)`
      );
    }
    return metric;
  }

  recordInvalidationEvent(
    pattern: string,
    keysInvalidated: number,
    duration: number,
    invalidationType: InvalidationType = 'manual',
    operationContext: string = '',
    additionalData: AdditionalData = {}
  ): InvalidationMetric {
    const metric = createInvalidationMetric({
      pattern,
      keysInvalidated,
      duration,
      invalidationType,
      operationContext,
      additionalData,
    });
    this.invalidationEvents.push(metric);
    this.invalidationEvents = this.prune(this.invalidationEvents);

    this.totalInvalidations++;
    this.totalKeysInvalidated += keysInvalidated;

    const lastHour = this.countInvalidationsSince(Date.now() - MS_PER_HOUR);
    const { invalidationRateWarningPerHour, invalidationRateCriticalPerHour } = this.config;
    if (lastHour >= invalidationRateCriticalPerHour) {
      logger.error(
        `Critical invalidation rate: ${lastHour} invalidations in last hour ` +
          `(>=${invalidationRateCriticalPerHour} threshold)`
      );
    } else if (lastHour >= invalidationRateWarningPerHour) {
      logger.warn(
        `High invalidation rate: ${lastHour} invalidations in last hour ` +
          `(>=${invalidationRateWarningPerHour} threshold)`
      );
    }

    logger.debug(`Cache invalidation: pattern='${pattern}', keys=${keysInvalidated}`, {
      duration,
      invalidationType,
      operationContext,
    });
    return metric;
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  calculateHitRate(): number {
    return (this.cacheHits / Math.max(this.totalOperations, 1)) * 100;
  }

  getPerformanceStats(): PerformanceStats {
    this.pruneAll();

    const stats: PerformanceStats = {
      timestamp: new Date().toISOString(),
      retentionHours: this.config.retentionHours,
      cacheHitRate: this.calculateHitRate(),
      totalCacheOperations: this.totalOperations,
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
    };

    if (this.keyGenerationTimes.length > 0) {
      const durations = this.keyGenerationTimes.map((m) => m.duration);
      const textLengths = this.keyGenerationTimes.map((m) => m.textLength);
      stats.keyGeneration = {
        ...this.summarizeDurations(durations, this.config.keyGenerationThresholdMs),
        avgTextLength: mean(textLengths),
        maxTextLength: max(textLengths),
      };
    }

    if (this.cacheOperationTimes.length > 0) {
      const durations = this.cacheOperationTimes.map((m) => m.duration);
      const byType = new Map<string, number[]>();
      for (const metric of this.cacheOperationTimes) {
        const list = byType.get(metric.operationType) ?? [];
        list.push(metric.duration);
        byType.set(metric.operationType, list);
      }

      const byOperationType: Record<string, OperationTypeStats> = {};
      for (const [operationType, typeDurations] of byType) {
        byOperationType[operationType] = {
          count: typeDurations.length,
          avgDuration: mean(typeDurations),
          maxDuration: max(typeDurations),
        };
      }

      stats.cacheOperations = {
        ...this.summarizeDurations(durations, this.config.cacheOperationThresholdMs),
        byOperationType,
      };
    }

    if (this.compressionRatios.length > 0) {
      const ratios = this.compressionRatios.map((m) => m.compressionRatio);
      const times = this.compressionRatios.map((m) => m.compressionTime);
      const totalOriginal = sum(this.compressionRatios.map((m) => m.originalSize));
      const totalCompressed = sum(this.compressionRatios.map((m) => m.compressedSize));
      const saved = totalOriginal - totalCompressed;

      stats.compression = {
        totalOperations: this.compressionRatios.length,
        avgCompressionRatio: mean(ratios),
        medianCompressionRatio: median(ratios),
        bestCompressionRatio: min(ratios),
        worstCompressionRatio: max(ratios),
        avgCompressionTime: mean(times),
        maxCompressionTime: max(times),
        totalBytesProcessed: totalOriginal,
        totalBytesSaved: saved,
        overallSavingsPercent: totalOriginal > 0 ? (saved / totalOriginal) * 100 : 0,
      };
    }

    if (this.memoryUsageMeasurements.length > 0) {
      stats.memoryUsage = this.getMemoryUsageStats();
    }

    if (this.invalidationEvents.length > 0) {
      stats.invalidation = this.getInvalidationFrequencyStats();
    }

    return stats;
  }

  getInvalidationFrequencyStats(): InvalidationFrequencyStats {
    this.pruneAll();
    const {
      invalidationRateWarningPerHour: warningPerHour,
      invalidationRateCriticalPerHour: criticalPerHour,
      retentionHours,
    } = this.config;

    if (this.invalidationEvents.length === 0) {
      return {
        noInvalidations: true,
        totalInvalidations: this.totalInvalidations,
        totalKeysInvalidated: this.totalKeysInvalidated,
        warningThresholdPerHour: warningPerHour,
        criticalThresholdPerHour: criticalPerHour,
      };
    }

    const now = Date.now();
    const recent = this.invalidationEvents.slice(-RECENT_INVALIDATION_WINDOW);
    const lastHour = this.countInvalidationsSince(now - MS_PER_HOUR);
    const last24Hours = this.countInvalidationsSince(now - 24 * MS_PER_HOUR);

    const patternCounts = new Map<string, number>();
    const invalidationTypes: Partial<Record<InvalidationType, number>> = {};
    for (const event of recent) {
      patternCounts.set(event.pattern, (patternCounts.get(event.pattern) ?? 0) + 1);
      invalidationTypes[event.invalidationType] = (invalidationTypes[event.invalidationType] ?? 0) + 1;
    }

    // Array#sort is stable, so ties keep first-seen order
    const mostCommonPatterns = [...patternCounts.entries()]
      .map(([pattern, count]) => ({ pattern, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, TOP_PATTERN_COUNT);

    let currentAlertLevel: AlertLevel = 'normal';
    if (lastHour >= criticalPerHour) {
      currentAlertLevel = 'critical';
    } else if (lastHour >= warningPerHour) {
      currentAlertLevel = 'warning';
    }

    const recentDurations = recent.map((e) => e.duration);

    return {
      noInvalidations: false,
      totalInvalidations: this.totalInvalidations,
      totalKeysInvalidated: this.totalKeysInvalidated,
      rates: {
        lastHour,
        last24Hours,
        averagePerHour: this.invalidationEvents.length / retentionHours,
      },
      thresholds: {
        warningPerHour,
        criticalPerHour,
        currentAlertLevel,
      },
      patterns: {
        mostCommonPatterns,
        invalidationTypes,
      },
      efficiency: {
        avgKeysPerInvalidation:
          this.totalInvalidations > 0 ? this.totalKeysInvalidated / this.totalInvalidations : 0,
        avgDuration: mean(recentDurations),
        maxDuration: max(recentDurations),
      },
    };
  }

  getInvalidationRecommendations(): InvalidationRecommendation[] {
    this.pruneAll();
    const stats = this.getInvalidationFrequencyStats();
    if (stats.noInvalidations) {
      return [];
    }

    const recommendations: InvalidationRecommendation[] = [];

    if (stats.rates.lastHour >= stats.thresholds.warningPerHour) {
      recommendations.push({
        severity: stats.thresholds.currentAlertLevel === 'critical' ? 'critical' : 'warning',
        issue: 'High invalidation frequency',
        message: `Cache is being invalidated ${stats.rates.lastHour} times per hour`,
        suggestions: [
          'Review invalidation triggers to reduce unnecessary clearing',
          'Use more specific patterns for selective invalidation',
          'Check whether TTL values are set too low',
          'Revisit the cache warming strategy',
        ],
      });
    }

    const top = stats.patterns.mostCommonPatterns[0];
    if (top && top.count > this.invalidationEvents.length * 0.5) {
      recommendations.push({
        severity: 'info',
        issue: 'Dominant invalidation pattern',
        message: `Pattern '${top.pattern}' accounts for ${top.count} of ${this.invalidationEvents.length} recent invalidations`,
        suggestions: [
          `Optimize the operations that trigger '${top.pattern}' invalidations`,
          'Evaluate whether this pattern could be made more specific',
          'Check whether related data could be cached with a different strategy',
        ],
      });
    }

    const avgKeys = stats.efficiency.avgKeysPerInvalidation;
    if (avgKeys < 1) {
      recommendations.push({
        severity: 'info',
        issue: 'Low invalidation efficiency',
        message: `Average of ${avgKeys.toFixed(1)} keys invalidated per operation`,
        suggestions: [
          'Many invalidation operations are not finding keys to clear',
          'Use more targeted patterns',
          'Review whether cache keys are structured for invalidation',
        ],
      });
    } else if (avgKeys > 100) {
      recommendations.push({
        severity: 'warning',
        issue: 'High invalidation impact',
        message: `Average of ${avgKeys.toFixed(0)} keys invalidated per operation`,
        suggestions: [
          'Invalidation operations are clearing large numbers of entries',
          'Use more selective patterns to preserve valid cache entries',
          'Consider smaller, more frequent invalidations',
        ],
      });
    }

    return recommendations;
  }

  /**
   * Flag measurements above `mean * thresholdMultiplier` for each kind.
   * The threshold is relative to the in-window mean, so one extreme outlier
   * raises the mean and can hide smaller outliers in the same window.
   */
  getRecentSlowOperations(thresholdMultiplier: number = 2.0): SlowOperations {
    this.pruneAll();

    return {
      keyGeneration: flagSlow(this.keyGenerationTimes, (m) => m.duration, thresholdMultiplier).map(
        ({ metric, timesSlower }) => ({
          duration: metric.duration,
          textLength: metric.textLength,
          operationType: metric.operationType,
          timestamp: isoTime(metric.timestamp),
          timesSlower,
        })
      ),
      cacheOperations: flagSlow(this.cacheOperationTimes, (m) => m.duration, thresholdMultiplier).map(
        ({ metric, timesSlower }) => ({
          duration: metric.duration,
          operationType: metric.operationType,
          textLength: metric.textLength,
          timestamp: isoTime(metric.timestamp),
          timesSlower,
        })
      ),
      compression: flagSlow(this.compressionRatios, (m) => m.compressionTime, thresholdMultiplier).map(
        ({ metric, timesSlower }) => ({
          compressionTime: metric.compressionTime,
          originalSize: metric.originalSize,
          compressionRatio: metric.compressionRatio,
          operationType: metric.operationType,
          timestamp: isoTime(metric.timestamp),
          timesSlower,
        })
      ),
      invalidation: flagSlow(this.invalidationEvents, (m) => m.duration, thresholdMultiplier).map(
        ({ metric, timesSlower }) => ({
          duration: metric.duration,
          pattern: metric.pattern,
          keysInvalidated: metric.keysInvalidated,
          invalidationType: metric.invalidationType,
          timestamp: isoTime(metric.timestamp),
          timesSlower,
        })
      ),
    };
  }

  getMemoryUsageStats(): MemoryUsageStats {
    this.pruneAll();
    const { memoryWarningThresholdBytes, memoryCriticalThresholdBytes } = this.config;
    const latest = this.memoryUsageMeasurements[this.memoryUsageMeasurements.length - 1];

    if (!latest) {
      return {
        noMeasurements: true,
        warningThresholdMb: toMb(memoryWarningThresholdBytes),
        criticalThresholdMb: toMb(memoryCriticalThresholdBytes),
      };
    }

    const recent = this.memoryUsageMeasurements.slice(-10);
    const totalSizes = recent.map((m) => m.totalCacheSizeBytes);
    const memoryCacheSizes = recent.map((m) => m.memoryCacheSizeBytes);
    const entryCounts = recent.map((m) => m.cacheEntryCount);

    const stats: ActiveMemoryUsageStats = {
      noMeasurements: false,
      current: {
        totalCacheSizeMb: toMb(latest.totalCacheSizeBytes),
        memoryCacheSizeMb: toMb(latest.memoryCacheSizeBytes),
        cacheEntryCount: latest.cacheEntryCount,
        memoryCacheEntryCount: latest.memoryCacheEntryCount,
        avgEntrySizeBytes: latest.avgEntrySizeBytes,
        processMemoryMb: latest.processMemoryMb,
        cacheUtilizationPercent: latest.cacheUtilizationPercent,
        warningThresholdReached: latest.warningThresholdReached,
      },
      thresholds: {
        warningThresholdMb: toMb(memoryWarningThresholdBytes),
        criticalThresholdMb: toMb(memoryCriticalThresholdBytes),
        warningThresholdReached: latest.warningThresholdReached,
        criticalThresholdReached: latest.totalCacheSizeBytes >= memoryCriticalThresholdBytes,
      },
      trends: {
        totalMeasurements: this.memoryUsageMeasurements.length,
        avgTotalCacheSizeMb: toMb(mean(totalSizes)),
        maxTotalCacheSizeMb: toMb(max(totalSizes)),
        avgMemoryCacheSizeMb: toMb(mean(memoryCacheSizes)),
        avgEntryCount: mean(entryCounts),
        maxEntryCount: max(entryCounts),
      },
    };

    const first = recent[0];
    if (recent.length >= 2) {
      const timeSpanMs = latest.timestamp - first.timestamp;
      if (timeSpanMs > 0) {
        const sizeChange = latest.totalCacheSizeBytes - first.totalCacheSizeBytes;
        stats.trends.growthRateMbPerHour = toMb((sizeChange / timeSpanMs) * MS_PER_HOUR);
      }
    }

    return stats;
  }

  getMemoryWarnings(): MemoryWarning[] {
    this.pruneAll();
    const latest = this.memoryUsageMeasurements[this.memoryUsageMeasurements.length - 1];
    if (!latest) {
      return [];
    }

    const { memoryWarningThresholdBytes, memoryCriticalThresholdBytes } = this.config;
    const warnings: MemoryWarning[] = [];
    const usedMb = toMb(latest.totalCacheSizeBytes).toFixed(1);

    if (latest.totalCacheSizeBytes >= memoryCriticalThresholdBytes) {
      warnings.push({
        severity: 'critical',
        message: `Cache memory usage is ${usedMb}MB, exceeding critical threshold of ${toMb(memoryCriticalThresholdBytes).toFixed(1)}MB`,
        recommendations: [
          'Reduce cache TTL values',
          'Evict cache entries more aggressively',
          'Review and shrink large cached responses',
          'Increase memory limits or scale horizontally',
        ],
      });
    } else if (latest.warningThresholdReached) {
      warnings.push({
        severity: 'warning',
        message: `Cache memory usage is ${usedMb}MB, exceeding warning threshold of ${toMb(memoryWarningThresholdBytes).toFixed(1)}MB`,
        recommendations: [
          'Monitor cache growth closely',
          'Review cache key patterns',
          'Reduce the memory cache size limit',
        ],
      });
    }

    const limit = latest.memoryCacheSizeLimit;
    if (limit !== null && limit > 0 && latest.memoryCacheEntryCount > 0) {
      const utilization = (latest.memoryCacheEntryCount / limit) * 100;
      if (utilization > MEMORY_CACHE_FULL_PERCENT) {
        warnings.push({
          severity: 'info',
          message: `Memory cache is ${utilization.toFixed(1)}% full (${latest.memoryCacheEntryCount}/${limit} entries)`,
          recommendations: [
            'Memory cache eviction is active',
            'Increase the memory cache size if hit rates are good',
          ],
        });
      }
    }

    return warnings;
  }

  // --------------------------------------------------------------------------
  // Maintenance
  // --------------------------------------------------------------------------

  resetStats(): void {
    this.keyGenerationTimes = [];
    this.cacheOperationTimes = [];
    this.compressionRatios = [];
    this.memoryUsageMeasurements = [];
    this.invalidationEvents = [];
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.totalOperations = 0;
    this.totalInvalidations = 0;
    this.totalKeysInvalidated = 0;
    logger.info('Cache performance statistics reset');
  }

  exportMetrics(): MetricsExport {
    this.pruneAll();
    return {
      keyGenerationTimes: [...this.keyGenerationTimes],
      cacheOperationTimes: [...this.cacheOperationTimes],
      compressionRatios: [...this.compressionRatios],
      memoryUsageMeasurements: [...this.memoryUsageMeasurements],
      invalidationEvents: [...this.invalidationEvents],
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      totalOperations: this.totalOperations,
      totalInvalidations: this.totalInvalidations,
      totalKeysInvalidated: this.totalKeysInvalidated,
      exportTimestamp: new Date().toISOString(),
    };
  }

  /** Latest key-generation and cache-operation durations, newest last */
  getRecentDurations(count: number): { keyGeneration: number[]; cacheOperations: number[] } {
    this.pruneAll();
    return {
      keyGeneration: this.keyGenerationTimes.slice(-count).map((m) => m.duration),
      cacheOperations: this.cacheOperationTimes.slice(-count).map((m) => m.duration),
    };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private pruneAll(): void {
    this.keyGenerationTimes = this.prune(this.keyGenerationTimes);
    this.cacheOperationTimes = this.prune(this.cacheOperationTimes);
    this.compressionRatios = this.prune(this.compressionRatios);
    this.memoryUsageMeasurements = this.prune(this.memoryUsageMeasurements);
    this.invalidationEvents = this.prune(this.invalidationEvents);
  }

  /**
   * Drop entries at or before the retention cutoff, then keep at most
   * `maxMeasurements` of the newest.
   */
  private prune<T extends TimestampedMetric>(measurements: T[]): T[] {
    const cutoff = Date.now() - this.config.retentionHours * MS_PER_HOUR;
    let kept = measurements.filter((m) => m.timestamp > cutoff);
    if (kept.length > this.config.maxMeasurements) {
      kept = kept.slice(-this.config.maxMeasurements);
    }
    return kept;
  }

  private countInvalidationsSince(since: number): number {
    let count = 0;
    for (const event of this.invalidationEvents) {
      if (event.timestamp > since) count++;
    }
    return count;
  }

  private summarizeDurations(durations: number[], thresholdMs: number): DurationSummary {
    return {
      totalOperations: durations.length,
      avgDuration: mean(durations),
      medianDuration: median(durations),
      maxDuration: max(durations),
      minDuration: min(durations),
      slowOperations: durations.filter((d) => d > thresholdMs).length,
    };
  }

  private estimateEntrySize(key: string, value: unknown): number {
    let size = Buffer.byteLength(key, 'utf8');
    try {
      const serialized = JSON.stringify(value);
      if (serialized !== undefined) {
        size += Buffer.byteLength(serialized, 'utf8');
      }
    } catch (error) {
      logger.warn('Could not estimate cache entry size', { key, error: getErrorMessage(error) });
    }
    return size;
  }
}

function flagSlow<T>(
  metrics: readonly T[],
  value: (metric: T) => number,
  thresholdMultiplier: number
): Array<{ metric: T; timesSlower: number }> {
  if (metrics.length === 0) return [];
  const avg = mean(metrics.map(value));
  const threshold = avg * thresholdMultiplier;
  return metrics
    .filter((metric) => value(metric) > threshold)
    .map((metric) => ({ metric, timesSlower: value(metric) / avg }));
}
