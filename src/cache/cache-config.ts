/**
 * Cache Configuration
 *
 * Zod schemas and defaults for the tiered response cache and its
 * performance monitor. Configuration is validated once, at construction.
 */

import { z } from 'zod';
import { CacheConfigurationError } from '../errors/index.js';

// ============================================================================
// Schemas
// ============================================================================

export const TtlTierSchema = z.object({
  /** Diagnostic tier name (small, medium, large...) */
  name: z.string().min(1),
  /** Inclusive upper bound on text length, in characters */
  maxTextLength: z.number().int().nonnegative(),
  /** Time-to-live in seconds for entries whose text falls in this tier */
  ttl: z.number().int().positive(),
});

export const TieredCacheConfigSchema = z.object({
  /** Namespace prepended to every key in the external store */
  keyPrefix: z.string(),
  /** Texts longer than this are hashed instead of embedded in the key */
  textHashThreshold: z.number().int().nonnegative(),
  /** Maximum tier-1 entry count; 0 disables tier 1 */
  memoryCacheSize: z.number().int().nonnegative(),
  /** Serialized payloads larger than this (bytes) are compressed */
  compressionThreshold: z.number().int().nonnegative(),
  compressionLevel: z.number().int().min(1).max(9),
  /** TTL (seconds) for texts longer than every tier */
  defaultTtl: z.number().int().positive(),
  ttlTiers: z.array(TtlTierSchema),
  /** Optional per-operation TTL ceilings (seconds) */
  operationTtls: z.record(z.string(), z.number().int().positive()),
});

export const MonitorConfigSchema = z.object({
  retentionHours: z.number().positive(),
  maxMeasurements: z.number().int().positive(),
  keyGenerationThresholdMs: z.number().nonnegative(),
  cacheOperationThresholdMs: z.number().nonnegative(),
  invalidationRateWarningPerHour: z.number().int().positive(),
  invalidationRateCriticalPerHour: z.number().int().positive(),
  memoryWarningThresholdBytes: z.number().int().positive(),
  memoryCriticalThresholdBytes: z.number().int().positive(),
}).refine(
  (cfg) => cfg.invalidationRateCriticalPerHour >= cfg.invalidationRateWarningPerHour,
  { message: 'invalidationRateCriticalPerHour must be >= invalidationRateWarningPerHour' }
).refine(
  (cfg) => cfg.memoryCriticalThresholdBytes >= cfg.memoryWarningThresholdBytes,
  { message: 'memoryCriticalThresholdBytes must be >= memoryWarningThresholdBytes' }
);

export type TtlTier = z.infer<typeof TtlTierSchema>;
export type TieredCacheConfig = z.infer<typeof TieredCacheConfigSchema>;
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_TTL_TIERS: readonly TtlTier[] = [
  { name: 'small', maxTextLength: 500, ttl: 7200 }, // 2 hours
  { name: 'medium', maxTextLength: 5000, ttl: 3600 }, // 1 hour
  { name: 'large', maxTextLength: 50000, ttl: 1800 }, // 30 minutes
];

export const DEFAULT_CACHE_CONFIG: TieredCacheConfig = {
  keyPrefix: 'ai_cache:',
  textHashThreshold: 1000,
  memoryCacheSize: 100,
  compressionThreshold: 1000,
  compressionLevel: 6,
  defaultTtl: 900, // 15 minutes
  ttlTiers: [...DEFAULT_TTL_TIERS],
  operationTtls: {},
};

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  retentionHours: 1,
  maxMeasurements: 1000,
  keyGenerationThresholdMs: 100,
  cacheOperationThresholdMs: 50,
  invalidationRateWarningPerHour: 50,
  invalidationRateCriticalPerHour: 100,
  memoryWarningThresholdBytes: 50 * 1024 * 1024,
  memoryCriticalThresholdBytes: 100 * 1024 * 1024,
};

// ============================================================================
// Resolution
// ============================================================================

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new CacheConfigurationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Spread overrides onto defaults, skipping members explicitly set to undefined
 */
function mergeDefined(defaults: object, overrides: object): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Merge overrides onto the defaults and validate. TTL tiers come back sorted
 * by ascending `maxTextLength`.
 */
export function resolveCacheConfig(overrides: Partial<TieredCacheConfig> = {}): TieredCacheConfig {
  const config = parseOrThrow(
    TieredCacheConfigSchema,
    mergeDefined(DEFAULT_CACHE_CONFIG, overrides),
    'cache configuration'
  );
  return {
    ...config,
    ttlTiers: [...config.ttlTiers].sort((a, b) => a.maxTextLength - b.maxTextLength),
  };
}

export function resolveMonitorConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return parseOrThrow(
    MonitorConfigSchema,
    mergeDefined(DEFAULT_MONITOR_CONFIG, overrides),
    'monitor configuration'
  );
}
