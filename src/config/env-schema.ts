/**
 * Environment Variable Schema & Validation
 *
 * Central registry of the environment variables read by the response cache.
 * Provides validation and parsing into cache and monitor configuration.
 */

import type { MonitorConfig, TieredCacheConfig } from '../cache/cache-config.js';

export interface EnvVarDef {
  /** Environment variable name */
  name: string;
  /** Expected value type */
  type: 'string' | 'number';
  /** Default value (as string, since env vars are always strings) */
  default?: string;
  /** Human-readable description */
  description: string;
  /** Whether the value should be masked in output (credentials in URLs) */
  sensitive?: boolean;
  /** Minimum value for numbers */
  min?: number;
  /** Maximum value for numbers */
  max?: number;
  /** Regex pattern for string validation */
  pattern?: RegExp;
}

/**
 * Complete schema of all environment variables used across the codebase.
 */
export const ENV_SCHEMA: EnvVarDef[] = [
  // ---- Core ----
  {
    name: 'NODE_ENV',
    type: 'string',
    default: 'development',
    description: 'Runtime environment (development, production, test)',
    pattern: /^(development|production|test)$/,
  },

  // ---- Store ----
  {
    name: 'REDIS_URL',
    type: 'string',
    description: 'Redis connection URL; unset runs the cache in memory-only mode',
    sensitive: true,
    pattern: /^rediss?:\/\//,
  },
  {
    name: 'REDIS_CONNECT_TIMEOUT_MS',
    type: 'number',
    default: '5000',
    description: 'Redis connect timeout in milliseconds',
    min: 100,
  },
  {
    name: 'REDIS_COMMAND_TIMEOUT_MS',
    type: 'number',
    default: '2000',
    description: 'Redis per-command timeout in milliseconds',
    min: 10,
  },

  // ---- Cache ----
  {
    name: 'CACHE_KEY_PREFIX',
    type: 'string',
    default: 'ai_cache:',
    description: 'Namespace prepended to every cache key',
  },
  {
    name: 'CACHE_DEFAULT_TTL',
    type: 'number',
    default: '900',
    description: 'TTL in seconds for texts longer than every size tier',
    min: 1,
  },
  {
    name: 'CACHE_TEXT_HASH_THRESHOLD',
    type: 'number',
    default: '1000',
    description: 'Texts longer than this many characters are hashed in cache keys',
    min: 0,
  },
  {
    name: 'CACHE_COMPRESSION_THRESHOLD',
    type: 'number',
    default: '1000',
    description: 'Payloads larger than this many bytes are compressed',
    min: 0,
  },
  {
    name: 'CACHE_COMPRESSION_LEVEL',
    type: 'number',
    default: '6',
    description: 'zlib compression level (1-9)',
    min: 1,
    max: 9,
  },
  {
    name: 'CACHE_MEMORY_SIZE',
    type: 'number',
    default: '100',
    description: 'Maximum in-process (tier-1) entries; 0 disables tier 1',
    min: 0,
  },

  // ---- Metrics ----
  {
    name: 'CACHE_METRICS_RETENTION_HOURS',
    type: 'number',
    default: '1',
    description: 'How long performance measurements are retained',
    min: 0.01,
  },
  {
    name: 'CACHE_METRICS_MAX_MEASUREMENTS',
    type: 'number',
    default: '1000',
    description: 'Maximum retained measurements per metric kind',
    min: 1,
  },

  // ---- Debug ----
  {
    name: 'LOG_LEVEL',
    type: 'string',
    default: 'info',
    description: 'Log verbosity (debug, info, warn, error)',
    pattern: /^(debug|info|warn|error)$/,
  },
  {
    name: 'LOG_FORMAT',
    type: 'string',
    default: 'text',
    description: 'Log line format (text, json)',
    pattern: /^(text|json)$/,
  },
];

// ---------------------------------------------------------------------------
// Lookup helpers
// ---------------------------------------------------------------------------

const schemaByName: Map<string, EnvVarDef> = new Map(
  ENV_SCHEMA.map(def => [def.name, def])
);

/**
 * Look up a single env var definition by name.
 */
export function getEnvDef(name: string): EnvVarDef | undefined {
  return schemaByName.get(name);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationResult {
  /** True when no variable produced a warning */
  valid: boolean;
  warnings: string[];
}

/**
 * Validate an environment against the schema. Unset variables fall back to
 * defaults; type mismatches, out-of-range values and pattern mismatches
 * produce warnings.
 */
export function validateEnv(env: Record<string, string | undefined> = process.env): ValidationResult {
  const warnings: string[] = [];

  for (const def of ENV_SCHEMA) {
    const raw = env[def.name];

    if (raw === undefined || raw === '') {
      continue;
    }

    switch (def.type) {
      case 'number': {
        const num = Number(raw);
        if (isNaN(num)) {
          warnings.push(`${def.name} should be a number but got "${raw}"`);
        } else {
          if (def.min !== undefined && num < def.min) {
            warnings.push(`${def.name}=${raw} is below minimum ${def.min}`);
          }
          if (def.max !== undefined && num > def.max) {
            warnings.push(`${def.name}=${raw} is above maximum ${def.max}`);
          }
        }
        break;
      }
      case 'string': {
        if (def.pattern && !def.pattern.test(raw)) {
          const shown = def.sensitive ? maskValue(raw) : raw;
          warnings.push(`${def.name}="${shown}" does not match expected pattern ${def.pattern}`);
        }
        break;
      }
    }
  }

  return {
    valid: warnings.length === 0,
    warnings,
  };
}

/**
 * Mask a sensitive value for display.
 * Shows first 4 and last 4 chars, or just '****' if too short.
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.slice(0, 4) + '****' + value.slice(-4);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export interface EnvConfig {
  redisUrl?: string;
  redisConnectTimeoutMs?: number;
  redisCommandTimeoutMs?: number;
  cache: Partial<TieredCacheConfig>;
  monitor: Partial<MonitorConfig>;
}

function readNumber(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const num = Number(raw);
  return isNaN(num) ? undefined : num;
}

function readString(env: Record<string, string | undefined>, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Parse cache, monitor and store settings from the environment. Unset or
 * non-numeric values come back undefined so defaults apply; range checks
 * happen when the configuration is resolved.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): EnvConfig {
  return {
    redisUrl: readString(env, 'REDIS_URL'),
    redisConnectTimeoutMs: readNumber(env, 'REDIS_CONNECT_TIMEOUT_MS'),
    redisCommandTimeoutMs: readNumber(env, 'REDIS_COMMAND_TIMEOUT_MS'),
    cache: {
      keyPrefix: readString(env, 'CACHE_KEY_PREFIX'),
      defaultTtl: readNumber(env, 'CACHE_DEFAULT_TTL'),
      textHashThreshold: readNumber(env, 'CACHE_TEXT_HASH_THRESHOLD'),
      compressionThreshold: readNumber(env, 'CACHE_COMPRESSION_THRESHOLD'),
      compressionLevel: readNumber(env, 'CACHE_COMPRESSION_LEVEL'),
      memoryCacheSize: readNumber(env, 'CACHE_MEMORY_SIZE'),
    },
    monitor: {
      retentionHours: readNumber(env, 'CACHE_METRICS_RETENTION_HOURS'),
      maxMeasurements: readNumber(env, 'CACHE_METRICS_MAX_MEASUREMENTS'),
    },
  };
}
