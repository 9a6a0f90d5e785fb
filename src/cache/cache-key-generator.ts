/**
 * Cache Key Generator
 *
 * Builds deterministic keys of the form
 *
 *   <prefix>op:<operation>|txt:<descriptor>|opts:<digest>[|q:<digest>]
 *
 * Short text is embedded literally (with `\` and `|` escaped); text above
 * the hash threshold is replaced by `hash:<sha256>|len:<length>`. Options
 * are canonicalized with sorted keys before digesting.
 */

import * as crypto from 'crypto';
import { performance } from 'perf_hooks';
import { CacheKeyError } from '../errors/index.js';
import { stableStringify, UnserializableValueError } from '../utils/stable-json.js';
import type { PerformanceMonitor } from './performance-monitor.js';

export type CacheOptions = Readonly<Record<string, unknown>>;

export interface CacheKeyGeneratorConfig {
  /** Texts longer than this (UTF-16 code units) are hashed */
  textHashThreshold: number;
  /** Namespace prepended to every key */
  keyPrefix: string;
}

export type TextTier = 'literal' | 'hashed';

/** Length of the truncated hex digest used for options and question */
const SHORT_DIGEST_LENGTH = 16;

function sha256Hex(input: string): string {
  return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Escape the segment delimiter so literal text can never forge a segment.
 */
export function escapeKeySegment(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\|/g, '\\|');
}

export class CacheKeyGenerator {
  constructor(
    private readonly config: CacheKeyGeneratorConfig,
    private readonly monitor?: PerformanceMonitor
  ) {}

  get keyPrefix(): string {
    return this.config.keyPrefix;
  }

  get textHashThreshold(): number {
    return this.config.textHashThreshold;
  }

  generateCacheKey(
    text: string,
    operation: string,
    options?: CacheOptions | null,
    question?: string | null
  ): string {
    const start = performance.now();

    if (typeof operation !== 'string' || operation.length === 0) {
      throw new CacheKeyError('Cache key operation must be a non-empty string', {
        context: { operation: String(operation) },
      });
    }
    if (typeof text !== 'string') {
      throw new CacheKeyError('Cache key text must be a string', { context: { textType: typeof text } });
    }

    const textTier: TextTier = text.length > this.config.textHashThreshold ? 'hashed' : 'literal';
    const textDescriptor =
      textTier === 'hashed' ? `hash:${sha256Hex(text)}|len:${text.length}` : escapeKeySegment(text);

    const parts = [
      `op:${escapeKeySegment(operation)}`,
      `txt:${textDescriptor}`,
      `opts:${this.digestOptions(options)}`,
    ];

    const hasQuestion = question !== undefined && question !== null;
    if (hasQuestion) {
      parts.push(`q:${sha256Hex(question).slice(0, SHORT_DIGEST_LENGTH)}`);
    }

    const key = this.config.keyPrefix + parts.join('|');

    this.monitor?.recordKeyGenerationTime(performance.now() - start, text.length, operation, {
      textTier,
      hasQuestion,
    });

    return key;
  }

  private digestOptions(options: CacheOptions | null | undefined): string {
    let canonical: string;
    try {
      canonical = stableStringify(options ?? {});
    } catch (error) {
      if (error instanceof UnserializableValueError) {
        throw new CacheKeyError(`Cache key options are not serializable: ${error.message}`, {
          cause: error,
          context: { path: error.path, valueType: error.valueType },
        });
      }
      throw error;
    }
    return sha256Hex(canonical).slice(0, SHORT_DIGEST_LENGTH);
  }
}
