import { CacheError, type CacheErrorOptions } from './base-error.js';

/**
 * Configuration failed schema validation. Raised at construction time.
 */
export class CacheConfigurationError extends CacheError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: CacheErrorOptions = {}) {
    super('CACHE_CONFIGURATION_ERROR', message, { ...options, isOperational: false });
    this.name = 'CacheConfigurationError';
    this.issues = issues;
  }
}

/**
 * A cache key could not be built from the supplied arguments.
 */
export class CacheKeyError extends CacheError {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super('CACHE_KEY_ERROR', message, { ...options, isOperational: false });
    this.name = 'CacheKeyError';
  }
}

/**
 * The external key-value store failed or was unreachable.
 */
export class CacheStoreError extends CacheError {
  public readonly operation: string;

  constructor(operation: string, message: string, options: CacheErrorOptions = {}) {
    super('CACHE_STORE_ERROR', message, options);
    this.name = 'CacheStoreError';
    this.operation = operation;
  }
}

/**
 * A stored payload could not be decoded.
 */
export class CacheDataError extends CacheError {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super('CACHE_DATA_ERROR', message, options);
    this.name = 'CacheDataError';
  }
}
