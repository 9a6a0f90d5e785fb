export { CacheError, isCacheError, type CacheErrorOptions } from './base-error.js';
export {
  CacheConfigurationError,
  CacheKeyError,
  CacheStoreError,
  CacheDataError,
} from './cache-errors.js';
