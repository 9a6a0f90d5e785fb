/**
 * Routes Module
 */

export { createCacheRouter, createCacheHandlers } from './cache.js';
export type { CacheRouteHandler, CacheRouteHandlers } from './cache.js';
