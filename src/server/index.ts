/**
 * Monitoring API
 *
 * Express application exposing the cache monitoring routes under /cache.
 */

import express, { type Application } from 'express';
import type { TieredResponseCache } from '../cache/tiered-response-cache.js';
import { errorHandler, notFoundHandler, requestIdMiddleware } from './middleware/index.js';
import { createCacheRouter } from './routes/index.js';

export function createCacheApp(cache: TieredResponseCache, basePath: string = '/cache'): Application {
  const app = express();

  app.use(requestIdMiddleware);
  app.use(express.json());
  app.use(basePath, createCacheRouter(cache));
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export { createCacheRouter, createCacheHandlers } from './routes/index.js';
export { ApiServerError, asyncHandler, errorHandler } from './middleware/index.js';
