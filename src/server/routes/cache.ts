/**
 * Cache Monitoring Routes
 *
 * Status, invalidation and performance endpoints for the response cache.
 * Handlers are exported separately so they can be mounted elsewhere or
 * exercised without an HTTP server.
 */

import { Router, type Request, type Response } from 'express';
import { asyncHandler, ApiServerError } from '../middleware/index.js';
import type { InvalidationResponse } from '../types.js';
import type { TieredResponseCache } from '../../cache/tiered-response-cache.js';

export type CacheRouteHandler = (req: Request, res: Response) => Promise<void>;

export interface CacheRouteHandlers {
  status: CacheRouteHandler;
  invalidate: CacheRouteHandler;
  invalidateMemory: CacheRouteHandler;
  invalidationStats: CacheRouteHandler;
  invalidationRecommendations: CacheRouteHandler;
  metrics: CacheRouteHandler;
  slowOperations: CacheRouteHandler;
  exportMetrics: CacheRouteHandler;
  reset: CacheRouteHandler;
}

const DEFAULT_OPERATION_CONTEXT = 'api_endpoint';

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createCacheHandlers(cache: TieredResponseCache): CacheRouteHandlers {
  return {
    /**
     * GET /status
     */
    status: async (_req, res) => {
      res.json(await cache.getCacheStats());
    },

    /**
     * POST /invalidate?pattern=&operation_context=
     * An empty or missing pattern clears every key in the namespace.
     */
    invalidate: async (req, res) => {
      const pattern = queryString(req.query.pattern) ?? '';
      const operationContext = queryString(req.query.operation_context) || DEFAULT_OPERATION_CONTEXT;
      const keysInvalidated = await cache.invalidatePattern(pattern, operationContext);
      const body: InvalidationResponse = {
        message: `Cache invalidated for pattern: ${pattern}`,
        pattern,
        operationContext,
        keysInvalidated,
      };
      res.json(body);
    },

    /**
     * POST /invalidate-memory?operation_context=
     */
    invalidateMemory: async (req, res) => {
      const operationContext = queryString(req.query.operation_context) || DEFAULT_OPERATION_CONTEXT;
      const removed = cache.invalidateMemoryCache(operationContext);
      res.json({ message: 'Memory cache cleared', entriesRemoved: removed, operationContext });
    },

    /**
     * GET /invalidation-stats
     */
    invalidationStats: async (_req, res) => {
      res.json(cache.getInvalidationFrequencyStats());
    },

    /**
     * GET /invalidation-recommendations
     */
    invalidationRecommendations: async (_req, res) => {
      res.json({ recommendations: cache.getInvalidationRecommendations() });
    },

    /**
     * GET /metrics
     */
    metrics: async (_req, res) => {
      res.json(cache.monitor.getPerformanceStats());
    },

    /**
     * GET /slow-operations?multiplier=2
     */
    slowOperations: async (req, res) => {
      const raw = queryString(req.query.multiplier);
      let multiplier = 2;
      if (raw !== undefined) {
        multiplier = Number(raw);
        if (!Number.isFinite(multiplier) || multiplier <= 0) {
          throw ApiServerError.badRequest('multiplier must be a positive number', { multiplier: raw });
        }
      }
      res.json(cache.monitor.getRecentSlowOperations(multiplier));
    },

    /**
     * GET /export
     */
    exportMetrics: async (_req, res) => {
      res.json(cache.monitor.exportMetrics());
    },

    /**
     * POST /reset
     */
    reset: async (_req, res) => {
      cache.resetPerformanceStats();
      res.json({ message: 'Cache performance statistics reset' });
    },
  };
}

export function createCacheRouter(cache: TieredResponseCache): Router {
  const router = Router();
  const handlers = createCacheHandlers(cache);

  router.get('/status', asyncHandler(handlers.status));
  router.post('/invalidate', asyncHandler(handlers.invalidate));
  router.post('/invalidate-memory', asyncHandler(handlers.invalidateMemory));
  router.get('/invalidation-stats', asyncHandler(handlers.invalidationStats));
  router.get('/invalidation-recommendations', asyncHandler(handlers.invalidationRecommendations));
  router.get('/metrics', asyncHandler(handlers.metrics));
  router.get('/slow-operations', asyncHandler(handlers.slowOperations));
  router.get('/export', asyncHandler(handlers.exportMetrics));
  router.post('/reset', asyncHandler(handlers.reset));

  return router;
}
