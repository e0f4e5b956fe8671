/**
 * Stats Routes
 * Read access to the detection log and cache counters
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import type { ServingOrchestrator } from '../services/ServingOrchestrator.js';

const DEFAULT_RECENT_LIMIT = 50;
const MAX_RECENT_LIMIT = 1000;

export function parseRecentLimit(raw: unknown): number {
  if (typeof raw !== 'string' || !raw.trim()) return DEFAULT_RECENT_LIMIT;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 1) return DEFAULT_RECENT_LIMIT;
  return Math.min(value, MAX_RECENT_LIMIT);
}

export function createStatsRouter(orchestrator: ServingOrchestrator) {
  const router = express.Router();

  // Log scans read every partition, so reads get a coarse window of their own
  const readLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 60,
    standardHeaders: true,
    legacyHeaders: false
  });

  /**
   * GET /api/stats
   */
  router.get('/stats', readLimiter, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const log = await orchestrator.eventLog.aggregateStats();
      res.json({ success: true, log, cache: orchestrator.cache.stats() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/logs/recent?limit=50
   */
  router.get('/logs/recent', readLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = parseRecentLimit(req.query.limit);
      const entries = await orchestrator.eventLog.recent(limit);
      res.json({ success: true, count: entries.length, entries });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/cache
   */
  router.delete('/cache', (_req: Request, res: Response) => {
    orchestrator.cache.clear();
    res.json({ success: true, cache: orchestrator.cache.stats() });
  });

  return router;
}
