import { Router } from 'express';
import type { RunnerSelector } from '../../selector/index.js';
import { APIError } from '../middleware/error.js';

/**
 * Creates the stats router
 */
export function createStatsRouter(selector: RunnerSelector): Router {
  const router = Router();

  /**
   * GET /api/stats
   * Bandit statistics per runner, with a ranking by mean reward
   */
  router.get('/', async (_req, res, next) => {
    try {
      const stats = await selector.getStats();

      res.json({
        timestamp: new Date().toISOString(),
        ...stats,
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/stats/reset
   * Clear all learned statistics
   */
  router.post('/reset', async (_req, res, next) => {
    try {
      if (!(await selector.reset())) {
        throw new APIError(503, 'Statistics could not be reset: state backend unavailable');
      }
      res.json({ reset: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
