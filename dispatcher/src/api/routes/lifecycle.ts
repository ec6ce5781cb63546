import { Router } from 'express';
import type { LifecycleController } from '../../lifecycle/index.js';

/**
 * Creates the lifecycle router
 */
export function createLifecycleRouter(lifecycle: LifecycleController): Router {
  const router = Router();

  /**
   * GET /api/lifecycle
   * Capacity state and idle shutdown deadline
   */
  router.get('/', (_req, res) => {
    res.json({
      configured: lifecycle.configured,
      idleShutdownMs: lifecycle.idleShutdownMs,
      state: lifecycle.getState(),
    });
  });

  /**
   * POST /api/lifecycle/start
   * Start capacity manually. It is never stopped on idle timeout.
   */
  router.post('/start', async (_req, res, next) => {
    try {
      const result = await lifecycle.startCapacity();
      res.status(result.action === 'failed' ? 502 : 200).json(result);
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/lifecycle/stop
   * Stop capacity and reset the lifecycle state
   */
  router.post('/stop', async (_req, res, next) => {
    try {
      const result = await lifecycle.stopCapacity();
      res.status(result.action === 'failed' ? 502 : 200).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
