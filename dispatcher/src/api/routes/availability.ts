import { Router } from 'express';
import type { RunnerSelector } from '../../selector/index.js';

/**
 * Creates the availability router
 */
export function createAvailabilityRouter(selector: RunnerSelector): Router {
  const router = Router();

  /**
   * GET /api/availability
   * Probe the fleet-status source now
   *
   * Returns { kind: 'known', online } or { kind: 'unknown', reason }.
   */
  router.get('/', async (_req, res, next) => {
    try {
      res.json(await selector.probe());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
