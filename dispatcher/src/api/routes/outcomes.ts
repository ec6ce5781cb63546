import { Router } from 'express';
import type { RunnerSelector } from '../../selector/index.js';
import { outcomeSchema } from '../../events/index.js';

/**
 * Creates the outcomes router
 */
export function createOutcomesRouter(selector: RunnerSelector): Router {
  const router = Router();

  /**
   * POST /api/outcomes
   * Report how a job went on a runner
   *
   * Body: { runnerKey, success, durationSeconds, costPerMinute?, decisionId? }
   * Unknown runners are rejected with 422.
   */
  router.post('/', async (req, res, next) => {
    try {
      const report = outcomeSchema.parse(req.body);
      const result = await selector.reportOutcome(report);

      res.json({
        recorded: true,
        runnerKey: result.observation.runnerKey,
        reward: result.reward,
        arm: result.arm,
        persisted: result.persisted,
        degraded: result.degraded,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
