import { Router } from 'express';
import { z } from 'zod';
import type { RunnerSelector } from '../../selector/index.js';
import { jobDeclarationSchema } from '../../parser/index.js';

const pipelineRequestSchema = z.object({
  /** CI file contents (YAML) */
  content: z.string().min(1),
});

/**
 * Creates the selection router
 */
export function createSelectRouter(selector: RunnerSelector): Router {
  const router = Router();

  /**
   * POST /api/select
   * Select a runner for one job declaration
   *
   * Body: { name?, tags?, image?, services?, timeout?, variables? }
   * Returns: { runnerKey, explanation }. runnerKey is null when no
   * registered runner can run the job.
   */
  router.post('/', async (req, res, next) => {
    try {
      const job = jobDeclarationSchema.parse(req.body);
      const response = await selector.selectRunner(job);
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/select/pipeline
   * Select a runner for every job of a CI file
   *
   * Body: { content: "<yaml>" }
   */
  router.post('/pipeline', async (req, res, next) => {
    try {
      const { content } = pipelineRequestSchema.parse(req.body);
      const decisions = await selector.selectPipeline(content);
      res.json({
        decisions,
        count: decisions.length,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
