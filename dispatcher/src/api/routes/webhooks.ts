import { Router } from 'express';
import type { CapabilityOntology } from '../../ontology/index.js';
import type { RunnerSelector } from '../../selector/index.js';
import { outcomeFromBuildEvent } from '../../events/index.js';
import { APIError } from '../middleware/error.js';
import { secretMatches } from '../middleware/auth.js';

/**
 * Creates the webhooks router (mounted outside /api, no bearer auth)
 */
export function createWebhooksRouter(
  selector: RunnerSelector,
  ontology: CapabilityOntology,
  secret?: string,
): Router {
  const router = Router();

  /**
   * POST /webhooks/gitlab
   * GitLab job events. Finished jobs become outcomes.
   *
   * Guarded by X-Gitlab-Token when a secret is configured.
   */
  router.post('/gitlab', async (req, res, next) => {
    try {
      if (secret && !secretMatches(req.get('X-Gitlab-Token'), [secret])) {
        throw new APIError(401, 'Invalid or missing X-Gitlab-Token');
      }

      const mapped = outcomeFromBuildEvent(req.body, ontology);
      if (mapped.kind === 'ignored') {
        res.status(202).json({ status: 'ignored', reason: mapped.reason });
        return;
      }

      const result = await selector.reportOutcome(mapped.outcome);
      res.json({
        status: 'recorded',
        runnerKey: result.observation.runnerKey,
        reward: result.reward,
        persisted: result.persisted,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
