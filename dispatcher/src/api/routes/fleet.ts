import { Router } from 'express';
import type { CapabilityOntology } from '../../ontology/index.js';
import { runnerRegistrationSchema } from '../../config/index.js';

const registrationBodySchema = runnerRegistrationSchema.omit({ runnerKey: true });

/**
 * Creates the fleet router
 */
export function createFleetRouter(ontology: CapabilityOntology): Router {
  const router = Router();

  /**
   * GET /api/fleet
   * Registered runners with their closed capability sets
   *
   * Query parameters:
   * - capability: only runners that have this capability
   */
  router.get('/', (req, res, next) => {
    try {
      const { capability } = req.query;

      let profiles = ontology.profiles();
      if (capability && typeof capability === 'string') {
        const keys = new Set(ontology.runnersWithCapability(capability));
        profiles = profiles.filter(p => keys.has(p.runnerKey));
      }

      res.json({
        runners: profiles,
        count: profiles.length,
        implications: ontology.implications(),
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/fleet/:runnerKey
   */
  router.get('/:runnerKey', (req, res, next) => {
    try {
      res.json(ontology.getProfile(req.params.runnerKey));
    } catch (err) {
      next(err);
    }
  });

  /**
   * PUT /api/fleet/:runnerKey
   * Register a runner or replace its declared capabilities
   *
   * Changes are not written back to the fleet file.
   */
  router.put('/:runnerKey', (req, res, next) => {
    try {
      const body = registrationBodySchema.parse(req.body);
      const existed = ontology.has(req.params.runnerKey);
      const profile = ontology.register({ ...body, runnerKey: req.params.runnerKey });

      res.status(existed ? 200 : 201).json(profile);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
