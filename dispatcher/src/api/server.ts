import type { Server } from 'node:http';
import express, { type Express } from 'express';
import cors from 'cors';
import type { APIConfiguration } from '@gantry/shared';
import type { Dispatcher } from '../dispatcher.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import { createSelectRouter } from './routes/select.js';
import { createOutcomesRouter } from './routes/outcomes.js';
import { createStatsRouter } from './routes/stats.js';
import { createFleetRouter } from './routes/fleet.js';
import { createAvailabilityRouter } from './routes/availability.js';
import { createLifecycleRouter } from './routes/lifecycle.js';
import { createWebhooksRouter } from './routes/webhooks.js';

export interface ExpressAppOptions {
  /** Expected X-Gitlab-Token on /webhooks/gitlab */
  webhookSecret?: string;
}

/**
 * Creates and configures the Express application
 */
export function createExpressApp(
  config: APIConfiguration,
  dispatcher: Dispatcher,
  options: ExpressAppOptions = {},
): Express {
  const app = express();

  // Basic middleware
  app.use(express.json({ limit: '1mb' }));

  const corsOptions = config.corsOrigins
    ? { origin: config.corsOrigins }
    : {};
  app.use(cors(corsOptions));

  // Authentication middleware (if tokens configured)
  const authMiddleware = createAuthMiddleware(config.authTokens);
  app.use('/api', authMiddleware);

  // API routes
  app.use('/api/select', createSelectRouter(dispatcher.selector));
  app.use('/api/outcomes', createOutcomesRouter(dispatcher.selector));
  app.use('/api/stats', createStatsRouter(dispatcher.selector));
  app.use('/api/fleet', createFleetRouter(dispatcher.ontology));
  app.use('/api/availability', createAvailabilityRouter(dispatcher.selector));
  app.use('/api/lifecycle', createLifecycleRouter(dispatcher.lifecycle));

  // Webhooks carry their own shared secret
  app.use('/webhooks', createWebhooksRouter(dispatcher.selector, dispatcher.ontology, options.webhookSecret));

  // Health check endpoint (no auth required)
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      runners: dispatcher.ontology.size,
      stateBackend: dispatcher.backend.description,
      availability: dispatcher.prober.provider,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Starts the Express server
 */
export async function startServer(
  app: Express,
  config: APIConfiguration,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      console.log(`API server listening on http://${config.host}:${config.port}`);
      resolve(server);
    });

    server.on('error', reject);
  });
}
