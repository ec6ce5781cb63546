/**
 * REST API for the dispatcher: selection, outcomes, statistics, fleet,
 * availability and capacity control, plus the GitLab job webhook.
 */

export { createExpressApp, startServer, type ExpressAppOptions } from './server.js';

export { createAuthMiddleware, secretMatches } from './middleware/auth.js';
export { errorHandler, notFoundHandler, APIError } from './middleware/error.js';
export type { ErrorResponse } from './middleware/error.js';

export { createSelectRouter } from './routes/select.js';
export { createOutcomesRouter } from './routes/outcomes.js';
export { createStatsRouter } from './routes/stats.js';
export { createFleetRouter } from './routes/fleet.js';
export { createAvailabilityRouter } from './routes/availability.js';
export { createLifecycleRouter } from './routes/lifecycle.js';
export { createWebhooksRouter } from './routes/webhooks.js';
