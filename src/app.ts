/**
 * @fileoverview Express application factories.
 *
 * Kept apart from the process entry points so tests can mount the same
 * apps with supertest without binding a port.
 */

import express, { type ErrorRequestHandler, type Express, type Router } from 'express';

import type { PlanTripService } from './planner/plan-trip.js';
import type { CapabilityDescriptor, CapabilityRegistry } from './registry/index.js';
import { createAgentCardRouter } from './routes/agent-card.js';
import { createHealthRouter } from './routes/health.js';
import { createPlanTripRouter } from './routes/plan-trip.js';
import { createLogger } from './utils/observability/index.js';

const logger = createLogger({ domain: 'http' });

function httpStatusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

/**
 * Body parser failures become 400 JSON; anything else that reaches here is
 * a 500.
 */
const jsonErrorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  const status = httpStatusOf(error);
  if (status >= 500) {
    logger.error('http_unhandled_error', { path: req.path, error: error instanceof Error ? error.message : String(error) });
  }
  res.status(status).json({ error: status < 500 ? 'Invalid JSON payload' : 'Internal server error' });
};

/**
 * A JSON-in/JSON-out app with the given routers mounted in order.
 */
export function createJsonApp(...routers: Router[]): Express {
  const app = express();
  app.use(express.json());
  for (const router of routers) {
    app.use(router);
  }
  app.use(jsonErrorHandler);
  return app;
}

export interface PlannerAppDeps {
  descriptor: CapabilityDescriptor;
  registry: CapabilityRegistry;
  planTrip: PlanTripService;
}

export function createPlannerApp(deps: PlannerAppDeps): Express {
  return createJsonApp(
    createAgentCardRouter(deps.descriptor),
    createHealthRouter(deps.registry),
    createPlanTripRouter(deps.planTrip)
  );
}
