/**
 * @fileoverview Trip planning route.
 *
 * POST /planTrip {query} - Understands the request, runs fulfillment and
 * answers with {status, summary, details}.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import { createFailedResult } from '../fulfillment/index.js';
import type { PlanTripService } from '../planner/plan-trip.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, createRequestId, withLogContext } from '../utils/observability/index.js';

const logger = createLogger({ domain: 'route.planTrip' });

const PlanTripRequestSchema = z.object({
  query: z.string().trim().min(1),
});

export const INVALID_QUERY_ERROR = "Invalid JSON payload, 'query' field required";

export function createPlanTripRouter(service: PlanTripService): Router {
  const router = Router();

  router.post('/planTrip', async (req: Request, res: Response) => {
    const parsed = PlanTripRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: INVALID_QUERY_ERROR });
      return;
    }

    const requestId = createRequestId();
    res.setHeader('X-Request-Id', requestId);

    await withLogContext({ requestId, operation: 'planTrip' }, async () => {
      logger.info('plan_trip_received', { queryLength: parsed.data.query.length });
      try {
        const outcome = await service.plan(parsed.data.query);
        logger.info('plan_trip_completed', { httpStatus: outcome.httpStatus, status: outcome.body.status });
        res.status(outcome.httpStatus).json(outcome.body);
      } catch (error) {
        logger.error('plan_trip_crashed', { error: errorMessage(error) });
        res.status(500).json(createFailedResult('Unexpected error while planning the trip.', [errorMessage(error)]));
      }
    });
  });

  return router;
}
