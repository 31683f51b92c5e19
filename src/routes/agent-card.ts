/**
 * @fileoverview GET /agent-card - serves a service's own capability descriptor.
 * Mounted by the planner and by every specialist service.
 */

import { Router, type Request, type Response } from 'express';

import { AGENT_CARD_PATH, toAgentCard, type CapabilityDescriptor } from '../registry/index.js';

export function createAgentCardRouter(descriptor: CapabilityDescriptor): Router {
  const router = Router();
  const card = toAgentCard(descriptor);

  router.get(AGENT_CARD_PATH, (_req: Request, res: Response) => {
    res.json(card);
  });

  return router;
}
