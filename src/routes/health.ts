/**
 * @fileoverview Health check endpoint.
 *
 * Reports the discovery state without triggering discovery.
 */

import { Router, type Request, type Response } from 'express';

import type { CapabilityRegistry } from '../registry/index.js';

export function createHealthRouter(registry: CapabilityRegistry): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      registry: {
        state: registry.getState(),
        services: registry.listEntries().map((entry) => entry.serviceId),
      },
    });
  });

  return router;
}
