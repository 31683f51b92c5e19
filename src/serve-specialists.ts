/**
 * @fileoverview Starts the flight, hotel and car mock services, each on its
 * own port, so the planner has something to discover locally.
 */

import type { Server } from 'node:http';

import config, { validateConfig } from './config.js';

validateConfig();
import { createSpecialistApp, type SpecialistKind } from './specialists/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability({ service: 'specialists' });

const logger = createLogger({ domain: 'specialists' });

const ports: Record<SpecialistKind, number> = {
  flight: config.specialists.flightPort,
  hotel: config.specialists.hotelPort,
  car: config.specialists.carPort,
};

const servers: Server[] = [];

const kinds: SpecialistKind[] = ['flight', 'hotel', 'car'];

for (const kind of kinds) {
  const port = ports[kind];
  const baseAddress = `http://${config.specialists.host}:${port}`;
  const app = createSpecialistApp(kind, baseAddress);
  servers.push(
    app.listen(port, config.specialists.host, () => {
      logger.info('specialist_started', { kind, baseAddress, agentCard: `${baseAddress}/agent-card` });
    })
  );
}

function shutdown(signal: string): void {
  logger.info('shutdown_signal_received', { signal });
  let open = servers.length;
  for (const server of servers) {
    server.close(() => {
      open -= 1;
      if (open === 0) process.exit(0);
    });
  }
  setTimeout(() => process.exit(1), 5000).unref();
}

process.once('SIGTERM', () => shutdown('SIGTERM'));
process.once('SIGINT', () => shutdown('SIGINT'));
