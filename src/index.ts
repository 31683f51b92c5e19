/**
 * @fileoverview Planner entry point.
 *
 * Wires the capability registry, intent extractor and fulfillment
 * orchestrator into the planner app and starts listening. Specialists are
 * discovered lazily on the first /planTrip request.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();
import { createPlannerApp } from './app.js';
import { FulfillmentOrchestrator } from './fulfillment/index.js';
import { createIntentExtractor } from './intents/index.js';
import { PlanTripService } from './planner/plan-trip.js';
import { CapabilityRegistry, CapabilityResolver, createPlannerDescriptor } from './registry/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability({ service: 'planner' });

const logger = createLogger({ domain: 'server' });

const registry = new CapabilityRegistry({
  knownAddresses: config.discovery.specialistBaseUrls,
  timeoutMs: config.discovery.timeoutMs,
});
const resolver = new CapabilityResolver(registry);
const orchestrator = new FulfillmentOrchestrator({
  resolver,
  remoteCallTimeoutMs: config.remoteCall.timeoutMs,
});
const extractor = createIntentExtractor(config.intents);
const planTrip = new PlanTripService({ registry, extractor, orchestrator });

const app = createPlannerApp({
  descriptor: createPlannerDescriptor(config.plannerBaseUrl),
  registry,
  planTrip,
});

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    baseUrl: config.plannerBaseUrl,
    intentProvider: extractor.name,
    specialistAddresses: config.discovery.specialistBaseUrls,
  });
});

let isShuttingDown = false;

// Graceful shutdown
function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_forced', { timeoutMs: 10000 });
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
