export * from './types.js';
export { aggregateOutcomes, createFailedResult, NOT_UNDERSTOOD_SUMMARY, NOTHING_BOOKED_SUMMARY } from './aggregate.js';
export { CAR_DOMAIN, DOMAIN_ORDER, FLIGHT_DOMAIN, HOTEL_DOMAIN } from './domains.js';
export { FulfillmentOrchestrator, type FulfillmentOrchestratorOptions } from './orchestrator.js';
export { callCapability, compactPayload } from './remote-call.js';
export { runDomainWorkflow, type DomainWorkflowDeps, type EndpointResolver } from './workflow.js';
