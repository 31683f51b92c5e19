export type {
  CapabilityOperation,
  CapabilityDescriptor,
  RegistryEntry,
  DiscoveryState,
  DiscoveryReport,
  ResolvedEndpoint,
} from './types.js';

export { CapabilityRegistry, AGENT_CARD_PATH } from './capability-registry.js';
export type { CapabilityRegistryOptions } from './capability-registry.js';
export { CapabilityResolver, endpointUrl } from './resolver.js';
export { AgentCardSchema, parseAgentCard, toAgentCard } from './schema.js';
export type { AgentCard } from './schema.js';
export { createPlannerDescriptor, PLAN_TRIP_CAPABILITY } from './planner-card.js';
