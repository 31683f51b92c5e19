/**
 * Capability Registry Type Definitions
 *
 * A specialist service describes itself with a capability descriptor; the
 * planner keeps one registry entry per discovered service and resolves
 * capability ids against those entries.
 */

// ============================================================================
// Descriptor Types
// ============================================================================

/**
 * One operation a service offers.
 * `invocationPath` may be absent: the operation is registered but cannot be
 * resolved to an endpoint.
 */
export interface CapabilityOperation {
  /** Convention-shared id, e.g. "searchFlights" */
  capabilityId: string;

  /** Path relative to the service base address, e.g. "/searchFlights" */
  invocationPath?: string;

  description?: string;
}

/**
 * Self-reported identity and operations of a service.
 */
export interface CapabilityDescriptor {
  serviceId: string;
  displayName: string;
  description?: string;

  /** Address at which the operations are reachable */
  baseAddress: string;

  operations: CapabilityOperation[];
}

// ============================================================================
// Registry Types
// ============================================================================

/**
 * Registry record for one discovered service. Never mutated after insertion;
 * a later discovery of the same service replaces the whole entry.
 */
export interface RegistryEntry {
  readonly serviceId: string;
  readonly displayName: string;
  readonly baseAddress: string;

  /** capabilityId → invocationPath (undefined when the card omitted it) */
  readonly operations: ReadonlyMap<string, string | undefined>;
}

/**
 * Discovery lifecycle.
 * State machine: uninitialized → discovering → ready
 */
export type DiscoveryState = 'uninitialized' | 'discovering' | 'ready';

/**
 * Outcome of one discovery pass, per address.
 */
export interface DiscoveryReport {
  discovered: Array<{ address: string; serviceId: string }>;
  skipped: Array<{ address: string; reason: string }>;
}

/**
 * A resolved capability: where to send the call.
 */
export interface ResolvedEndpoint {
  serviceId: string;
  baseAddress: string;
  invocationPath: string;
}
