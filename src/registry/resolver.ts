/**
 * Capability Resolver
 *
 * Read path over the registry: maps a capability id to the endpoint that
 * serves it. The first matching entry in registry order wins; there is no
 * load balancing between services offering the same capability.
 */

import type { CapabilityRegistry } from './capability-registry.js';
import type { ResolvedEndpoint } from './types.js';
import { joinUrl } from '../utils/http.js';
import { createLogger, type AppLogger } from '../utils/observability/index.js';

export class CapabilityResolver {
  private readonly log: AppLogger;

  constructor(
    private readonly registry: CapabilityRegistry,
    logger?: AppLogger
  ) {
    this.log = logger ?? createLogger({ domain: 'capability-resolver' });
  }

  /**
   * Resolve a capability id, running discovery first if it has not run.
   *
   * @returns the endpoint, or null when no registered service offers the
   *   capability with an invocation path
   */
  async resolve(capabilityId: string): Promise<ResolvedEndpoint | null> {
    await this.registry.ensureDiscovered();

    for (const entry of this.registry.listEntries()) {
      if (!entry.operations.has(capabilityId)) continue;

      const invocationPath = entry.operations.get(capabilityId);
      if (!invocationPath) {
        this.log.warn('capability_missing_path', { capabilityId, serviceId: entry.serviceId });
        continue;
      }

      this.log.debug('capability_resolved', {
        capabilityId,
        serviceId: entry.serviceId,
        url: joinUrl(entry.baseAddress, invocationPath),
      });
      return {
        serviceId: entry.serviceId,
        baseAddress: entry.baseAddress,
        invocationPath,
      };
    }

    this.log.warn('capability_not_found', { capabilityId, registrySize: this.registry.size });
    return null;
  }
}

/**
 * Full URL of a resolved endpoint.
 */
export function endpointUrl(endpoint: ResolvedEndpoint): string {
  return joinUrl(endpoint.baseAddress, endpoint.invocationPath);
}
