/**
 * Capability Registry
 *
 * In-process index of specialist services built from their agent cards.
 * One instance is created at process start and handed to the resolver and
 * the planner routes; tests create a fresh one per case.
 *
 * Discovery runs at most once automatically. Concurrent callers that arrive
 * while the pass is running await the same promise.
 */

import { parseAgentCard } from './schema.js';
import type {
  CapabilityDescriptor,
  DiscoveryReport,
  DiscoveryState,
  RegistryEntry,
} from './types.js';
import type { ErrorCode, Result } from '../utils/errors.js';
import { describeFetchError, joinUrl } from '../utils/http.js';
import { createLogger, type AppLogger } from '../utils/observability/index.js';

/** Path every specialist serves its descriptor on */
export const AGENT_CARD_PATH = '/agent-card';

export interface CapabilityRegistryOptions {
  /** Base addresses polled during discovery */
  knownAddresses: string[];

  /** Per-address descriptor fetch timeout */
  timeoutMs?: number;

  logger?: AppLogger;
}

function toEntry(descriptor: CapabilityDescriptor): RegistryEntry {
  return Object.freeze({
    serviceId: descriptor.serviceId,
    displayName: descriptor.displayName,
    baseAddress: descriptor.baseAddress,
    operations: new Map(descriptor.operations.map((op) => [op.capabilityId, op.invocationPath])),
  });
}

export class CapabilityRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly knownAddresses: string[];
  private readonly timeoutMs: number;
  private readonly log: AppLogger;
  private state: DiscoveryState = 'uninitialized';
  private inFlight: Promise<DiscoveryReport> | null = null;

  constructor(options: CapabilityRegistryOptions) {
    this.knownAddresses = [...options.knownAddresses];
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.log = options.logger ?? createLogger({ domain: 'capability-registry' });
  }

  getState(): DiscoveryState {
    return this.state;
  }

  /** Whether at least one service has been registered. */
  isPopulated(): boolean {
    return this.entries.size > 0;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Entries in insertion (first-discovered) order. */
  listEntries(): RegistryEntry[] {
    return [...this.entries.values()];
  }

  getEntry(serviceId: string): RegistryEntry | undefined {
    return this.entries.get(serviceId);
  }

  /**
   * Run discovery unless it already completed. Callers arriving during a
   * pass wait for that pass instead of starting another.
   */
  async ensureDiscovered(): Promise<void> {
    if (this.state === 'ready') return;
    await (this.inFlight ?? this.startPass());
  }

  /**
   * Explicitly re-run discovery. Entries of services that answer are
   * replaced; services that stay silent keep their previous entry.
   * Resolves to the report of the pass.
   */
  rediscover(): Promise<DiscoveryReport> {
    return this.inFlight ?? this.startPass();
  }

  /**
   * One discovery pass over the known addresses. Never rejects because of a
   * single address: unreachable services and invalid cards are logged and
   * skipped. Only reached through startPass, which owns the state.
   */
  private async discover(): Promise<DiscoveryReport> {
    const addresses = this.knownAddresses;
    const report: DiscoveryReport = { discovered: [], skipped: [] };
    const found = new Map<string, RegistryEntry>();

    this.log.info('discovery_started', { addresses });

    for (const address of addresses) {
      const result = await this.fetchDescriptor(address);
      if (!result.success) {
        this.log.warn('discovery_address_skipped', {
          address,
          code: 'DISCOVERY_FAILED' satisfies ErrorCode,
          reason: result.error,
        });
        report.skipped.push({ address, reason: result.error });
        continue;
      }

      const descriptor = result.data;
      if (found.has(descriptor.serviceId)) {
        this.log.warn('discovery_duplicate_service', {
          address,
          serviceId: descriptor.serviceId,
        });
      }
      found.set(descriptor.serviceId, toEntry(descriptor));
      report.discovered.push({ address, serviceId: descriptor.serviceId });
      this.log.info('discovery_service_found', {
        address,
        serviceId: descriptor.serviceId,
        displayName: descriptor.displayName,
        capabilities: descriptor.operations.map((op) => op.capabilityId),
      });
    }

    // Merged per service once the pass is over; last write wins.
    for (const [serviceId, entry] of found) {
      this.entries.set(serviceId, entry);
    }

    this.log.info('discovery_finished', {
      discoveredCount: report.discovered.length,
      skippedCount: report.skipped.length,
      registrySize: this.entries.size,
    });

    return report;
  }

  private startPass(): Promise<DiscoveryReport> {
    this.state = 'discovering';
    const pass = (async () => {
      try {
        const report = await this.discover();
        this.state = 'ready';
        return report;
      } catch (error) {
        this.state = 'uninitialized';
        throw error;
      } finally {
        this.inFlight = null;
      }
    })();
    this.inFlight = pass;
    return pass;
  }

  private async fetchDescriptor(address: string): Promise<Result<CapabilityDescriptor>> {
    const url = joinUrl(address, AGENT_CARD_PATH);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return { success: false, error: `failed to reach ${url}: ${describeFetchError(error, this.timeoutMs)}` };
    }

    if (!response.ok) {
      return { success: false, error: `${url} answered HTTP ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return { success: false, error: `${url} returned invalid JSON: ${describeFetchError(error, this.timeoutMs)}` };
    }

    return parseAgentCard(body);
  }
}
