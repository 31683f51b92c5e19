/**
 * Fulfillment Orchestrator
 *
 * Runs the flight, hotel and car workflows for one request, strictly one
 * after another in that order, and aggregates their outcomes. A domain's
 * failure is recorded and the next domain still runs.
 */

import type { IntentExtraction } from '../intents/types.js';
import { createLogger, type AppLogger } from '../utils/observability/index.js';
import { aggregateOutcomes } from './aggregate.js';
import { DOMAIN_ORDER } from './domains.js';
import type { DomainOutcome, DomainWorkflowConfig, FulfillmentResult } from './types.js';
import { runDomainWorkflow, type EndpointResolver } from './workflow.js';

export interface FulfillmentOrchestratorOptions {
  resolver: EndpointResolver;
  remoteCallTimeoutMs: number;
  domains?: readonly DomainWorkflowConfig[];
  logger?: AppLogger;
}

export class FulfillmentOrchestrator {
  private readonly resolver: EndpointResolver;
  private readonly remoteCallTimeoutMs: number;
  private readonly domains: readonly DomainWorkflowConfig[];
  private readonly log: AppLogger;

  constructor(options: FulfillmentOrchestratorOptions) {
    this.resolver = options.resolver;
    this.remoteCallTimeoutMs = options.remoteCallTimeoutMs;
    this.domains = options.domains ?? DOMAIN_ORDER;
    this.log = options.logger ?? createLogger({ domain: 'fulfillment' });
  }

  async fulfill(extraction: IntentExtraction): Promise<FulfillmentResult> {
    const startTime = Date.now();
    const outcomes: DomainOutcome[] = [];

    for (const domain of this.domains) {
      outcomes.push(
        await runDomainWorkflow(domain, extraction, {
          resolver: this.resolver,
          remoteCallTimeoutMs: this.remoteCallTimeoutMs,
          logger: this.log,
        })
      );
    }

    const result = aggregateOutcomes(outcomes, extraction.intents);
    this.log.info('fulfillment_finished', {
      status: result.status,
      states: Object.fromEntries(outcomes.map((outcome) => [outcome.domain, outcome.state])),
      errorCount: result.details.errors.length,
      durationMs: Date.now() - startTime,
    });
    return result;
  }
}
