/**
 * Plan Trip Service
 *
 * Handles one planning request end to end: make sure specialists have been
 * discovered, understand the query, run fulfillment. The two cases where
 * nothing can be attempted at all are reported as HTTP 500 with the same
 * body shape as a normal result.
 */

import { createFailedResult, type FulfillmentResult } from '../fulfillment/index.js';
import { hasUsableContent, presentEntities, type IntentExtraction, type IntentExtractor } from '../intents/index.js';
import type { CapabilityRegistry } from '../registry/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, type AppLogger } from '../utils/observability/index.js';

export const NO_SPECIALISTS_SUMMARY = 'Configuration error: No specialist services discovered.';
export const NO_SPECIALISTS_ERROR = 'Failed to discover specialist services.';
export const EXTRACTION_FAILED_SUMMARY =
  'Failed to process the request with the intent extractor. Check planner logs for details.';
export const NO_USABLE_CONTENT_ERROR = 'Intent extraction returned no usable intents or entities.';

export interface PlanTripOutcome {
  httpStatus: 200 | 500;
  body: FulfillmentResult;
}

/** The part of the orchestrator the service needs */
export interface TripFulfiller {
  fulfill(extraction: IntentExtraction): Promise<FulfillmentResult>;
}

export interface PlanTripServiceOptions {
  registry: CapabilityRegistry;
  extractor: IntentExtractor;
  orchestrator: TripFulfiller;
  logger?: AppLogger;
}

export class PlanTripService {
  private readonly registry: CapabilityRegistry;
  private readonly extractor: IntentExtractor;
  private readonly orchestrator: TripFulfiller;
  private readonly log: AppLogger;

  constructor(options: PlanTripServiceOptions) {
    this.registry = options.registry;
    this.extractor = options.extractor;
    this.orchestrator = options.orchestrator;
    this.log = options.logger ?? createLogger({ domain: 'plan-trip' });
  }

  async plan(query: string): Promise<PlanTripOutcome> {
    await this.registry.ensureDiscovered();
    if (!this.registry.isPopulated()) {
      this.log.error('plan_no_specialists', { state: this.registry.getState() });
      return { httpStatus: 500, body: createFailedResult(NO_SPECIALISTS_SUMMARY, [NO_SPECIALISTS_ERROR]) };
    }

    let extraction: IntentExtraction;
    try {
      extraction = await this.extractor.extract(query);
    } catch (error) {
      this.log.error('plan_extraction_failed', { extractor: this.extractor.name, error: errorMessage(error) });
      return {
        httpStatus: 500,
        body: createFailedResult(EXTRACTION_FAILED_SUMMARY, [`Intent extraction failed: ${errorMessage(error)}`]),
      };
    }

    if (!hasUsableContent(extraction)) {
      this.log.warn('plan_nothing_extracted', { extractor: this.extractor.name });
      return { httpStatus: 500, body: createFailedResult(EXTRACTION_FAILED_SUMMARY, [NO_USABLE_CONTENT_ERROR]) };
    }

    this.log.info('plan_extracted', {
      extractor: this.extractor.name,
      intents: [...extraction.intents],
      entities: presentEntities(extraction.entities),
    });

    const result = await this.orchestrator.fulfill(extraction);
    return { httpStatus: 200, body: result };
  }
}
