/**
 * Domain Workflow
 *
 * Runs one domain (flight, hotel or car) through validate → search →
 * select → book. Every failure ends the domain in a terminal state with an
 * error string; nothing is thrown to the orchestrator for expected
 * failures, so one domain can never stop the others.
 */

import type { IntentExtraction, TripEntities } from '../intents/types.js';
import type { ResolvedEndpoint } from '../registry/types.js';
import { errorMessage, type ErrorCode } from '../utils/errors.js';
import type { AppLogger } from '../utils/observability/index.js';
import { callCapability } from './remote-call.js';
import { BookingResponseSchema, describeIssues } from './schemas.js';
import type {
  DomainOutcome,
  DomainWorkflowConfig,
  Participant,
  SearchOption,
  TerminalDomainState,
} from './types.js';

/** The part of the resolver a workflow needs */
export interface EndpointResolver {
  resolve(capabilityId: string): Promise<ResolvedEndpoint | null>;
}

export interface DomainWorkflowDeps {
  resolver: EndpointResolver;
  remoteCallTimeoutMs: number;
  logger: AppLogger;
}

const FAILURE_CODES: Partial<Record<TerminalDomainState, ErrorCode>> = {
  ValidationFailed: 'VALIDATION_FAILED',
  CapabilityNotFound: 'CAPABILITY_NOT_FOUND',
  SearchFailed: 'REMOTE_CALL_FAILED',
  BookFailed: 'REMOTE_CALL_FAILED',
};

type SearchParse =
  | { ok: true; options: SearchOption[] }
  | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEmptySlot(value: TripEntities[keyof TripEntities]): boolean {
  return value === null || value === undefined || value === '';
}

/**
 * Required slots that are absent or empty, in declaration order.
 */
export function findMissingEntities(domain: DomainWorkflowConfig, entities: TripEntities): string[] {
  return domain.requiredEntities.filter((name) => isEmptySlot(entities[name]));
}

/**
 * Validate a search response and lift the item id out of each option.
 */
export function parseSearchResponse(domain: DomainWorkflowConfig, body: unknown): SearchParse {
  const field = domain.resultListField;
  const list: unknown = isRecord(body) ? body[field] : undefined;
  if (!Array.isArray(list)) {
    return { ok: false, reason: `missing '${field}' key` };
  }

  const options: SearchOption[] = [];
  for (const [index, item] of list.entries()) {
    const parsed = domain.optionSchema.safeParse(item);
    if (!parsed.success) {
      return { ok: false, reason: `${field}[${index}] ${describeIssues(parsed.error)}` };
    }
    const itemId = parsed.data[domain.itemIdField];
    if (typeof itemId !== 'string') {
      return { ok: false, reason: `${field}[${index}] has no '${domain.itemIdField}'` };
    }
    options.push({ itemId, raw: parsed.data });
  }
  return { ok: true, options };
}

/**
 * One synthetic participant per declared party member, at least one.
 */
export function buildParticipants(domain: DomainWorkflowConfig, entities: TripEntities): Participant[] {
  const declared = domain.partySizeEntity ? entities[domain.partySizeEntity] : null;
  const count = typeof declared === 'number' && declared >= 1 ? Math.floor(declared) : 1;
  return Array.from({ length: count }, (_, index) => domain.createParticipant(index));
}

function capabilityNotFound(capabilityId: string): string {
  return `Could not find a service for '${capabilityId}' capability.`;
}

export async function runDomainWorkflow(
  domain: DomainWorkflowConfig,
  extraction: IntentExtraction,
  deps: DomainWorkflowDeps
): Promise<DomainOutcome> {
  const log = deps.logger.child({ domain: `fulfillment.${domain.domain}` });
  const { intents, entities } = extraction;

  let selection: SearchOption | null = null;
  const finish = (state: TerminalDomainState, error: string | null = null, bookingId: string | null = null): DomainOutcome => {
    const outcome: DomainOutcome = { domain: domain.domain, state, selection, bookingId, error };
    if (state !== 'NotRequested') {
      const level = error && state !== 'NoResults' ? 'warn' : 'info';
      log[level]('domain_workflow_finished', {
        state,
        code: error ? (FAILURE_CODES[state] ?? null) : null,
        error,
        bookingId,
        itemId: selection?.itemId ?? null,
      });
    }
    return outcome;
  };

  if (!intents.has(domain.searchIntent)) {
    return finish('NotRequested');
  }

  // ValidatingInputs
  const missing = findMissingEntities(domain, entities);
  if (missing.length > 0) {
    return finish('ValidationFailed', `Missing required ${domain.detailsNoun} details: ${missing.join(', ')}.`);
  }

  // Searching
  const searchEndpoint = await deps.resolver.resolve(domain.searchCapability);
  if (!searchEndpoint) {
    return finish('CapabilityNotFound', capabilityNotFound(domain.searchCapability));
  }

  let searchBody: unknown;
  try {
    searchBody = await callCapability(searchEndpoint, domain.buildSearchPayload(entities), {
      timeoutMs: deps.remoteCallTimeoutMs,
      logger: log,
    });
  } catch (error) {
    return finish('SearchFailed', `${domain.searchLabel} failed: ${errorMessage(error)}`);
  }

  const search = parseSearchResponse(domain, searchBody);
  if (!search.ok) {
    return finish('SearchFailed', `${domain.searchLabel} response was invalid (${search.reason}).`);
  }
  if (search.options.length === 0) {
    return finish('NoResults', `${domain.searchLabel} returned no available ${domain.resultListField}.`);
  }

  selection = search.options[0];
  log.info('domain_option_selected', { itemId: selection.itemId, resultCount: search.options.length });

  if (!intents.has(domain.bookIntent)) {
    return finish('ResultsFound');
  }

  // Booking
  const bookEndpoint = await deps.resolver.resolve(domain.bookCapability);
  if (!bookEndpoint) {
    return finish('CapabilityNotFound', capabilityNotFound(domain.bookCapability));
  }

  const participants = buildParticipants(domain, entities);
  let bookingBody: unknown;
  try {
    bookingBody = await callCapability(bookEndpoint, domain.buildBookingPayload(selection.itemId, participants), {
      timeoutMs: deps.remoteCallTimeoutMs,
      logger: log,
    });
  } catch (error) {
    return finish('BookFailed', `${domain.bookingLabel} failed: ${errorMessage(error)}`);
  }

  const booking = BookingResponseSchema.safeParse(bookingBody);
  if (!booking.success) {
    return finish('BookFailed', `${domain.bookingLabel} response was invalid (${describeIssues(booking.error)}).`);
  }
  if (booking.data.status !== 'Confirmed' || !booking.data.bookingId) {
    log.warn('booking_not_confirmed', {
      code: 'BOOKING_REJECTED' satisfies ErrorCode,
      itemId: selection.itemId,
      status: booking.data.status,
      message: booking.data.message ?? null,
    });
    return finish('BookFailed', `${domain.bookingLabel} status: ${booking.data.status}`);
  }

  return finish('Booked', null, booking.data.bookingId);
}
