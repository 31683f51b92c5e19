/**
 * Fulfillment Type Definitions
 *
 * One request fans out into up to three domain workflows (flight, hotel,
 * car). Each runs search-then-book on its own and reports a terminal
 * outcome; the outcomes are merged into a single FulfillmentResult.
 */

import type { z } from 'zod';
import type { EntityName, TripEntities, TripIntent } from '../intents/types.js';

// ============================================================================
// Domain Workflow Types
// ============================================================================

export type DomainName = 'flight' | 'hotel' | 'car';

/**
 * Per-domain workflow state.
 * State machine:
 *   NotRequested → ValidatingInputs → Searching → SearchFailed | NoResults | ResultsFound
 *   ResultsFound → Booking → BookFailed | Booked   (only with the book intent)
 * ValidatingInputs may end in ValidationFailed; Searching and Booking may
 * end in CapabilityNotFound.
 */
export type DomainState =
  | 'NotRequested'
  | 'ValidatingInputs'
  | 'Searching'
  | 'Booking'
  | 'ValidationFailed'
  | 'CapabilityNotFound'
  | 'SearchFailed'
  | 'NoResults'
  | 'ResultsFound'
  | 'BookFailed'
  | 'Booked';

export type TerminalDomainState = Exclude<DomainState, 'ValidatingInputs' | 'Searching' | 'Booking'>;

/** A search result as returned by the specialist, with its item id lifted out */
export interface SearchOption {
  itemId: string;
  raw: Record<string, unknown>;
}

/** A synthetic traveller, guest or driver record sent with a booking */
export type Participant = Record<string, string>;

/**
 * Outcome of one domain workflow.
 */
export interface DomainOutcome {
  domain: DomainName;
  state: TerminalDomainState;

  /** First search result, when the search found any */
  selection: SearchOption | null;

  /** Set only in the Booked state */
  bookingId: string | null;

  /** Set for every failure state, and for NoResults */
  error: string | null;
}

/**
 * Everything that differs between the flight, hotel and car workflows.
 */
export interface DomainWorkflowConfig {
  domain: DomainName;

  /** Name used when listing successful bookings, e.g. "Car Rental" */
  bookedName: string;

  /** Noun used in validation errors, e.g. "car rental" */
  detailsNoun: string;

  /** Error prefixes, e.g. "Car search" / "Car rental booking" */
  searchLabel: string;
  bookingLabel: string;

  searchIntent: TripIntent;
  bookIntent: TripIntent;
  searchCapability: string;
  bookCapability: string;

  /** Entity slots that must be non-empty before searching */
  requiredEntities: readonly EntityName[];

  /** Search body; null values are stripped before sending */
  buildSearchPayload(entities: TripEntities): Record<string, unknown>;

  /** Response field holding the result list, e.g. "flights" */
  resultListField: string;

  /** Field of each result identifying it, e.g. "flightId" */
  itemIdField: string;

  /** Schema every result must satisfy */
  optionSchema: z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

  /** Slot holding the number of participants; undefined means always one */
  partySizeEntity?: 'passengers' | 'guests';

  createParticipant(index: number): Participant;
  buildBookingPayload(itemId: string, participants: Participant[]): Record<string, unknown>;
}

// ============================================================================
// Aggregated Result Types
// ============================================================================

export type FulfillmentStatus = 'Success' | 'PartialSuccess' | 'Failed';

export interface FulfillmentDetails {
  flightBookingId: string | null;
  hotelBookingId: string | null;
  carRentalBookingId: string | null;

  /** Errors across all domains, in flight, hotel, car order */
  errors: string[];

  /** Option chosen per domain, including search-only domains */
  selections: Partial<Record<DomainName, Record<string, unknown>>>;
}

export interface FulfillmentResult {
  status: FulfillmentStatus;
  summary: string;
  details: FulfillmentDetails;
}
