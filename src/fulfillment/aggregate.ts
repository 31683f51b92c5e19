/**
 * Merge per-domain outcomes into one FulfillmentResult.
 */

import type { TripIntent } from '../intents/types.js';
import { DOMAIN_ORDER } from './domains.js';
import type { DomainName, DomainOutcome, FulfillmentDetails, FulfillmentResult } from './types.js';

export const NOT_UNDERSTOOD_SUMMARY = 'Could not understand the request or identify any services to book.';
export const NOTHING_BOOKED_SUMMARY =
  'Could not fulfill the request. No services found matching criteria or no booking attempted.';

function bookedName(domain: DomainName): string {
  return DOMAIN_ORDER.find((config) => config.domain === domain)?.bookedName ?? domain;
}

export function emptyDetails(errors: string[] = []): FulfillmentDetails {
  return {
    flightBookingId: null,
    hotelBookingId: null,
    carRentalBookingId: null,
    errors,
    selections: {},
  };
}

/**
 * A Failed result carrying only a summary and errors.
 */
export function createFailedResult(summary: string, errors: string[] = []): FulfillmentResult {
  return { status: 'Failed', summary, details: emptyDetails(errors) };
}

/**
 * Status rules:
 * - Success: at least one booking, no errors
 * - PartialSuccess: at least one booking, some errors
 * - Failed: no booking
 */
export function aggregateOutcomes(
  outcomes: readonly DomainOutcome[],
  intents: ReadonlySet<TripIntent>
): FulfillmentResult {
  const details = emptyDetails();
  const booked: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.error) {
      details.errors.push(outcome.error);
    }
    if (outcome.selection) {
      details.selections[outcome.domain] = outcome.selection.raw;
    }
    if (!outcome.bookingId) continue;

    booked.push(bookedName(outcome.domain));
    switch (outcome.domain) {
      case 'flight':
        details.flightBookingId = outcome.bookingId;
        break;
      case 'hotel':
        details.hotelBookingId = outcome.bookingId;
        break;
      case 'car':
        details.carRentalBookingId = outcome.bookingId;
        break;
    }
  }

  const errorCount = details.errors.length;
  const errorList = details.errors.join('; ');

  if (booked.length > 0 && errorCount === 0) {
    return { status: 'Success', summary: `Successfully booked: ${booked.join(', ')}.`, details };
  }
  if (booked.length > 0) {
    return {
      status: 'PartialSuccess',
      summary: `Booked: ${booked.join(', ')}. Encountered errors: ${errorCount}: ${errorList}`,
      details,
    };
  }
  if (errorCount > 0) {
    return { status: 'Failed', summary: `Planning failed. Errors: ${errorCount}: ${errorList}`, details };
  }
  return {
    status: 'Failed',
    summary: intents.size === 0 ? NOT_UNDERSTOOD_SUMMARY : NOTHING_BOOKED_SUMMARY,
    details,
  };
}
