import { describe, expect, it } from 'vitest';
import {
  aggregateOutcomes,
  createFailedResult,
  NOT_UNDERSTOOD_SUMMARY,
  NOTHING_BOOKED_SUMMARY,
  type DomainOutcome,
} from '../../../src/fulfillment/index.js';
import type { TripIntent } from '../../../src/intents/index.js';

function outcome(partial: Partial<DomainOutcome> & Pick<DomainOutcome, 'domain' | 'state'>): DomainOutcome {
  return { selection: null, bookingId: null, error: null, ...partial };
}

const ALL_INTENTS = new Set<TripIntent>(['searchFlights', 'bookFlight', 'searchHotels', 'bookHotel', 'searchCars', 'bookCar']);

describe('aggregateOutcomes', () => {
  it('succeeds when every requested booking was confirmed', () => {
    const result = aggregateOutcomes(
      [
        outcome({ domain: 'flight', state: 'Booked', bookingId: 'FLT-1' }),
        outcome({ domain: 'hotel', state: 'Booked', bookingId: 'HOT-1' }),
        outcome({ domain: 'car', state: 'Booked', bookingId: 'CAR-1' }),
      ],
      ALL_INTENTS
    );

    expect(result).toEqual({
      status: 'Success',
      summary: 'Successfully booked: Flight, Hotel, Car Rental.',
      details: {
        flightBookingId: 'FLT-1',
        hotelBookingId: 'HOT-1',
        carRentalBookingId: 'CAR-1',
        errors: [],
        selections: {},
      },
    });
  });

  it('is a partial success when some domains failed', () => {
    const result = aggregateOutcomes(
      [
        outcome({ domain: 'flight', state: 'Booked', bookingId: 'FLT-1' }),
        outcome({ domain: 'hotel', state: 'NoResults', error: 'Hotel search returned no available hotels.' }),
        outcome({ domain: 'car', state: 'BookFailed', error: 'Car rental booking status: Pending' }),
      ],
      ALL_INTENTS
    );

    expect(result.status).toBe('PartialSuccess');
    expect(result.summary).toBe(
      'Booked: Flight. Encountered errors: 2: Hotel search returned no available hotels.; Car rental booking status: Pending'
    );
    expect(result.details.errors).toEqual([
      'Hotel search returned no available hotels.',
      'Car rental booking status: Pending',
    ]);
    expect(result.details.hotelBookingId).toBeNull();
  });

  it('fails with the error list when nothing was booked', () => {
    const result = aggregateOutcomes(
      [
        outcome({ domain: 'flight', state: 'ValidationFailed', error: 'Missing required flight details: origin.' }),
        outcome({ domain: 'hotel', state: 'NotRequested' }),
        outcome({ domain: 'car', state: 'CapabilityNotFound', error: "Could not find a service for 'searchCars' capability." }),
      ],
      ALL_INTENTS
    );

    expect(result.status).toBe('Failed');
    expect(result.summary).toBe(
      "Planning failed. Errors: 2: Missing required flight details: origin.; Could not find a service for 'searchCars' capability."
    );
  });

  it('reports what was found for search-only requests', () => {
    const result = aggregateOutcomes(
      [
        outcome({ domain: 'flight', state: 'NotRequested' }),
        outcome({
          domain: 'hotel',
          state: 'ResultsFound',
          selection: { itemId: 'HT-1', raw: { hotelId: 'HT-1', name: 'Test Inn' } },
        }),
        outcome({ domain: 'car', state: 'NotRequested' }),
      ],
      new Set<TripIntent>(['searchHotels'])
    );

    expect(result.status).toBe('Failed');
    expect(result.summary).toBe(NOTHING_BOOKED_SUMMARY);
    expect(result.details.selections).toEqual({ hotel: { hotelId: 'HT-1', name: 'Test Inn' } });
  });

  it('says the request was not understood when there were no intents', () => {
    const result = aggregateOutcomes([], new Set());

    expect(result.status).toBe('Failed');
    expect(result.summary).toBe(NOT_UNDERSTOOD_SUMMARY);
  });
});

describe('createFailedResult', () => {
  it('builds a failed result with empty booking ids', () => {
    expect(createFailedResult('Nope', ['first'])).toEqual({
      status: 'Failed',
      summary: 'Nope',
      details: { flightBookingId: null, hotelBookingId: null, carRentalBookingId: null, errors: ['first'], selections: {} },
    });
  });
});
