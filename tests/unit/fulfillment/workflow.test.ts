import { beforeEach, describe, expect, it } from 'vitest';
import {
  CAR_DOMAIN,
  FLIGHT_DOMAIN,
  HOTEL_DOMAIN,
  runDomainWorkflow,
  type EndpointResolver,
} from '../../../src/fulfillment/index.js';
import { toExtraction } from '../../../src/intents/index.js';
import type { ResolvedEndpoint } from '../../../src/registry/index.js';
import { createLogger } from '../../../src/utils/observability/index.js';
import { FakeNetwork } from '../../helpers/fake-network.js';

const SVC = 'http://svc.test';

const FLIGHT_ENTITIES = { origin: 'Singapore', destination: 'Tokyo', departureDate: '2026-10-26', passengers: 2 };
const HOTEL_ENTITIES = {
  location: 'Paris',
  hotelLocationPreference: 'Near Louvre',
  checkInDate: '2026-11-03',
  checkOutDate: '2026-11-06',
};
const CAR_ENTITIES = { location: 'Rome', pickupDate: '2026-10-20T12:00:00Z', dropoffDate: '2026-10-24T12:00:00Z' };

class StubResolver implements EndpointResolver {
  readonly lookups: string[] = [];

  constructor(private readonly paths: Record<string, string>) {}

  async resolve(capabilityId: string): Promise<ResolvedEndpoint | null> {
    this.lookups.push(capabilityId);
    const invocationPath = this.paths[capabilityId];
    return invocationPath ? { serviceId: 'svc', baseAddress: SVC, invocationPath } : null;
  }
}

const ALL_PATHS = {
  searchFlights: '/searchFlights',
  bookFlight: '/bookFlight',
  searchHotels: '/searchHotels',
  bookHotel: '/bookHotel',
  searchCars: '/searchCars',
  bookCar: '/bookCar',
};

describe('runDomainWorkflow', () => {
  let network: FakeNetwork;
  let resolver: StubResolver;

  beforeEach(() => {
    network = new FakeNetwork().install();
    resolver = new StubResolver(ALL_PATHS);
  });

  function deps() {
    return { resolver, remoteCallTimeoutMs: 1000, logger: createLogger({ domain: 'test' }) };
  }

  it('does nothing when the search intent is absent', async () => {
    const outcome = await runDomainWorkflow(FLIGHT_DOMAIN, toExtraction(['searchHotels'], FLIGHT_ENTITIES), deps());

    expect(outcome).toEqual({ domain: 'flight', state: 'NotRequested', selection: null, bookingId: null, error: null });
    expect(resolver.lookups).toEqual([]);
  });

  it('names missing slots and makes no call', async () => {
    const outcome = await runDomainWorkflow(
      FLIGHT_DOMAIN,
      toExtraction(['searchFlights', 'bookFlight'], { destination: 'Tokyo' }),
      deps()
    );

    expect(outcome.state).toBe('ValidationFailed');
    expect(outcome.error).toBe('Missing required flight details: origin, departureDate.');
    expect(resolver.lookups).toEqual([]);
    expect(network.calls).toEqual([]);
  });

  it('reports a search capability nobody serves', async () => {
    resolver = new StubResolver({});

    const outcome = await runDomainWorkflow(HOTEL_DOMAIN, toExtraction(['searchHotels'], HOTEL_ENTITIES), deps());

    expect(outcome.state).toBe('CapabilityNotFound');
    expect(outcome.error).toBe("Could not find a service for 'searchHotels' capability.");
    expect(network.calls).toEqual([]);
  });

  it('stops silently after a search-only request', async () => {
    network.on('POST', `${SVC}/searchHotels`, { json: { hotels: [{ hotelId: 'HT-1', name: 'Test Inn' }, { hotelId: 'HT-2' }] } });

    const outcome = await runDomainWorkflow(HOTEL_DOMAIN, toExtraction(['searchHotels'], HOTEL_ENTITIES), deps());

    expect(outcome).toEqual({
      domain: 'hotel',
      state: 'ResultsFound',
      selection: { itemId: 'HT-1', raw: { hotelId: 'HT-1', name: 'Test Inn' } },
      bookingId: null,
      error: null,
    });
    expect(network.calls).toEqual([
      {
        method: 'POST',
        url: `${SVC}/searchHotels`,
        body: { location: 'Near Louvre', checkInDate: '2026-11-03', checkOutDate: '2026-11-06', guests: 1 },
      },
    ]);
  });

  it('records an empty result list as no results', async () => {
    network.on('POST', `${SVC}/searchFlights`, { json: { flights: [] } });

    const outcome = await runDomainWorkflow(
      FLIGHT_DOMAIN,
      toExtraction(['searchFlights', 'bookFlight'], FLIGHT_ENTITIES),
      deps()
    );

    expect(outcome.state).toBe('NoResults');
    expect(outcome.error).toBe('Flight search returned no available flights.');
    expect(network.postedUrls()).toEqual([`${SVC}/searchFlights`]);
  });

  it('flags a response without the result list', async () => {
    network.on('POST', `${SVC}/searchFlights`, { json: { results: [] } });

    const outcome = await runDomainWorkflow(FLIGHT_DOMAIN, toExtraction(['searchFlights'], FLIGHT_ENTITIES), deps());

    expect(outcome.state).toBe('SearchFailed');
    expect(outcome.error).toBe("Flight search response was invalid (missing 'flights' key).");
  });

  it('flags results without an item id', async () => {
    network.on('POST', `${SVC}/searchCars`, { json: { cars: [{ carType: 'SUV' }] } });

    const outcome = await runDomainWorkflow(CAR_DOMAIN, toExtraction(['searchCars'], CAR_ENTITIES), deps());

    expect(outcome.state).toBe('SearchFailed');
    expect(outcome.error).toBe('Car search response was invalid (cars[0] carId: Required).');
  });

  it('keeps options whose other fields are loosely typed', async () => {
    network
      .on('POST', `${SVC}/searchFlights`, { json: { flights: [{ flightId: 'A1', price: '199.00', airline: null }] } })
      .on('POST', `${SVC}/bookFlight`, { json: { bookingId: 'FLT-2', status: 'Confirmed' } });

    const outcome = await runDomainWorkflow(
      FLIGHT_DOMAIN,
      toExtraction(['searchFlights', 'bookFlight'], FLIGHT_ENTITIES),
      deps()
    );

    expect(outcome.state).toBe('Booked');
    expect(outcome.selection).toEqual({ itemId: 'A1', raw: { flightId: 'A1', price: '199.00', airline: null } });
    expect(outcome.bookingId).toBe('FLT-2');
  });

  it('attaches the cause of a failed search', async () => {
    network.on('POST', `${SVC}/searchFlights`, { status: 500, json: { error: 'upstream down' } });

    const outcome = await runDomainWorkflow(FLIGHT_DOMAIN, toExtraction(['searchFlights'], FLIGHT_ENTITIES), deps());

    expect(outcome.state).toBe('SearchFailed');
    expect(outcome.error).toBe('Flight search failed: http://svc.test/searchFlights answered HTTP 500: upstream down');
  });

  it('books the first flight with one traveller per passenger', async () => {
    network
      .on('POST', `${SVC}/searchFlights`, { json: { flights: [{ flightId: 'FL-1' }, { flightId: 'FL-2' }] } })
      .on('POST', `${SVC}/bookFlight`, { json: { bookingId: 'FLT-9', status: 'Confirmed', message: 'ok' } });

    const outcome = await runDomainWorkflow(
      FLIGHT_DOMAIN,
      toExtraction(['searchFlights', 'bookFlight'], FLIGHT_ENTITIES),
      deps()
    );

    expect(outcome.state).toBe('Booked');
    expect(outcome.bookingId).toBe('FLT-9');
    expect(outcome.error).toBeNull();
    expect(network.callsTo(`${SVC}/bookFlight`)[0].body).toEqual({
      flightId: 'FL-1',
      passengerDetails: [
        { name: 'Traveller 1', id: expect.any(String) },
        { name: 'Traveller 2', id: expect.any(String) },
      ],
    });
  });

  it('sends a single driver and a standard room', async () => {
    network
      .on('POST', `${SVC}/searchCars`, { json: { cars: [{ carId: 'CR-1' }] } })
      .on('POST', `${SVC}/bookCar`, { json: { bookingId: 'CAR-1', status: 'Confirmed' } })
      .on('POST', `${SVC}/searchHotels`, { json: { hotels: [{ hotelId: 'HT-1' }] } })
      .on('POST', `${SVC}/bookHotel`, { json: { bookingId: 'HOT-1', status: 'Confirmed' } });

    await runDomainWorkflow(CAR_DOMAIN, toExtraction(['searchCars', 'bookCar'], CAR_ENTITIES), deps());
    await runDomainWorkflow(
      HOTEL_DOMAIN,
      toExtraction(['searchHotels', 'bookHotel'], { ...HOTEL_ENTITIES, guests: 2 }),
      deps()
    );

    expect(network.callsTo(`${SVC}/bookCar`)[0].body).toEqual({
      carId: 'CR-1',
      driverDetails: { name: 'Primary Driver', id: expect.any(String) },
    });
    expect(network.callsTo(`${SVC}/bookHotel`)[0].body).toEqual({
      hotelId: 'HT-1',
      guestDetails: [
        { name: 'Guest 1', id: expect.any(String) },
        { name: 'Guest 2', id: expect.any(String) },
      ],
      roomType: 'Standard',
    });
  });

  it('records a non-confirmed booking status', async () => {
    network
      .on('POST', `${SVC}/searchHotels`, { json: { hotels: [{ hotelId: 'HT-1' }] } })
      .on('POST', `${SVC}/bookHotel`, { json: { bookingId: 'HOT-1', status: 'Pending', message: 'awaiting hotel' } });

    const outcome = await runDomainWorkflow(
      HOTEL_DOMAIN,
      toExtraction(['searchHotels', 'bookHotel'], HOTEL_ENTITIES),
      deps()
    );

    expect(outcome.state).toBe('BookFailed');
    expect(outcome.bookingId).toBeNull();
    expect(outcome.error).toBe('Hotel booking status: Pending');
    expect(outcome.selection?.itemId).toBe('HT-1');
  });

  it('rejects a confirmation without a booking id', async () => {
    network
      .on('POST', `${SVC}/searchCars`, { json: { cars: [{ carId: 'CR-1' }] } })
      .on('POST', `${SVC}/bookCar`, { json: { status: 'Confirmed' } });

    const outcome = await runDomainWorkflow(CAR_DOMAIN, toExtraction(['searchCars', 'bookCar'], CAR_ENTITIES), deps());

    expect(outcome.state).toBe('BookFailed');
    expect(outcome.error).toBe('Car rental booking response was invalid (bookingId: confirmed booking has no bookingId).');
  });

  it('reports an unreachable booking service', async () => {
    network.on('POST', `${SVC}/searchHotels`, { json: { hotels: [{ hotelId: 'HT-1' }] } });

    const outcome = await runDomainWorkflow(
      HOTEL_DOMAIN,
      toExtraction(['searchHotels', 'bookHotel'], HOTEL_ENTITIES),
      deps()
    );

    expect(outcome.state).toBe('BookFailed');
    expect(outcome.error).toBe(
      'Hotel booking failed: failed to reach http://svc.test/bookHotel: fetch failed (ECONNREFUSED)'
    );
  });

  it('reports a booking capability nobody serves', async () => {
    resolver = new StubResolver({ searchCars: '/searchCars' });
    network.on('POST', `${SVC}/searchCars`, { json: { cars: [{ carId: 'CR-1' }] } });

    const outcome = await runDomainWorkflow(CAR_DOMAIN, toExtraction(['searchCars', 'bookCar'], CAR_ENTITIES), deps());

    expect(outcome.state).toBe('CapabilityNotFound');
    expect(outcome.error).toBe("Could not find a service for 'bookCar' capability.");
    expect(resolver.lookups).toEqual(['searchCars', 'bookCar']);
  });
});
