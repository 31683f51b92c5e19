/**
 * @fileoverview Mock flight specialist.
 *
 * POST /searchFlights - 1 to 5 generated flights for the route and date
 * POST /bookFlight    - confirms any flight id with an FLT- booking id
 */

import { Router, type Request, type Response } from 'express';
import { DateTime } from 'luxon';

import type { CapabilityDescriptor } from '../registry/index.js';
import { createLogger } from '../utils/observability/index.js';
import {
  INVALID_PAYLOAD_ERROR,
  isRecord,
  missingFields,
  missingParametersError,
  parsePartySize,
  pick,
  randomAmount,
  randomInt,
  resolveOptions,
  roundMoney,
  type BookingConfirmation,
  type RandomSource,
  type SpecialistOptions,
} from './shared.js';

const AIRLINES = ['SG Air', 'Lion Fly', 'Asia Budget', 'Sky Connect'] as const;
const DEPARTURE_MINUTES = [0, 15, 30, 45] as const;
const SEARCH_FIELDS = ['origin', 'destination', 'departureDate', 'passengers'];
const BOOKING_FIELDS = ['flightId', 'passengerDetails'];

export interface FlightOption {
  flightId: string;
  airline: string;
  origin: string;
  destination: string;
  departureTime: string;
  arrivalTime: string;
  price: number;
  currency: string;
}

export interface FlightSearchCriteria {
  origin: string;
  destination: string;
  departureDate: string;
  passengers: number;
}

export function createFlightDescriptor(baseAddress: string): CapabilityDescriptor {
  return {
    serviceId: 'flight-booker-002',
    displayName: 'SkyHigh Flight Booker',
    description: 'Searches for and books airline tickets.',
    baseAddress,
    operations: [
      {
        capabilityId: 'searchFlights',
        invocationPath: '/searchFlights',
        description: 'Finds available flights based on criteria.',
      },
      {
        capabilityId: 'bookFlight',
        invocationPath: '/bookFlight',
        description: 'Books a specific flight identified by flightId.',
      },
    ],
  };
}

/**
 * Generate flight options. Unparseable dates fall back to today (UTC).
 * Prices scale with the number of passengers.
 */
export function generateFlights(criteria: FlightSearchCriteria, random: RandomSource): FlightOption[] {
  const parsed = DateTime.fromISO(criteria.departureDate, { zone: 'utc' });
  const day = (parsed.isValid ? parsed : DateTime.utc()).startOf('day');

  return Array.from({ length: randomInt(random, 1, 5) }, () => {
    const airline = pick(random, AIRLINES);
    const flightId = `${airline.replace(/\s+/g, '').slice(0, 3).toUpperCase()}-${randomInt(random, 100, 999)}`;
    const departure = day.set({ hour: randomInt(random, 6, 22), minute: pick(random, DEPARTURE_MINUTES) });
    const durationMinutes = Math.round((1.5 + random() * 10.5) * 60);
    const arrival = departure.plus({ minutes: durationMinutes });

    return {
      flightId,
      airline,
      origin: criteria.origin,
      destination: criteria.destination,
      departureTime: departure.toISO({ suppressMilliseconds: true }) ?? '',
      arrivalTime: arrival.toISO({ suppressMilliseconds: true }) ?? '',
      price: roundMoney(randomAmount(random, 150, 1200) * criteria.passengers),
      currency: 'SGD',
    };
  });
}

export function createFlightRouter(options: SpecialistOptions = {}): Router {
  const router = Router();
  const { random, newId } = resolveOptions(options);
  const log = options.logger ?? createLogger({ domain: 'specialist.flight' });

  router.post('/searchFlights', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json(INVALID_PAYLOAD_ERROR);
      return;
    }

    if (missingFields(body, SEARCH_FIELDS).length > 0) {
      res.status(400).json(missingParametersError(SEARCH_FIELDS));
      return;
    }

    const passengers = parsePartySize(body.passengers);
    if (passengers === null) {
      res.status(400).json({ error: 'Invalid value for passengers' });
      return;
    }

    const flights = generateFlights(
      {
        origin: String(body.origin),
        destination: String(body.destination),
        departureDate: String(body.departureDate),
        passengers,
      },
      random
    );
    log.info('flight_search', { origin: body.origin, destination: body.destination, resultCount: flights.length });
    res.json({ flights });
  });

  router.post('/bookFlight', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json(INVALID_PAYLOAD_ERROR);
      return;
    }

    if (missingFields(body, BOOKING_FIELDS).length > 0) {
      res.status(400).json(missingParametersError(BOOKING_FIELDS));
      return;
    }

    const confirmation: BookingConfirmation = {
      bookingId: `FLT-${newId()}`,
      status: 'Confirmed',
      message: `Flight ${String(body.flightId)} booked successfully.`,
    };
    log.info('flight_booked', { flightId: body.flightId, bookingId: confirmation.bookingId });
    res.json(confirmation);
  });

  return router;
}
