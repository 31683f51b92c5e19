/**
 * @fileoverview Mock hotel specialist.
 *
 * POST /searchHotels - 1 to 4 generated hotels near the requested location
 * POST /bookHotel    - confirms any hotel id with a HOT- booking id
 */

import { Router, type Request, type Response } from 'express';

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

const HOTEL_NAMES = [
  'Grand Plaza',
  'Marina Bay View',
  'Orchard Retreat',
  'Sentosa Getaway',
  'City Center Inn',
  'Riverside Hotel',
] as const;
const AREAS = ['Downtown', 'Waterfront', 'Old Town', 'Business District', 'Riverside', 'Arts Quarter'] as const;
const SEARCH_FIELDS = ['location', 'checkInDate', 'checkOutDate'];
const BOOKING_FIELDS = ['hotelId', 'guestDetails'];

export interface HotelOption {
  hotelId: string;
  name: string;
  location: string;
  area: string;
  rating: number;
  pricePerNight: number;
  currency: string;
}

export interface HotelSearchCriteria {
  location: string;
  guests: number;
}

export function createHotelDescriptor(baseAddress: string): CapabilityDescriptor {
  return {
    serviceId: 'hotel-booker-003',
    displayName: 'CozyStays Hotel Reservations',
    description: 'Searches for and books hotel rooms.',
    baseAddress,
    operations: [
      {
        capabilityId: 'searchHotels',
        invocationPath: '/searchHotels',
        description: 'Finds available hotels based on criteria.',
      },
      {
        capabilityId: 'bookHotel',
        invocationPath: '/bookHotel',
        description: 'Books a specific hotel room identified by hotelId.',
      },
    ],
  };
}

/** Each extra guest adds 20% to the nightly price. */
export function generateHotels(criteria: HotelSearchCriteria, random: RandomSource): HotelOption[] {
  const guestFactor = 1 + (criteria.guests - 1) * 0.2;

  return Array.from({ length: randomInt(random, 1, 4) }, () => ({
    hotelId: `HTL-${randomInt(random, 1000, 9999)}`,
    name: pick(random, HOTEL_NAMES),
    location: criteria.location,
    area: pick(random, AREAS),
    rating: Math.round((3.5 + random() * 1.5) * 10) / 10,
    pricePerNight: roundMoney(randomAmount(random, 120, 600) * guestFactor),
    currency: 'SGD',
  }));
}

export function createHotelRouter(options: SpecialistOptions = {}): Router {
  const router = Router();
  const { random, newId } = resolveOptions(options);
  const log = options.logger ?? createLogger({ domain: 'specialist.hotel' });

  router.post('/searchHotels', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json(INVALID_PAYLOAD_ERROR);
      return;
    }

    if (missingFields(body, SEARCH_FIELDS).length > 0) {
      res.status(400).json(missingParametersError(SEARCH_FIELDS));
      return;
    }

    // Guests are optional here; anything unusable counts as one
    const guests = parsePartySize(body.guests, 1) ?? 1;
    const hotels = generateHotels({ location: String(body.location), guests }, random);
    log.info('hotel_search', { location: body.location, guests, resultCount: hotels.length });
    res.json({ hotels });
  });

  router.post('/bookHotel', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json(INVALID_PAYLOAD_ERROR);
      return;
    }

    if (missingFields(body, BOOKING_FIELDS).length > 0) {
      res.status(400).json(missingParametersError(BOOKING_FIELDS));
      return;
    }

    const roomType = typeof body.roomType === 'string' && body.roomType ? body.roomType : 'Standard';
    const confirmation: BookingConfirmation = {
      bookingId: `HOT-${newId()}`,
      status: 'Confirmed',
      message: `Hotel ${String(body.hotelId)} (${roomType} room) booked successfully.`,
    };
    log.info('hotel_booked', { hotelId: body.hotelId, roomType, bookingId: confirmation.bookingId });
    res.json(confirmation);
  });

  return router;
}
