/**
 * @fileoverview Mock car rental specialist.
 *
 * POST /searchCars - 1 to 5 generated cars at the pickup location
 * POST /bookCar    - confirms any car id with a CAR- booking id
 */

import { Router, type Request, type Response } from 'express';

import type { CapabilityDescriptor } from '../registry/index.js';
import { createLogger } from '../utils/observability/index.js';
import {
  INVALID_PAYLOAD_ERROR,
  isRecord,
  missingFields,
  missingParametersError,
  pick,
  randomAmount,
  randomInt,
  resolveOptions,
  roundMoney,
  type BookingConfirmation,
  type RandomSource,
  type SpecialistOptions,
} from './shared.js';

const MAKES_AND_MODELS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['Toyota', ['Vios', 'Camry', 'Corolla', 'RAV4']],
  ['Honda', ['Civic', 'City', 'HR-V', 'CR-V']],
  ['BMW', ['3 Series', '5 Series', 'X1']],
  ['Mercedes-Benz', ['C-Class', 'E-Class', 'GLA']],
  ['Hyundai', ['Avante', 'Tucson']],
];
export const CAR_TYPES = ['Sedan', 'SUV', 'Compact', 'Luxury', 'Convertible'] as const;
const PRICE_FACTORS: Partial<Record<(typeof CAR_TYPES)[number], number>> = { Luxury: 1.5, SUV: 1.2, Convertible: 1.3 };
const SEARCH_FIELDS = ['location', 'pickupDate', 'dropoffDate'];
const BOOKING_FIELDS = ['carId', 'driverDetails'];

export interface CarOption {
  carId: string;
  make: string;
  model: string;
  carType: string;
  location: string;
  pricePerDay: number;
  currency: string;
}

export interface CarSearchCriteria {
  location: string;
  carType?: string;
}

export function createCarDescriptor(baseAddress: string): CapabilityDescriptor {
  return {
    serviceId: 'car-rental-004',
    displayName: 'RoadRunner Car Rentals',
    description: 'Searches for and books rental cars.',
    baseAddress,
    operations: [
      {
        capabilityId: 'searchCars',
        invocationPath: '/searchCars',
        description: 'Finds available rental cars.',
      },
      {
        capabilityId: 'bookCar',
        invocationPath: '/bookCar',
        description: 'Books a specific rental car identified by carId.',
      },
    ],
  };
}

/**
 * Known car type named in a free-form request, e.g. "a small suv" → SUV.
 */
export function matchCarType(requested: string | undefined): (typeof CAR_TYPES)[number] | undefined {
  if (!requested) return undefined;
  const lower = requested.toLowerCase();
  return CAR_TYPES.find((type) => lower.includes(type.toLowerCase()));
}

/**
 * Generate car options. When the request names a known type, every option
 * is of that type.
 */
export function generateCars(criteria: CarSearchCriteria, random: RandomSource): CarOption[] {
  const requestedType = matchCarType(criteria.carType);

  return Array.from({ length: randomInt(random, 1, 5) }, () => {
    const [make, models] = pick(random, MAKES_AND_MODELS);
    const model = pick(random, models);
    const carType = requestedType ?? pick(random, CAR_TYPES);
    const basePrice = randomAmount(random, 50, 250);

    return {
      carId: `CAR-${make.slice(0, 3).toUpperCase()}-${randomInt(random, 100, 999)}`,
      make,
      model,
      carType,
      location: criteria.location,
      pricePerDay: roundMoney(basePrice * (PRICE_FACTORS[carType] ?? 1)),
      currency: 'SGD',
    };
  });
}

export function createCarRouter(options: SpecialistOptions = {}): Router {
  const router = Router();
  const { random, newId } = resolveOptions(options);
  const log = options.logger ?? createLogger({ domain: 'specialist.car' });

  router.post('/searchCars', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json(INVALID_PAYLOAD_ERROR);
      return;
    }

    if (missingFields(body, SEARCH_FIELDS).length > 0) {
      res.status(400).json(missingParametersError(SEARCH_FIELDS));
      return;
    }

    const carType = typeof body.carType === 'string' ? body.carType : undefined;
    const cars = generateCars({ location: String(body.location), carType }, random);
    log.info('car_search', { location: body.location, carType, resultCount: cars.length });
    res.json({ cars });
  });

  router.post('/bookCar', (req: Request, res: Response) => {
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
      bookingId: `CAR-${newId()}`,
      status: 'Confirmed',
      message: `Car ${String(body.carId)} booked successfully.`,
    };
    log.info('car_booked', { carId: body.carId, bookingId: confirmation.bookingId });
    res.json(confirmation);
  });

  return router;
}
