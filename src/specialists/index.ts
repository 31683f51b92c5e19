/**
 * Mock specialist services: one app per domain, each serving its own
 * agent card plus its search and book operations.
 */

import type { Express, Router } from 'express';

import { createJsonApp } from '../app.js';
import type { CapabilityDescriptor } from '../registry/index.js';
import { createAgentCardRouter } from '../routes/agent-card.js';
import { createCarDescriptor, createCarRouter } from './car.js';
import { createFlightDescriptor, createFlightRouter } from './flight.js';
import { createHotelDescriptor, createHotelRouter } from './hotel.js';
import type { SpecialistOptions } from './shared.js';

export type SpecialistKind = 'flight' | 'hotel' | 'car';

interface SpecialistDefinition {
  createDescriptor(baseAddress: string): CapabilityDescriptor;
  createRouter(options: SpecialistOptions): Router;
}

export const SPECIALISTS: Record<SpecialistKind, SpecialistDefinition> = {
  flight: { createDescriptor: createFlightDescriptor, createRouter: createFlightRouter },
  hotel: { createDescriptor: createHotelDescriptor, createRouter: createHotelRouter },
  car: { createDescriptor: createCarDescriptor, createRouter: createCarRouter },
};

export function createSpecialistApp(
  kind: SpecialistKind,
  baseAddress: string,
  options: SpecialistOptions = {}
): Express {
  const definition = SPECIALISTS[kind];
  return createJsonApp(
    createAgentCardRouter(definition.createDescriptor(baseAddress)),
    definition.createRouter(options)
  );
}

export { createCarDescriptor, createCarRouter, generateCars, matchCarType } from './car.js';
export { createFlightDescriptor, createFlightRouter, generateFlights } from './flight.js';
export { createHotelDescriptor, createHotelRouter, generateHotels } from './hotel.js';
export type { RandomSource, SpecialistOptions } from './shared.js';
