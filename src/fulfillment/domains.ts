/**
 * Flight, hotel and car workflow parameters.
 */

import { randomUUID } from 'node:crypto';

import { CarOptionSchema, FlightOptionSchema, HotelOptionSchema } from './schemas.js';
import type { DomainWorkflowConfig } from './types.js';

export const FLIGHT_DOMAIN: DomainWorkflowConfig = {
  domain: 'flight',
  bookedName: 'Flight',
  detailsNoun: 'flight',
  searchLabel: 'Flight search',
  bookingLabel: 'Flight booking',
  searchIntent: 'searchFlights',
  bookIntent: 'bookFlight',
  searchCapability: 'searchFlights',
  bookCapability: 'bookFlight',
  requiredEntities: ['origin', 'destination', 'departureDate', 'passengers'],
  buildSearchPayload: (entities) => ({
    origin: entities.origin,
    destination: entities.destination,
    departureDate: entities.departureDate,
    returnDate: entities.returnDate,
    passengers: entities.passengers,
  }),
  resultListField: 'flights',
  itemIdField: 'flightId',
  optionSchema: FlightOptionSchema,
  partySizeEntity: 'passengers',
  createParticipant: (index) => ({ name: `Traveller ${index + 1}`, id: randomUUID() }),
  buildBookingPayload: (flightId, passengerDetails) => ({ flightId, passengerDetails }),
};

export const HOTEL_DOMAIN: DomainWorkflowConfig = {
  domain: 'hotel',
  bookedName: 'Hotel',
  detailsNoun: 'hotel',
  searchLabel: 'Hotel search',
  bookingLabel: 'Hotel booking',
  searchIntent: 'searchHotels',
  bookIntent: 'bookHotel',
  searchCapability: 'searchHotels',
  bookCapability: 'bookHotel',
  requiredEntities: ['location', 'checkInDate', 'checkOutDate', 'guests'],
  buildSearchPayload: (entities) => ({
    // A landmark preference replaces the city when present
    location: entities.hotelLocationPreference ?? entities.location,
    checkInDate: entities.checkInDate,
    checkOutDate: entities.checkOutDate,
    guests: entities.guests,
  }),
  resultListField: 'hotels',
  itemIdField: 'hotelId',
  optionSchema: HotelOptionSchema,
  partySizeEntity: 'guests',
  createParticipant: (index) => ({ name: `Guest ${index + 1}`, id: randomUUID() }),
  buildBookingPayload: (hotelId, guestDetails) => ({ hotelId, guestDetails, roomType: 'Standard' }),
};

export const CAR_DOMAIN: DomainWorkflowConfig = {
  domain: 'car',
  bookedName: 'Car Rental',
  detailsNoun: 'car rental',
  searchLabel: 'Car search',
  bookingLabel: 'Car rental booking',
  searchIntent: 'searchCars',
  bookIntent: 'bookCar',
  searchCapability: 'searchCars',
  bookCapability: 'bookCar',
  requiredEntities: ['location', 'pickupDate', 'dropoffDate'],
  buildSearchPayload: (entities) => ({
    location: entities.location,
    pickupDate: entities.pickupDate,
    dropoffDate: entities.dropoffDate,
    carType: entities.carType,
  }),
  resultListField: 'cars',
  itemIdField: 'carId',
  optionSchema: CarOptionSchema,
  createParticipant: () => ({ name: 'Primary Driver', id: randomUUID() }),
  buildBookingPayload: (carId, [driverDetails]) => ({ carId, driverDetails }),
};

/** Execution order within one request */
export const DOMAIN_ORDER: readonly DomainWorkflowConfig[] = [FLIGHT_DOMAIN, HOTEL_DOMAIN, CAR_DOMAIN];
