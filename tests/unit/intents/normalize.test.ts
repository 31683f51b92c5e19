import { describe, expect, it } from 'vitest';
import {
  hasUsableContent,
  MAX_PARTY_SIZE,
  normalizeEntities,
  normalizeIntents,
  presentEntities,
  toExtraction,
} from '../../../src/intents/index.js';

describe('intent normalization', () => {
  it('turns placeholder strings into null and trims the rest', () => {
    const entities = normalizeEntities({
      origin: ' Singapore ',
      destination: 'null',
      carType: 'N/A',
      location: '',
      checkInDate: 20261103,
    });

    expect(entities.origin).toBe('Singapore');
    expect(entities.destination).toBeNull();
    expect(entities.carType).toBeNull();
    expect(entities.location).toBeNull();
    expect(entities.checkInDate).toBe('20261103');
    expect(entities.pickupDate).toBeNull();
  });

  it('defaults party sizes to one and floors fractional sizes', () => {
    expect(normalizeEntities({}).passengers).toBe(1);
    expect(normalizeEntities({ guests: 0 }).guests).toBe(1);
    expect(normalizeEntities({ passengers: '3' }).passengers).toBe(3);
    expect(normalizeEntities({ passengers: 2.7 }).passengers).toBe(2);
    expect(normalizeEntities({ guests: 'several' }).guests).toBe(1);
  });

  it('caps oversized party sizes', () => {
    expect(MAX_PARTY_SIZE).toBe(9);
    expect(normalizeEntities({ passengers: 100000000 }).passengers).toBe(9);
    expect(normalizeEntities({ guests: '12' }).guests).toBe(9);
  });

  it('ignores unknown entity keys', () => {
    expect(Object.keys(normalizeEntities({ seat: 'window' }))).not.toContain('seat');
  });

  it('keeps only known intent tags', () => {
    expect([...normalizeIntents(['searchFlights', 'teleport', 42, 'bookFlight', 'searchFlights'])]).toEqual([
      'searchFlights',
      'bookFlight',
    ]);
  });

  it('needs an intent or a non party-size entity to be usable', () => {
    expect(hasUsableContent(toExtraction([], {}))).toBe(false);
    expect(hasUsableContent(toExtraction([], { passengers: 4, guests: 2 }))).toBe(false);
    expect(hasUsableContent(toExtraction([], { location: 'Paris' }))).toBe(true);
    expect(hasUsableContent(toExtraction(['searchCars'], {}))).toBe(true);
  });

  it('lists only the entities that are set', () => {
    expect(presentEntities(normalizeEntities({ location: 'Paris' }))).toEqual({
      location: 'Paris',
      passengers: 1,
      guests: 1,
    });
  });
});
