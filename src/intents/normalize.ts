/**
 * Normalization of raw extractor output into {@link IntentExtraction}.
 *
 * Shared by every extractor so that the orchestrator sees the same shape:
 * placeholder strings ("null", "") become null, party sizes default to 1
 * and are capped at MAX_PARTY_SIZE, and unknown intent tags are dropped.
 */

import { z } from 'zod';
import { isTripIntent, type IntentExtraction, type TripEntities, type TripIntent } from './types.js';

const PLACEHOLDER_VALUES = new Set(['', 'null', 'none', 'n/a', 'unknown']);

const textSlot = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return PLACEHOLDER_VALUES.has(text.toLowerCase()) ? null : text;
  });

/** Largest party one booking is made for; bigger requests are capped */
export const MAX_PARTY_SIZE = 9;

const partySizeSlot = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    const parsed = typeof value === 'number' ? value : parseInt(value ?? '', 10);
    if (!Number.isFinite(parsed) || parsed < 1) return 1;
    return Math.min(Math.floor(parsed), MAX_PARTY_SIZE);
  });

export const RawEntitiesSchema = z.object({
  origin: textSlot,
  destination: textSlot,
  departureDate: textSlot,
  returnDate: textSlot,
  passengers: partySizeSlot,
  location: textSlot,
  checkInDate: textSlot,
  checkOutDate: textSlot,
  guests: partySizeSlot,
  hotelLocationPreference: textSlot,
  pickupDate: textSlot,
  dropoffDate: textSlot,
  carType: textSlot,
});

export const RawExtractionSchema = z.object({
  intents: z.array(z.unknown()).nullish().transform((values) => values ?? []),
  entities: z.record(z.unknown()).nullish().transform((values) => values ?? {}),
});

export type NormalizedEntities = z.output<typeof RawEntitiesSchema>;

/**
 * Normalize an entity record. Keys outside the known slots are ignored.
 */
export function normalizeEntities(raw: Record<string, unknown>): NormalizedEntities {
  return RawEntitiesSchema.parse(raw);
}

export function normalizeIntents(raw: readonly unknown[]): Set<TripIntent> {
  return new Set(raw.filter(isTripIntent));
}

/**
 * Whether an extraction carries anything the orchestrator could act on.
 * Party sizes are ignored because they are always defaulted.
 */
export function hasUsableContent(extraction: IntentExtraction): boolean {
  if (extraction.intents.size > 0) return true;

  const { passengers: _passengers, guests: _guests, ...slots } = extraction.entities;
  return Object.values(slots).some((value) => value !== null && value !== undefined && value !== '');
}

/**
 * Entity values that are set, in a form safe to log.
 */
export function presentEntities(entities: TripEntities): Record<string, unknown> {
  const present: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entities)) {
    if (value !== null && value !== undefined) {
      present[key] = value;
    }
  }
  return present;
}

export function toExtraction(intents: readonly unknown[], entities: Record<string, unknown>): IntentExtraction {
  return {
    intents: normalizeIntents(intents),
    entities: normalizeEntities(entities),
  };
}
