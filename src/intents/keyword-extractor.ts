/**
 * Keyword Intent Extractor
 *
 * Rule-based extraction for running without an LLM. Recognizes domain
 * keywords, party sizes, a few relative dates, ISO dates, "from X to Y",
 * "in/to X" and "near X" phrases, then fills the defaults a trip needs.
 * Place names are expected to be capitalized.
 */

import { DateTime } from 'luxon';

import { createLogger, type AppLogger } from '../utils/observability/index.js';
import { normalizeEntities, presentEntities } from './normalize.js';
import type { IntentExtraction, IntentExtractor, TripEntities, TripIntent } from './types.js';

const FLIGHT_PATTERN = /\b(flights?|fly|flying|tickets?)\b/;
const HOTEL_PATTERN = /\b(hotels?|stay|accommodation)\b/;
const CAR_PATTERN = /\b(cars?|rental|drive)\b/;
const BOOKING_PATTERN = /\b(book|booked|booking|reserve|reserved|reservation|rent)\b/;

const PARTY_SIZE_PATTERN = /\b(\d+)\s+(people|persons?|passengers?|guests?|travell?ers?|adults?)\b/;
const ISO_DATE_PATTERN = /\b\d{4}-\d{2}-\d{2}\b/g;

const PLACE = String.raw`([A-Z][\w'-]*(?:\s+[A-Z][\w'-]*)*)`;
const FROM_TO_PATTERN = new RegExp(String.raw`\b[Ff]rom\s+${PLACE}\s+to\s+${PLACE}`);
const IN_TO_PATTERN = new RegExp(String.raw`\b(?:[Ii]n|[Tt]o)\s+${PLACE}`, 'g');
const NEAR_PATTERN = new RegExp(String.raw`\b[Nn]ear\s+(?:the\s+)?${PLACE}`);

/** Capitalized words after "in"/"to" that are not places */
const NOT_PLACES = new Set([
  'January', 'February', 'March', 'April', 'May', 'June', 'July', 'August',
  'September', 'October', 'November', 'December',
  'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday',
]);

const CAR_TYPES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\bcompact\b/, 'Compact'],
  [/\bsedan\b/, 'Sedan'],
  [/\bsuv\b/, 'SUV'],
  [/\bluxury\b/, 'Luxury'],
  [/\bconvertible\b/, 'Convertible'],
];

/** Nights assumed after a relative departure ("tomorrow", "next week") */
const RELATIVE_TRIP_DAYS = 4;
/** Nights assumed when only one explicit date is given */
const EXPLICIT_TRIP_DAYS = 5;
/** Days ahead of today for a flight with no date at all */
const DEFAULT_LEAD_DAYS = 7;
const CAR_HANDOVER_TIME = 'T12:00:00Z';

export interface KeywordIntentExtractorOptions {
  defaultOrigin: string;
  defaultDestination: string;
  /** Reference clock for resolving relative dates */
  now?: () => Date;
  logger?: AppLogger;
}

type MutableEntities = {
  [K in keyof TripEntities]-?: NonNullable<TripEntities[K]> | null;
};

function formatDate(date: DateTime): string {
  return date.toFormat('yyyy-MM-dd');
}

function firstPlace(query: string): string | null {
  for (const match of query.matchAll(IN_TO_PATTERN)) {
    const words = match[1].split(/\s+/);
    if (!NOT_PLACES.has(words[0])) {
      return match[1];
    }
  }
  return null;
}

function detectIntents(lower: string): Set<TripIntent> {
  const intents = new Set<TripIntent>();
  const booking = BOOKING_PATTERN.test(lower);

  if (FLIGHT_PATTERN.test(lower)) {
    intents.add('searchFlights');
    if (booking) intents.add('bookFlight');
  }
  if (HOTEL_PATTERN.test(lower)) {
    intents.add('searchHotels');
    if (booking) intents.add('bookHotel');
  }
  if (CAR_PATTERN.test(lower)) {
    intents.add('searchCars');
    if (booking) intents.add('bookCar');
  }
  return intents;
}

function resolveTravelDates(
  query: string,
  lower: string,
  today: DateTime
): { departure: DateTime | null; ret: DateTime | null } {
  if (lower.includes('next week')) {
    const daysUntilMonday = (8 - today.weekday) % 7 || 7;
    const departure = today.plus({ days: daysUntilMonday });
    return { departure, ret: departure.plus({ days: RELATIVE_TRIP_DAYS }) };
  }

  if (/\btomorrow\b/.test(lower)) {
    const departure = today.plus({ days: 1 });
    return { departure, ret: departure.plus({ days: RELATIVE_TRIP_DAYS }) };
  }

  const [first, second] = query.match(ISO_DATE_PATTERN) ?? [];
  if (!first) {
    return { departure: null, ret: null };
  }

  const departure = DateTime.fromISO(first, { zone: 'utc' });
  if (!departure.isValid) {
    return { departure: null, ret: null };
  }

  const explicitReturn = second ? DateTime.fromISO(second, { zone: 'utc' }) : null;
  const ret = explicitReturn && explicitReturn.isValid && explicitReturn.toMillis() > departure.toMillis()
    ? explicitReturn
    : departure.plus({ days: EXPLICIT_TRIP_DAYS });
  return { departure, ret };
}

export class KeywordIntentExtractor implements IntentExtractor {
  readonly name = 'keyword';
  private readonly defaultOrigin: string;
  private readonly defaultDestination: string;
  private readonly now: () => Date;
  private readonly log: AppLogger;

  constructor(options: KeywordIntentExtractorOptions) {
    this.defaultOrigin = options.defaultOrigin;
    this.defaultDestination = options.defaultDestination;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger({ domain: 'intent-extractor', operation: 'keyword' });
  }

  async extract(query: string): Promise<IntentExtraction> {
    const lower = query.toLowerCase();
    const today = DateTime.fromJSDate(this.now(), { zone: 'utc' }).startOf('day');
    const intents = detectIntents(lower);

    const entities: MutableEntities = {
      origin: null,
      destination: null,
      departureDate: null,
      returnDate: null,
      passengers: 1,
      location: null,
      checkInDate: null,
      checkOutDate: null,
      guests: 1,
      hotelLocationPreference: null,
      pickupDate: null,
      dropoffDate: null,
      carType: null,
    };

    const partySize = lower.match(PARTY_SIZE_PATTERN);
    if (partySize) {
      const count = parseInt(partySize[1], 10);
      if (count > 0) {
        entities.passengers = count;
        entities.guests = count;
      }
    }

    const { departure, ret } = resolveTravelDates(query, lower, today);
    if (departure) {
      entities.departureDate = formatDate(departure);
      entities.checkInDate = formatDate(departure);
      entities.pickupDate = formatDate(departure) + CAR_HANDOVER_TIME;
    }
    if (ret) {
      entities.returnDate = formatDate(ret);
      entities.checkOutDate = formatDate(ret);
      entities.dropoffDate = formatDate(ret) + CAR_HANDOVER_TIME;
    }

    const fromTo = query.match(FROM_TO_PATTERN);
    if (fromTo) {
      entities.origin = fromTo[1];
      entities.destination = fromTo[2];
      entities.location = fromTo[2];
    } else {
      const place = firstPlace(query);
      if (place) {
        if (intents.has('searchFlights')) {
          entities.origin = this.defaultOrigin;
          entities.destination = place;
        }
        entities.location = place;
      }
    }

    const near = query.match(NEAR_PATTERN);
    if (near) {
      const preference = `Near ${near[1]}`;
      entities.hotelLocationPreference = preference;
      if (!entities.location) {
        entities.location = preference;
      }
    }

    for (const [pattern, carType] of CAR_TYPES) {
      if (pattern.test(lower)) {
        entities.carType = carType;
        break;
      }
    }

    this.applyDefaults(intents, entities, today);

    const extraction = { intents, entities: normalizeEntities(entities) };
    this.log.info('intent_keyword_extracted', {
      intents: [...intents],
      entities: presentEntities(extraction.entities),
    });
    return extraction;
  }

  private applyDefaults(intents: ReadonlySet<TripIntent>, entities: MutableEntities, today: DateTime): void {
    if (intents.has('searchFlights')) {
      entities.origin ??= this.defaultOrigin;
      entities.destination ??= this.defaultDestination;
      if (!entities.departureDate) {
        const departure = today.plus({ days: DEFAULT_LEAD_DAYS });
        entities.departureDate = formatDate(departure);
        entities.returnDate ??= formatDate(departure.plus({ days: EXPLICIT_TRIP_DAYS }));
      }
    }

    if ((intents.has('searchHotels') || intents.has('searchCars')) && !entities.location) {
      entities.location = entities.destination ?? this.defaultDestination;
    }

    if (entities.departureDate && !entities.checkInDate) {
      entities.checkInDate = entities.departureDate;
      entities.pickupDate = entities.departureDate + CAR_HANDOVER_TIME;
    }
    if (entities.returnDate && !entities.checkOutDate) {
      entities.checkOutDate = entities.returnDate;
      entities.dropoffDate = entities.returnDate + CAR_HANDOVER_TIME;
    }
  }
}
