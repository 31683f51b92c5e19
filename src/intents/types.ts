/**
 * Intent Understanding Types
 *
 * Free text is turned into a set of intent tags and a flat map of entity
 * slots. The fulfillment orchestrator only consumes this shape; how it is
 * produced (LLM or rules) is up to the extractor.
 */

export const TRIP_INTENTS = [
  'searchFlights',
  'bookFlight',
  'searchHotels',
  'bookHotel',
  'searchCars',
  'bookCar',
] as const;

export type TripIntent = (typeof TRIP_INTENTS)[number];

export function isTripIntent(value: unknown): value is TripIntent {
  return typeof value === 'string' && (TRIP_INTENTS as readonly string[]).includes(value);
}

/**
 * Entity slots extracted from a request. Every slot is optional; absence is
 * only a problem once a domain workflow requires the slot.
 */
export interface TripEntities {
  origin?: string | null;
  destination?: string | null;
  /** YYYY-MM-DD */
  departureDate?: string | null;
  /** YYYY-MM-DD */
  returnDate?: string | null;
  passengers?: number | null;

  /** General location for hotel search and car pickup */
  location?: string | null;
  checkInDate?: string | null;
  checkOutDate?: string | null;
  guests?: number | null;
  /** e.g. "Near Eiffel Tower" */
  hotelLocationPreference?: string | null;

  /** YYYY-MM-DDTHH:mm:ssZ */
  pickupDate?: string | null;
  /** YYYY-MM-DDTHH:mm:ssZ */
  dropoffDate?: string | null;
  carType?: string | null;
}

export type EntityName = keyof TripEntities;

export interface IntentExtraction {
  intents: ReadonlySet<TripIntent>;
  entities: TripEntities;
}

export interface IntentExtractor {
  readonly name: string;

  /**
   * Extract intents and entities from a travel request.
   * Rejects with an AppError (INTENT_EXTRACTION_FAILED) when the request
   * could not be processed at all.
   */
  extract(query: string): Promise<IntentExtraction>;
}
