import type { CapabilityDescriptor } from './types.js';

export const PLAN_TRIP_CAPABILITY = 'planTrip';

/**
 * The planner's own descriptor, served on its `GET /agent-card`.
 */
export function createPlannerDescriptor(baseAddress: string): CapabilityDescriptor {
  return {
    serviceId: 'travel-planner-001',
    displayName: 'Trip Planner',
    description: 'Coordinates flight, hotel, and car rental bookings based on natural language travel requests.',
    baseAddress,
    operations: [
      {
        capabilityId: PLAN_TRIP_CAPABILITY,
        invocationPath: '/planTrip',
        description: 'Takes a natural language travel request, finds the relevant services and books what was asked for.',
      },
    ],
  };
}
