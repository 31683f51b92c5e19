/**
 * Response schemas for specialist search and booking calls.
 */

import { z } from 'zod';

// Only the item id is used to book; every other option field passes through unchecked
const itemId = z.string().min(1);

export const FlightOptionSchema = z.object({ flightId: itemId }).passthrough();
export const HotelOptionSchema = z.object({ hotelId: itemId }).passthrough();
export const CarOptionSchema = z.object({ carId: itemId }).passthrough();

export const BookingResponseSchema = z
  .object({
    bookingId: z.string().min(1).nullish(),
    status: z.string(),
    message: z.string().nullish(),
  })
  .refine((booking) => booking.status !== 'Confirmed' || Boolean(booking.bookingId), {
    message: 'confirmed booking has no bookingId',
    path: ['bookingId'],
  });

export type BookingResponse = z.infer<typeof BookingResponseSchema>;

/**
 * Render zod issues as "path: message" fragments joined by "; ".
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
