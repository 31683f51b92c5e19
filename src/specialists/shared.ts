/**
 * Helpers shared by the mock specialist services.
 */

import { randomUUID } from 'node:crypto';

import type { AppLogger } from '../utils/observability/index.js';

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export interface SpecialistOptions {
  /** Drives every generated value; inject a seeded source in tests */
  random?: RandomSource;
  /** Booking id suffix generator */
  newId?: () => string;
  logger?: AppLogger;
}

export interface ResolvedSpecialistOptions {
  random: RandomSource;
  newId: () => string;
}

export function resolveOptions(options: SpecialistOptions): ResolvedSpecialistOptions {
  return {
    random: options.random ?? Math.random,
    newId: options.newId ?? randomUUID,
  };
}

/** Integer in [min, max], both inclusive */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomAmount(random: RandomSource, min: number, max: number): number {
  return roundMoney(min + random() * (max - min));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  return items[randomInt(random, 0, items.length - 1)];
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined || value === '' || value === 0 || value === false) return false;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/**
 * Required body fields that are absent or empty. Zero and empty lists
 * count as missing.
 */
export function missingFields(body: Record<string, unknown>, fields: readonly string[]): string[] {
  return fields.filter((field) => !isPresent(body[field]));
}

export function missingParametersError(fields: readonly string[]): { error: string } {
  return { error: `Missing required parameters: ${fields.join(', ')}` };
}

/**
 * Party size as a positive integer, or null when it is not one.
 */
export function parsePartySize(value: unknown, fallback?: number): number | null {
  if ((value === undefined || value === null) && fallback !== undefined) return fallback;
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : null;
}

export function isRecord(body: unknown): body is Record<string, unknown> {
  return typeof body === 'object' && body !== null && !Array.isArray(body);
}

export const INVALID_PAYLOAD_ERROR = { error: 'Invalid JSON payload' };

export interface BookingConfirmation {
  bookingId: string;
  status: 'Confirmed' | 'Pending' | 'Failed';
  message: string | null;
}
