/**
 * Cell timestamps are integral microseconds since the Unix epoch. The server
 * stores them at millisecond granularity, so client-supplied timestamps are
 * truncated before they are sent.
 */

import { ValidationError } from './errors.js';

export const MICROS_PER_MILLI = 1000;

/**
 * Timestamp sent with a set-cell mutation to let the server pick the time.
 */
export const SERVER_ASSIGNED_TIMESTAMP = -1;

export function assertValidMicros(micros: number): number {
  if (!Number.isSafeInteger(micros)) {
    throw ValidationError.invalidTimestamp(micros, 'must be a safe integer number of microseconds');
  }
  return micros;
}

export function microsFromDate(date: Date): number {
  const millis = date.getTime();
  if (Number.isNaN(millis)) {
    throw ValidationError.invalidTimestamp(date, 'invalid Date');
  }
  return millis * MICROS_PER_MILLI;
}

/**
 * Date for `micros`; sub-millisecond precision is dropped.
 */
export function dateFromMicros(micros: number): Date {
  return new Date(Math.floor(micros / MICROS_PER_MILLI));
}

/**
 * Round down to a whole millisecond.
 */
export function truncateToMillis(micros: number): number {
  return micros - (((micros % MICROS_PER_MILLI) + MICROS_PER_MILLI) % MICROS_PER_MILLI);
}

/**
 * Round up to a whole millisecond.
 */
export function ceilToMillis(micros: number): number {
  const truncated = truncateToMillis(micros);
  return truncated === micros ? micros : truncated + MICROS_PER_MILLI;
}

export function toMicros(value: Date | number): number {
  return value instanceof Date ? microsFromDate(value) : assertValidMicros(value);
}
