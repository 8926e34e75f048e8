/**
 * Timestamp helpers. Every timestamp stored or compared is a UTC ISO 8601
 * string produced by `Date.prototype.toISOString`, so string ordering and
 * chronological ordering agree.
 */

import { RevenueLensError } from '../runner/errors.js';

export const MS_PER_DAY = 86_400_000;

/** Normalize any parseable date input to `YYYY-MM-DDTHH:mm:ss.sssZ`. */
export function toIsoTimestamp(value: string | number | Date): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid timestamp: ${String(value)}`);
  }
  return date.toISOString();
}

/** Stripe sends unix seconds. */
export function fromUnixSeconds(seconds: number): string {
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime()) || date.getUTCFullYear() > 9999) {
    throw new RevenueLensError('VALIDATION_ERROR', `Unix timestamp out of range: ${seconds}`);
  }
  return date.toISOString();
}

export function addDays(iso: string, days: number): string {
  return new Date(new Date(iso).getTime() + days * MS_PER_DAY).toISOString();
}

/** Calendar date (UTC) of a timestamp, `YYYY-MM-DD`. */
export function isoDate(iso: string): string {
  return toIsoTimestamp(iso).slice(0, 10);
}

/** Whole days elapsed from `from` to `to`, truncated. */
export function daysBetween(from: string, to: string): number {
  return Math.floor((new Date(to).getTime() - new Date(from).getTime()) / MS_PER_DAY);
}

/** Start of the UTC day for a `YYYY-MM-DD` date. */
export function startOfDay(date: string): string {
  return `${date}T00:00:00.000Z`;
}
