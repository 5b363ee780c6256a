/**
 * Local-time calendar helpers
 *
 * Day, week and month arithmetic goes through the Date field setters so DST
 * shifts land on the right wall-clock boundaries.
 */

import type { BucketSpec, Period } from '../../types/index.js';
import { TimeTreeError } from '../../utils/errors.js';

// Upper bound on buckets a single report may produce
export const MAX_BUCKETS = 1000;

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() + days);
  return result;
}

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Monday 00:00 of the week containing `date`
 */
export function startOfWeek(date: Date): Date {
  const day = startOfDay(date);
  const sinceMonday = (day.getDay() + 6) % 7;
  return addDays(day, -sinceMonday);
}

export function startOfMonth(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), 1);
}

export function addMonths(date: Date, months: number): Date {
  return new Date(date.getFullYear(), date.getMonth() + months, 1);
}

export function startOfYear(date: Date): Date {
  return new Date(date.getFullYear(), 0, 1);
}

/**
 * Unix seconds, fractions dropped
 */
export function toUnix(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromUnix(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Seconds of overlap between [start, end) and a period
 */
export function overlapSeconds(start: Date, end: Date, period: Period): number {
  const from = Math.max(start.getTime(), period.start.getTime());
  const to = Math.min(end.getTime(), period.end.getTime());
  return to > from ? Math.floor((to - from) / 1000) : 0;
}

function nextCalendarBoundary(date: Date, unit: 'day' | 'week' | 'month'): Date {
  switch (unit) {
    case 'day':
      return addDays(startOfDay(date), 1);
    case 'week':
      return addDays(startOfWeek(date), 7);
    case 'month':
      return addMonths(startOfMonth(date), 1);
  }
}

/**
 * Split a period into consecutive buckets
 *
 * Calendar buckets end on calendar boundaries; the first and last bucket are
 * clipped to the period. Fixed buckets start at the period start.
 */
export function splitPeriod(period: Period, spec: BucketSpec): Period[] {
  if (spec.kind === 'fixed' && spec.seconds <= 0) {
    throw new TimeTreeError('Bucket width must be positive', 'INVALID');
  }

  const buckets: Period[] = [];
  let cursor = period.start;

  while (cursor.getTime() < period.end.getTime()) {
    if (buckets.length >= MAX_BUCKETS) {
      throw new TimeTreeError(
        `Too many buckets: the period splits into more than ${MAX_BUCKETS}`,
        'INVALID'
      );
    }

    const next =
      spec.kind === 'calendar'
        ? nextCalendarBoundary(cursor, spec.unit)
        : addSeconds(cursor, spec.seconds);
    const end = next.getTime() < period.end.getTime() ? next : period.end;
    buckets.push({ start: cursor, end });
    cursor = end;
  }

  return buckets;
}
