/**
 * Test helpers
 */

import { afterEach, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { createDatabase } from '../src/services/db/sqlite.js';
import { ExpressionError, TimeTreeError } from '../src/utils/errors.js';

export function memoryDb(): Database.Database {
  return createDatabase(':memory:');
}

// Local time in March 2024; UTC unless a suite switches zones with useTimeZone
export function march(day: number, hours = 0, minutes = 0): Date {
  return new Date(2024, 2, day, hours, minutes);
}

/**
 * Code of the error thrown by `fn`, or undefined when it does not throw
 */
export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof TimeTreeError || error instanceof ExpressionError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

/**
 * Run the enclosing suite in another time zone
 */
export function useTimeZone(zone: string): void {
  let previous: string | undefined;

  beforeEach(() => {
    previous = process.env.TZ;
    process.env.TZ = zone;
  });

  afterEach(() => {
    process.env.TZ = previous ?? 'UTC';
  });
}

/**
 * Length of a period in hours
 */
export function hoursOf(period: { start: Date; end: Date }): number {
  return (period.end.getTime() - period.start.getTime()) / 3_600_000;
}
