/**
 * Date, duration and period expressions
 *
 * Durations:  2h10m30s, 1w3d, 1.5h, 1:20 (h:mm), 1:20:30
 * Offsets:    -1w, +1w1d2h, 3d
 * Instants:   now, today, yesterday, 2020-04-15, 2020-04-15_9:10, 9:10, 9h10m, -1h
 * Periods:    today, thisweek, lastmonth, ... or from/to/for
 */

import type { BucketSpec, BucketUnit, Period } from '../../types/index.js';
import { ExpressionError } from '../../utils/errors.js';
import {
  addDays,
  addMonths,
  addSeconds,
  startOfDay,
  startOfMonth,
  startOfWeek,
  startOfYear,
} from './calendar.js';

const SECONDS_PER_DAY = 86_400;

// Beyond this no Date can hold the result (100 million days)
const MAX_DURATION_SECONDS = 8.64e12;

const UNIT_ORDER = ['w', 'd', 'h', 'm', 's'] as const;

const NUM = '(\\d+(?:\\.\\d+)?)';
const UNITS_PATTERN = new RegExp(`^${UNIT_ORDER.map((u) => `(?:${NUM}${u})?`).join('')}$`, 'i');
const CLOCK_DURATION_PATTERN = /^(\d+):([0-5]\d)(?::([0-5]\d))?$/;
const CLOCK_TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const HMS_TIME_PATTERN = /^(\d{1,2})h(?:(\d{1,2})m)?(?:(\d{1,2})s)?$/i;
const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:_(.+))?$/;
const SIGN_PATTERN = /^[+-]/;

export const PERIOD_NAMES = [
  'today',
  'yesterday',
  'thisweek',
  'lastweek',
  'thismonth',
  'lastmonth',
  'thisyear',
] as const;

export type PeriodName = (typeof PERIOD_NAMES)[number];

// Monday to Friday
export const DEFAULT_WEEK_DAYS = 5;

export const BUCKET_UNITS: readonly BucketUnit[] = ['day', 'week', 'month'];

export interface PeriodInput {
  name?: string | undefined;
  from?: string | undefined;
  to?: string | undefined;
  duration?: string | undefined;
}

export interface PeriodOptions {
  weekDays?: number | undefined;
}

/**
 * A duration split into calendar days and clock seconds
 *
 * Days move a date on the wall clock, so `1d` from 10:00 lands on 10:00 the
 * next day even when a DST change falls in between.
 */
export interface DurationParts {
  days: number;
  seconds: number;
}

interface OffsetParts extends DurationParts {
  sign: 1 | -1;
}

/**
 * Duration parts of a trimmed expression, or null when it is not one
 */
function readDuration(expr: string, input: string): DurationParts | null {
  let days = 0;
  let seconds = 0;

  const clock = CLOCK_DURATION_PATTERN.exec(expr);
  if (clock) {
    const [, hours = '0', minutes = '0', secs = '0'] = clock;
    seconds = Number(hours) * 3600 + Number(minutes) * 60 + Number(secs);
  } else {
    const units = UNITS_PATTERN.exec(expr);
    const values = units ? units.slice(1) : [];
    if (values.every((value) => value === undefined)) {
      return null;
    }
    const value = (i: number): number => {
      const text = values[i];
      return text === undefined ? 0 : parseFloat(text);
    };
    days = value(0) * 7 + value(1);
    seconds = value(2) * 3600 + value(3) * 60 + value(4);
  }

  const wholeDays = Math.trunc(days);
  const parts = {
    days: wholeDays,
    seconds: Math.round(seconds + (days - wholeDays) * SECONDS_PER_DAY),
  };
  const total = parts.days * SECONDS_PER_DAY + parts.seconds;
  if (!Number.isFinite(total) || total > MAX_DURATION_SECONDS) {
    throw new ExpressionError('Duration out of range', input);
  }
  return parts;
}

export function parseDurationParts(input: string): DurationParts {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new ExpressionError('Duration cannot be empty', input);
  }

  const parts = readDuration(trimmed, input);
  if (!parts) {
    throw new ExpressionError('Invalid duration, use e.g. 2h30m, 1w2d, 1:20', input);
  }
  return parts;
}

/**
 * Parse a duration into seconds
 */
export function parseDuration(input: string): number {
  const { days, seconds } = parseDurationParts(input);
  return days * SECONDS_PER_DAY + seconds;
}

function parseOffsetParts(input: string): OffsetParts {
  const trimmed = input.trim();
  const sign = trimmed.startsWith('-') ? -1 : 1;
  const body = SIGN_PATTERN.test(trimmed) ? trimmed.slice(1) : trimmed;

  if (!body) {
    throw new ExpressionError('Offset needs a duration after its sign', input);
  }

  const parts = readDuration(body, input);
  if (!parts) {
    throw new ExpressionError('Invalid offset, use e.g. -1w, +1d2h', input);
  }
  return { ...parts, sign };
}

/**
 * Parse a signed offset (+1w, -3d, 2h) into seconds
 */
export function parseOffset(input: string): number {
  const { sign, days, seconds } = parseOffsetParts(input);
  return sign * (days * SECONDS_PER_DAY + seconds);
}

function checkedDate(date: Date, input: string): Date {
  if (Number.isNaN(date.getTime())) {
    throw new ExpressionError('Date out of range', input);
  }
  return date;
}

// Days on the wall clock, then the remaining seconds
function shift(date: Date, parts: DurationParts, sign: 1 | -1, input: string): Date {
  return checkedDate(addSeconds(addDays(date, sign * parts.days), sign * parts.seconds), input);
}

/**
 * `date` plus an elapsed duration, e.g. the length of a logged record
 */
export function addDuration(date: Date, input: string): Date {
  return checkedDate(addSeconds(date, parseDuration(input)), input);
}

function atTime(day: Date, hours: number, minutes: number, seconds: number, input: string): Date {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new ExpressionError('Invalid time of day', input);
  }
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), hours, minutes, seconds);
}

/**
 * Time of day on a given day: 9:10, 09:10:30, 9h, 9h10m
 */
function parseTimeOfDay(expr: string, day: Date, input: string): Date {
  const clock = CLOCK_TIME_PATTERN.exec(expr) ?? HMS_TIME_PATTERN.exec(expr);
  if (!clock) {
    throw new ExpressionError('Invalid time, use e.g. 9:10, 9:10:30, 9h10m', input);
  }
  const [, hours = '0', minutes = '0', seconds = '0'] = clock;
  return atTime(day, Number(hours), Number(minutes), Number(seconds), input);
}

function parseDate(year: string, month: string, day: string, input: string): Date {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  const date = new Date(y, m - 1, d);
  if (date.getFullYear() !== y || date.getMonth() !== m - 1 || date.getDate() !== d) {
    throw new ExpressionError('Invalid date', input);
  }
  return date;
}

/**
 * Parse an instant relative to `now`
 */
export function parseTime(input: string, now: Date): Date {
  const expr = input.trim().toLowerCase();
  if (!expr) {
    throw new ExpressionError('Time cannot be empty', input);
  }

  switch (expr) {
    case 'now':
      return new Date(now.getTime());
    case 'today':
      return startOfDay(now);
    case 'yesterday':
      return addDays(startOfDay(now), -1);
    case 'tomorrow':
      return addDays(startOfDay(now), 1);
  }

  if (SIGN_PATTERN.test(expr)) {
    const offset = parseOffsetParts(expr);
    return shift(now, offset, offset.sign, input);
  }

  const date = DATE_PATTERN.exec(expr);
  if (date) {
    const [, year = '', month = '', day = '', time] = date;
    const dayStart = parseDate(year, month, day, input);
    return time === undefined ? dayStart : parseTimeOfDay(time, dayStart, input);
  }

  return parseTimeOfDay(expr, now, input);
}

export function isPeriodName(value: string): value is PeriodName {
  return PERIOD_NAMES.some((name) => name === value);
}

/**
 * Named periods; weeks start on Monday and span `weekDays` days
 */
export function namedPeriod(name: PeriodName, now: Date, weekDays = DEFAULT_WEEK_DAYS): Period {
  const today = startOfDay(now);

  switch (name) {
    case 'today':
      return { start: today, end: addDays(today, 1) };
    case 'yesterday':
      return { start: addDays(today, -1), end: today };
    case 'thisweek': {
      const monday = startOfWeek(now);
      return { start: monday, end: addDays(monday, weekDays) };
    }
    case 'lastweek': {
      const monday = addDays(startOfWeek(now), -7);
      return { start: monday, end: addDays(monday, weekDays) };
    }
    case 'thismonth': {
      const first = startOfMonth(now);
      return { start: first, end: addMonths(first, 1) };
    }
    case 'lastmonth': {
      const first = addMonths(startOfMonth(now), -1);
      return { start: first, end: addMonths(first, 1) };
    }
    case 'thisyear': {
      const first = startOfYear(now);
      return { start: first, end: new Date(first.getFullYear() + 1, 0, 1) };
    }
  }
}

function describePeriodInput(input: PeriodInput): string {
  return [
    input.name,
    input.from !== undefined ? `from ${input.from}` : undefined,
    input.to !== undefined ? `to ${input.to}` : undefined,
    input.duration !== undefined ? `for ${input.duration}` : undefined,
  ]
    .filter((part): part is string => part !== undefined)
    .join(' ');
}

/**
 * Resolve a period from a name or from/to/for expressions
 *
 * An offset in `from` counts from today's midnight; the end defaults to now.
 * Without any input the current week is used.
 */
export function resolvePeriod(input: PeriodInput, now: Date, options: PeriodOptions = {}): Period {
  const text = describePeriodInput(input);
  const hasRange = input.from !== undefined || input.to !== undefined || input.duration !== undefined;

  if (input.name !== undefined) {
    const name = input.name.trim().toLowerCase();
    if (!isPeriodName(name)) {
      throw new ExpressionError(`Unknown period, expected one of ${PERIOD_NAMES.join(', ')}`, input.name);
    }
    if (hasRange) {
      throw new ExpressionError('A named period cannot be combined with from/to/for', text);
    }
    return namedPeriod(name, now, options.weekDays);
  }

  if (!hasRange) {
    return namedPeriod('thisweek', now, options.weekDays);
  }

  if (input.to !== undefined && input.duration !== undefined) {
    throw new ExpressionError('Use either "to" or "for", not both', text);
  }

  let start: Date;
  let end: Date;

  if (input.from !== undefined) {
    const from = input.from.trim();
    if (SIGN_PATTERN.test(from)) {
      const offset = parseOffsetParts(from);
      start = shift(startOfDay(now), offset, offset.sign, input.from);
    } else {
      start = parseTime(from, now);
    }
    if (input.duration !== undefined) {
      end = shift(start, parseDurationParts(input.duration), 1, input.duration);
    } else if (input.to !== undefined) {
      end = parseTime(input.to, now);
    } else {
      end = new Date(now.getTime());
    }
  } else if (input.duration !== undefined) {
    end = new Date(now.getTime());
    start = shift(end, parseDurationParts(input.duration), -1, input.duration);
  } else {
    throw new ExpressionError('"to" needs a "from"', text);
  }

  if (start.getTime() >= end.getTime()) {
    throw new ExpressionError('Period start must be before its end', text);
  }

  return { start, end };
}

/**
 * Parse a bucket width: day, week, month or a duration
 */
export function parseBucketSpec(input: string): BucketSpec {
  const expr = input.trim().toLowerCase();
  const unit = BUCKET_UNITS.find((u) => u === expr);
  if (unit) {
    return { kind: 'calendar', unit };
  }

  const seconds = parseDuration(expr);
  if (seconds <= 0) {
    throw new ExpressionError('Bucket width must be positive', input);
  }
  return { kind: 'fixed', seconds };
}
