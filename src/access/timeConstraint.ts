/**
 * Time Constraint Evaluator
 *
 * Decides whether an instant falls inside an absolute window, an allowed
 * weekday set and a time-of-day window (which may span midnight).
 * Weekday and clock time are read in the configured IANA time zone.
 *
 * @module access/timeConstraint
 */

import type { TimeConstraint } from './types.js';

export interface TimeConstraintOptions {
  /** IANA time zone used for weekday and clock time. Defaults to 'UTC'. */
  timeZone?: string;
}

export const DEFAULT_TIME_ZONE = 'UTC';

const WEEKDAY_NUMBERS: Record<string, number> = {
  Sun: 1,
  Mon: 2,
  Tue: 3,
  Wed: 4,
  Thu: 5,
  Fri: 6,
  Sat: 7,
};

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      weekday: 'short',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/** Whether the runtime recognises `timeZone` as an IANA zone. */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

export interface ZonedClock {
  /** 1 = Sunday … 7 = Saturday. */
  weekday: number;
  /** Minutes since local midnight. */
  minutes: number;
}

export function readZonedClock(at: Date, timeZone: string = DEFAULT_TIME_ZONE): ZonedClock {
  let weekday = 0;
  let hour = 0;
  let minute = 0;
  for (const part of getFormatter(timeZone).formatToParts(at)) {
    if (part.type === 'weekday') weekday = WEEKDAY_NUMBERS[part.value] ?? 0;
    else if (part.type === 'hour') hour = parseInt(part.value, 10) % 24;
    else if (part.type === 'minute') minute = parseInt(part.value, 10);
  }
  return { weekday, minutes: hour * 60 + minute };
}

/**
 * Parse "HH:mm" into minutes since midnight, or null when malformed.
 */
export function parseClockTime(value: string): number | null {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) return null;
  return parseInt(match[1] ?? '0', 10) * 60 + parseInt(match[2] ?? '0', 10);
}

/**
 * Evaluate a constraint at `at`. All present checks must pass; absent bounds
 * are skipped. A malformed clock bound fails the constraint.
 */
export function isTimeConstraintSatisfied(
  constraint: TimeConstraint,
  at: Date,
  options: TimeConstraintOptions = {},
): boolean {
  const instant = at.getTime();
  if (constraint.startTime && instant < constraint.startTime.getTime()) return false;
  if (constraint.endTime && instant > constraint.endTime.getTime()) return false;

  const needsClock =
    constraint.daysOfWeek !== undefined ||
    (constraint.timeOfDayStart !== undefined && constraint.timeOfDayEnd !== undefined);
  if (!needsClock) return true;

  const clock = readZonedClock(at, options.timeZone ?? DEFAULT_TIME_ZONE);

  if (constraint.daysOfWeek && !constraint.daysOfWeek.includes(clock.weekday)) {
    return false;
  }

  if (constraint.timeOfDayStart !== undefined && constraint.timeOfDayEnd !== undefined) {
    const start = parseClockTime(constraint.timeOfDayStart);
    const end = parseClockTime(constraint.timeOfDayEnd);
    if (start === null || end === null) return false;

    if (start <= end) {
      return clock.minutes >= start && clock.minutes <= end;
    }
    // overnight
    return clock.minutes >= start || clock.minutes <= end;
  }

  return true;
}
