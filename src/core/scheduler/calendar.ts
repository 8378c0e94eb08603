/**
 * @fileoverview Wall-clock helpers: minute keys and calendar fields in a time zone.
 * @module core/scheduler/calendar
 */

import type { CalendarInstant } from './types';

export const MINUTE_MS = 60_000;

const WEEKDAYS: Readonly<Record<string, number>> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      weekday: 'short',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Read the calendar fields of `date`.
 *
 * @param timeZone - IANA zone; the host's local time when omitted
 */
export function toCalendarInstant(date: Date, timeZone?: string): CalendarInstant {
  if (!timeZone) {
    return {
      minute: date.getMinutes(),
      hour: date.getHours(),
      dayOfMonth: date.getDate(),
      month: date.getMonth() + 1,
      dayOfWeek: date.getDay(),
    };
  }

  const parts: Record<string, string> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    parts[part.type] = part.value;
  }

  return {
    minute: Number(parts['minute']),
    hour: Number(parts['hour']),
    dayOfMonth: Number(parts['day']),
    month: Number(parts['month']),
    dayOfWeek: WEEKDAYS[parts['weekday'] ?? ''] ?? 0,
  };
}

/**
 * Whole minutes since the epoch; identifies a minute independently of time zone.
 */
export function minuteKey(date: Date): number {
  return Math.floor(date.getTime() / MINUTE_MS);
}

export function minuteStart(key: number): Date {
  return new Date(key * MINUTE_MS);
}

/**
 * Milliseconds from `now` until the next minute boundary (never zero).
 */
export function msUntilNextMinute(now: Date): number {
  return MINUTE_MS - (now.getTime() % MINUTE_MS);
}
