/**
 * @fileoverview Five-field recurrence patterns: parsing and minute matching.
 * @module core/scheduler/cron
 *
 * Field syntax: `*`, `n`, `a-b`, `*\/n`, `a-b/n`, `a/n` (from `a` to the field maximum)
 * and comma separated lists of those. Month and day-of-week fields also take
 * three-letter English names; day-of-week accepts 7 for Sunday.
 */

import { fail, ok, type Result } from '../types';

import { toCalendarInstant } from './calendar';

import type {
  CalendarInstant,
  CronField,
  CronFieldName,
  JobTable,
  JobDefinition,
  RecurrencePattern,
} from './types';

interface FieldBounds {
  readonly label: string;
  readonly min: number;
  readonly max: number;
  readonly names?: readonly string[];
}

const MONTH_NAMES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const DAY_NAMES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

export const FIELD_ORDER: readonly CronFieldName[] = [
  'minute',
  'hour',
  'dayOfMonth',
  'month',
  'dayOfWeek',
];

const FIELD_BOUNDS: Readonly<Record<CronFieldName, FieldBounds>> = {
  minute: { label: 'minute', min: 0, max: 59 },
  hour: { label: 'hour', min: 0, max: 23 },
  dayOfMonth: { label: 'day-of-month', min: 1, max: 31 },
  // Names map to 1..12
  month: { label: 'month', min: 1, max: 12, names: MONTH_NAMES },
  // 7 is accepted and folded onto Sunday
  dayOfWeek: { label: 'day-of-week', min: 0, max: 7, names: DAY_NAMES },
};

/**
 * Schedule macros and their five-field expansion.
 */
export const SCHEDULE_MACROS: Readonly<Record<string, string>> = {
  '@yearly': '0 0 1 1 *',
  '@annually': '0 0 1 1 *',
  '@monthly': '0 0 1 * *',
  '@weekly': '0 0 * * 0',
  '@daily': '0 0 * * *',
  '@midnight': '0 0 * * *',
  '@hourly': '0 * * * *',
};

function parseValue(token: string, bounds: FieldBounds): Result<number, string> {
  if (/^\d+$/.test(token)) {
    const value = Number(token);
    if (value < bounds.min || value > bounds.max) {
      return fail(`${bounds.label} value ${value} is outside ${bounds.min}-${bounds.max}`);
    }
    return ok(value);
  }

  if (bounds.names) {
    const index = bounds.names.indexOf(token.toLowerCase());
    if (index >= 0) {
      return ok(bounds === FIELD_BOUNDS.month ? index + 1 : index);
    }
  }

  return fail(`${bounds.label} value '${token}' is not a number${bounds.names ? ' or name' : ''}`);
}

function parseStep(token: string, bounds: FieldBounds): Result<number, string> {
  if (!/^\d+$/.test(token)) {
    return fail(`${bounds.label} step '${token}' is not a number`);
  }
  const step = Number(token);
  if (step < 1 || step > bounds.max - bounds.min + 1) {
    return fail(`${bounds.label} step ${step} is outside 1-${bounds.max - bounds.min + 1}`);
  }
  return ok(step);
}

/**
 * Expand one comma-separated element of a field into `values`.
 */
function expandPart(part: string, bounds: FieldBounds, values: Set<number>): Result<void, string> {
  const [rangeText = '', stepText, ...extra] = part.split('/');
  if (extra.length > 0 || rangeText === '') {
    return fail(`${bounds.label} element '${part}' is malformed`);
  }

  let step = 1;
  if (stepText !== undefined) {
    const parsedStep = parseStep(stepText, bounds);
    if (!parsedStep.success) return parsedStep;
    step = parsedStep.data;
  }

  let start: number;
  let end: number;

  if (rangeText === '*') {
    start = bounds.min;
    end = bounds.max;
  } else {
    const endpoints = rangeText.split('-');
    if (endpoints.length > 2) {
      return fail(`${bounds.label} range '${rangeText}' is malformed`);
    }
    const first = parseValue(endpoints[0] ?? '', bounds);
    if (!first.success) return first;
    start = first.data;

    if (endpoints.length === 2) {
      const last = parseValue(endpoints[1] ?? '', bounds);
      if (!last.success) return last;
      end = last.data;
      if (end < start) {
        return fail(`${bounds.label} range '${rangeText}' runs backwards`);
      }
    } else {
      end = stepText === undefined ? start : bounds.max;
    }
  }

  for (let value = start; value <= end; value += step) {
    values.add(bounds === FIELD_BOUNDS.dayOfWeek && value === 7 ? 0 : value);
  }
  return ok(undefined);
}

/**
 * Parse a single field of a recurrence pattern.
 */
export function parseField(text: string, name: CronFieldName): Result<CronField, string> {
  const bounds = FIELD_BOUNDS[name];
  if (text === '') {
    return fail(`${bounds.label} field is empty`);
  }

  const values = new Set<number>();
  for (const part of text.split(',')) {
    const expanded = expandPart(part, bounds, values);
    if (!expanded.success) return expanded;
  }

  return ok({
    values,
    wildcard: text.startsWith('*'),
    source: text,
  });
}

/**
 * Parse a five-field pattern or one of the {@link SCHEDULE_MACROS}.
 *
 * @example
 * ```ts
 * const parsed = parseRecurrence('23 2 * * 0');
 * if (parsed.success) matches(parsed.data, toCalendarInstant(new Date()));
 * ```
 */
export function parseRecurrence(text: string): Result<RecurrencePattern, string> {
  const trimmed = text.trim();
  const expanded = trimmed.startsWith('@') ? SCHEDULE_MACROS[trimmed.toLowerCase()] : trimmed;
  if (expanded === undefined) {
    return fail(`unsupported schedule macro '${trimmed}'`);
  }

  const fields = expanded.split(/\s+/);
  if (fields.length !== FIELD_ORDER.length) {
    return fail(`expected ${FIELD_ORDER.length} schedule fields, found ${fields.length}`);
  }

  const pattern: Partial<Record<CronFieldName, CronField>> = {};
  for (const [index, name] of FIELD_ORDER.entries()) {
    const field = parseField(fields[index] ?? '', name);
    if (!field.success) return field;
    pattern[name] = field.data;
  }

  const { minute, hour, dayOfMonth, month, dayOfWeek } = pattern;
  if (!minute || !hour || !dayOfMonth || !month || !dayOfWeek) {
    return fail('incomplete schedule');
  }
  return ok({ minute, hour, dayOfMonth, month, dayOfWeek });
}

/**
 * Whether a pattern fires at the given minute.
 *
 * Minute, hour and month must match. When both day fields are restricted a
 * match on either one is enough; when either starts with `*` both must match.
 */
export function matches(pattern: RecurrencePattern, instant: CalendarInstant): boolean {
  if (
    !pattern.minute.values.has(instant.minute) ||
    !pattern.hour.values.has(instant.hour) ||
    !pattern.month.values.has(instant.month)
  ) {
    return false;
  }

  const dayOfMonthMatches = pattern.dayOfMonth.values.has(instant.dayOfMonth);
  const dayOfWeekMatches = pattern.dayOfWeek.values.has(instant.dayOfWeek);

  if (pattern.dayOfMonth.wildcard || pattern.dayOfWeek.wildcard) {
    return dayOfMonthMatches && dayOfWeekMatches;
  }
  return dayOfMonthMatches || dayOfWeekMatches;
}

/**
 * Every job in `jobs` whose pattern fires at `instant`, in table order.
 * Reads the table only.
 */
export function dueJobs(jobs: JobTable, instant: CalendarInstant): JobDefinition[] {
  return jobs.filter((job) => matches(job.recurrence, instant));
}

/**
 * {@link dueJobs} for a point in time, read in `timeZone` (host local time when omitted).
 */
export function dueAt(jobs: JobTable, instant: Date, timeZone?: string): JobDefinition[] {
  return dueJobs(jobs, toCalendarInstant(instant, timeZone));
}
