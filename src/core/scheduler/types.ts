/**
 * @fileoverview Type definitions for the recurrence scheduler subsystem.
 * @module core/scheduler/types
 */

import type { ParseError } from '../errors';

export type CronFieldName = 'minute' | 'hour' | 'dayOfMonth' | 'month' | 'dayOfWeek';

/**
 * One parsed field of a recurrence pattern.
 */
export interface CronField {
  /** Allowed values, already normalised (day-of-week 7 folded onto 0). */
  readonly values: ReadonlySet<number>;
  /** Field text began with `*`; drives the day-of-month/day-of-week policy. */
  readonly wildcard: boolean;
  readonly source: string;
}

/**
 * Five-field calendar rule.
 */
export type RecurrencePattern = Readonly<Record<CronFieldName, CronField>>;

/**
 * Wall-clock fields of a single minute, read in the scheduler's time zone.
 */
export type CalendarInstant = Readonly<Record<CronFieldName, number>>;

export type JobEnvironment = Readonly<Record<string, string>>;

/**
 * A job loaded from the table. Frozen once created.
 */
export interface JobDefinition {
  /** Content-derived identifier, stable across reloads while the line is unchanged. */
  readonly id: string;
  /** 1-based line in the table source. */
  readonly line: number;
  /** Schedule text as written: five fields or a macro. */
  readonly schedule: string;
  readonly recurrence: RecurrencePattern;
  readonly identity: string;
  readonly command: string;
  readonly environment: JobEnvironment;
}

export type JobTable = readonly JobDefinition[];

/**
 * Outcome of loading a table: the jobs that parsed and one error per skipped line.
 */
export interface LoadResult {
  readonly jobs: JobTable;
  readonly errors: readonly ParseError[];
}

export type SchedulerState = 'idle' | 'checking' | 'dispatching' | 'stopped';

/**
 * Summary of one timer wake-up.
 */
export interface TickReport {
  /** Minutes evaluated, oldest first. */
  readonly minutes: readonly Date[];
  readonly due: number;
  readonly dispatched: number;
  readonly failed: number;
  /** Minutes dropped because the wake-up came later than the catch-up window. */
  readonly skippedMinutes: number;
}
