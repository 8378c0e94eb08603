/**
 * @fileoverview Public entry-point for scheduler utilities.
 * @module core/scheduler
 */

export { RecurrenceScheduler } from './RecurrenceScheduler';
export { dueAt, dueJobs, matches, parseField, parseRecurrence, SCHEDULE_MACROS } from './cron';
export { minuteKey, minuteStart, msUntilNextMinute, toCalendarInstant } from './calendar';
export { loadTableFile, parseJobLine, parseTable, readTableFile } from './table';
export type { RecurrenceSchedulerOptions } from './RecurrenceScheduler';
export type { LoadOptions } from './table';
export type {
  CalendarInstant,
  CronField,
  CronFieldName,
  JobDefinition,
  JobEnvironment,
  JobTable,
  LoadResult,
  RecurrencePattern,
  SchedulerState,
  TickReport,
} from './types';
