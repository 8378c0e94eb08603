/**
 * @fileoverview Recurrence scheduler unit tests
 * @module tests/unit/scheduler
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConfigError, DispatchError } from '../../src/core/errors';
import { RecurrenceScheduler } from '../../src/core/scheduler';
import { createTestLogger, RecordingExecutor } from '../setup';

import type { RecurrenceSchedulerOptions } from '../../src/core/scheduler';

const TABLE = ['* * * * * root echo every', '30 12 * * * root echo noon'].join('\n');

function createScheduler(
  executor: RecordingExecutor,
  options: Partial<RecurrenceSchedulerOptions> = {}
): RecurrenceScheduler {
  return new RecurrenceScheduler({
    executor,
    logger: createTestLogger(),
    timezone: 'UTC',
    ...options,
  });
}

describe('unit: Recurrence Scheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should start idle with an empty table', () => {
    const scheduler = createScheduler(new RecordingExecutor());

    expect(scheduler.jobs).toEqual([]);
    expect(scheduler.currentState).toBe('idle');
    expect(scheduler.isRunning).toBe(false);
  });

  it('should answer due queries without changing the table', () => {
    const scheduler = createScheduler(new RecordingExecutor());
    scheduler.load(TABLE);
    const table = scheduler.jobs;
    const noon = new Date('2024-06-03T12:30:40Z');

    const first = scheduler.due(noon);
    const second = scheduler.due(noon);

    expect(first.map((job) => job.command)).toEqual(['echo every', 'echo noon']);
    expect(second).toEqual(first);
    expect(scheduler.jobs).toBe(table);
  });

  it('should apply the either-day policy when both day fields are restricted', () => {
    const scheduler = createScheduler(new RecordingExecutor());
    scheduler.load('0 9 13 * 5 root echo friday');

    expect(scheduler.due(new Date('2024-09-06T09:00:00Z'))).toHaveLength(1);
    expect(scheduler.due(new Date('2024-09-14T09:00:00Z'))).toHaveLength(0);
  });

  it('should replace the table as a whole on reload', () => {
    const scheduler = createScheduler(new RecordingExecutor());
    scheduler.load(TABLE);
    const previous = scheduler.jobs;

    const result = scheduler.load('0 0 * * * root echo midnight');

    expect(scheduler.jobs).toBe(result.jobs);
    expect(scheduler.jobs.map((job) => job.command)).toEqual(['echo midnight']);
    expect(previous.map((job) => job.command)).toEqual(['echo every', 'echo noon']);
    expect(Object.isFrozen(previous)).toBe(true);
  });

  it('should keep the loaded table when the file cannot be read', async () => {
    const scheduler = createScheduler(new RecordingExecutor());
    scheduler.load(TABLE);
    const previous = scheduler.jobs;

    await expect(scheduler.loadFile('/nonexistent/cron-dispatch/crontab')).rejects.toBeInstanceOf(
      ConfigError
    );
    expect(scheduler.jobs).toBe(previous);
  });

  it('should hand the job to the executor', async () => {
    const executor = new RecordingExecutor();
    const scheduler = createScheduler(executor, { defaults: { PATH: '/usr/bin:/bin' } });
    scheduler.load(TABLE);
    const job = scheduler.jobs[1];
    if (!job) throw new Error('table did not load');
    const scheduledAt = new Date('2024-06-03T12:30:00Z');

    const handle = await scheduler.dispatch(job, scheduledAt);

    expect(handle.executionId).toBe('exec-1');
    expect(executor.requests).toEqual([
      {
        jobId: job.id,
        command: 'echo noon',
        identity: 'root',
        environment: { PATH: '/usr/bin:/bin' },
        scheduledAt,
      },
    ]);
  });

  it('should wrap executor failures in a DispatchError', async () => {
    const executor = new RecordingExecutor({ fail: () => true });
    const scheduler = createScheduler(executor);
    scheduler.load(TABLE);
    const job = scheduler.jobs[0];
    if (!job) throw new Error('table did not load');

    const dispatching = scheduler.dispatch(job, new Date('2024-06-03T12:30:00Z'));

    await expect(dispatching).rejects.toBeInstanceOf(DispatchError);
    await expect(dispatching).rejects.toMatchObject({
      message: 'refused echo every',
      jobId: job.id,
      executor: 'recording',
      code: 'DISPATCH_ERROR',
    });
  });

  it('should evaluate only the current minute on the first tick', async () => {
    const executor = new RecordingExecutor();
    const scheduler = createScheduler(executor);
    scheduler.load(TABLE);

    const report = await scheduler.tick(new Date('2024-06-03T12:30:10Z'));

    expect(report).toEqual({
      minutes: [new Date('2024-06-03T12:30:00Z')],
      due: 2,
      dispatched: 2,
      failed: 0,
      skippedMinutes: 0,
    });
    expect(executor.requests.map((request) => request.command)).toEqual(['echo every', 'echo noon']);
  });

  it('should never evaluate a minute twice', async () => {
    const executor = new RecordingExecutor();
    const scheduler = createScheduler(executor);
    scheduler.load(TABLE);

    await scheduler.tick(new Date('2024-06-03T12:30:10Z'));
    const again = await scheduler.tick(new Date('2024-06-03T12:30:50Z'));

    expect(again.minutes).toEqual([]);
    expect(executor.requests).toHaveLength(2);
  });

  it('should catch up on missed minutes within the window', async () => {
    const executor = new RecordingExecutor();
    const scheduler = createScheduler(executor, { maxCatchUpMinutes: 5 });
    scheduler.load(TABLE);

    await scheduler.tick(new Date('2024-06-03T12:30:10Z'));
    const report = await scheduler.tick(new Date('2024-06-03T12:33:05Z'));

    expect(report.minutes).toEqual([
      new Date('2024-06-03T12:31:00Z'),
      new Date('2024-06-03T12:32:00Z'),
      new Date('2024-06-03T12:33:00Z'),
    ]);
    expect(report.dispatched).toBe(3);
    expect(executor.requests.slice(2).map((request) => request.scheduledAt)).toEqual(report.minutes);
  });

  it('should skip missed minutes beyond the window', async () => {
    const executor = new RecordingExecutor();
    const scheduler = createScheduler(executor, { maxCatchUpMinutes: 5 });
    scheduler.load(TABLE);

    await scheduler.tick(new Date('2024-06-03T12:30:10Z'));
    const report = await scheduler.tick(new Date('2024-06-03T12:43:00Z'));

    expect(report).toEqual({
      minutes: [new Date('2024-06-03T12:43:00Z')],
      due: 1,
      dispatched: 1,
      failed: 0,
      skippedMinutes: 12,
    });
  });

  it('should re-anchor when the clock moves backwards', async () => {
    const executor = new RecordingExecutor();
    const scheduler = createScheduler(executor);
    scheduler.load(TABLE);

    await scheduler.tick(new Date('2024-06-03T12:30:10Z'));
    const back = await scheduler.tick(new Date('2024-06-03T12:20:00Z'));
    const next = await scheduler.tick(new Date('2024-06-03T12:21:00Z'));

    expect(back.minutes).toEqual([new Date('2024-06-03T12:20:00Z')]);
    expect(next.minutes).toEqual([new Date('2024-06-03T12:21:00Z')]);
  });

  it('should keep dispatching other jobs when one fails', async () => {
    const executor = new RecordingExecutor({ fail: (request) => request.command === 'echo every' });
    const scheduler = createScheduler(executor);
    scheduler.load(TABLE);

    const report = await scheduler.tick(new Date('2024-06-03T12:30:00Z'));

    expect(report.failed).toBe(1);
    expect(report.dispatched).toBe(1);
    expect(executor.requests.map((request) => request.command)).toEqual(['echo noon']);
    expect(scheduler.currentState).toBe('idle');
  });

  it('should first evaluate the minute after start', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-06-03T12:30:20Z'));
    const executor = new RecordingExecutor();
    const scheduler = createScheduler(executor);
    scheduler.load('* * * * * root echo every');

    scheduler.start();
    await vi.advanceTimersByTimeAsync(39_000);
    expect(executor.requests).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1_000);
    await scheduler.stop();

    expect(executor.requests.map((request) => request.scheduledAt)).toEqual([
      new Date('2024-06-03T12:31:00Z'),
    ]);
    expect(scheduler.currentState).toBe('stopped');
    expect(scheduler.isRunning).toBe(false);
  });
});
