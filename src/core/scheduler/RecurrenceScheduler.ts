/**
 * @fileoverview Minute-resolution scheduler over an immutable job table.
 * @module core/scheduler/RecurrenceScheduler
 */

import { DispatchError, toError } from '../errors';
import { logError } from '../instrumentation/logger';
import { getTracer, withTracing } from '../instrumentation/tracing';

import { minuteKey, minuteStart, msUntilNextMinute } from './calendar';
import { dueAt } from './cron';
import { loadTableFile, parseTable, type LoadOptions } from './table';

import type { ExecutionHandle, Executor, LaunchRequest } from '../executors/types';
import type { SchedulerMetrics } from '../instrumentation/metrics';
import type {
  JobDefinition,
  JobTable,
  LoadResult,
  SchedulerState,
  TickReport,
} from './types';
import type { Tracer } from '@opentelemetry/api';
import type { Logger } from 'pino';

export interface RecurrenceSchedulerOptions {
  executor: Executor;
  logger: Logger;
  metrics?: SchedulerMetrics;
  tracer?: Tracer;
  /** IANA zone for reading the wall clock; host local time when omitted. */
  timezone?: string;
  /** Missed minutes still evaluated after a late wake-up. */
  maxCatchUpMinutes?: number;
  /** Environment applied to every job unless the table overrides it. */
  defaults?: LoadOptions['defaults'];
  clock?: () => Date;
}

const EMPTY_TABLE: JobTable = Object.freeze([]);

/**
 * Holds the loaded job table, finds the jobs due at each minute and hands them
 * to the executor.
 *
 * @remarks
 * The table is replaced as a whole on every load; readers always see either
 * the old or the new table.
 *
 * ```ts
 * const scheduler = new RecurrenceScheduler({ executor, logger });
 * await scheduler.loadFile('/etc/cron-dispatch/crontab');
 * scheduler.start();
 * ```
 */
export class RecurrenceScheduler {
  private readonly executor: Executor;
  private readonly logger: Logger;
  private readonly metrics?: SchedulerMetrics;
  private readonly tracer: Tracer;
  private readonly timezone?: string;
  private readonly maxCatchUpMinutes: number;
  private readonly defaults?: LoadOptions['defaults'];
  private readonly clock: () => Date;

  private table: JobTable = EMPTY_TABLE;
  private state: SchedulerState = 'idle';
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private lastMinute: number | null = null;
  private activeTick: Promise<TickReport> | null = null;

  constructor(options: RecurrenceSchedulerOptions) {
    this.executor = options.executor;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.tracer = options.tracer ?? getTracer('cron-dispatch.scheduler');
    this.timezone = options.timezone;
    this.maxCatchUpMinutes = options.maxCatchUpMinutes ?? 5;
    this.defaults = options.defaults;
    this.clock = options.clock ?? (() => new Date());
  }

  get jobs(): JobTable {
    return this.table;
  }

  get currentState(): SchedulerState {
    return this.state;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Parse table text and replace the loaded table with the result.
   * Lines that fail to parse are logged and skipped.
   */
  load(source: string): LoadResult {
    return this.install(parseTable(source, { defaults: this.defaults }));
  }

  /**
   * Read, parse and install the table file.
   *
   * @throws {ConfigError} When the file cannot be read; the loaded table is kept
   */
  async loadFile(path: string): Promise<LoadResult> {
    const result = await loadTableFile(path, { defaults: this.defaults });
    this.logger.debug({ path }, 'Read job table');
    return this.install(result);
  }

  /**
   * Jobs whose recurrence fires at the minute containing `instant`.
   */
  due(instant: Date): JobDefinition[] {
    return dueAt(this.table, instant, this.timezone);
  }

  /**
   * Hand one job to the executor. Resolves once the executor accepted it.
   *
   * @throws {DispatchError} When the executor could not launch the job
   */
  async dispatch(job: JobDefinition, scheduledAt: Date = this.clock()): Promise<ExecutionHandle> {
    const request: LaunchRequest = {
      jobId: job.id,
      command: job.command,
      identity: job.identity,
      environment: job.environment,
      scheduledAt,
    };

    try {
      const handle = await withTracing(
        this.tracer,
        'scheduler.dispatch',
        () => this.executor.launch(request),
        {
          'job.id': job.id,
          'job.identity': job.identity,
          'job.line': job.line,
          'executor.name': this.executor.name,
        }
      );

      this.metrics?.recordDispatch(job.id, this.executor.name, 'launched');
      this.logger.info(
        {
          jobId: job.id,
          line: job.line,
          identity: job.identity,
          executionId: handle.executionId,
          executor: handle.executor,
          scheduledAt: scheduledAt.toISOString(),
        },
        'Dispatched job'
      );
      this.watchCompletion(job, handle);
      return handle;
    } catch (error) {
      const dispatchError =
        error instanceof DispatchError
          ? error
          : new DispatchError(toError(error).message, job.id, this.executor.name, { cause: error });

      this.metrics?.recordDispatch(job.id, this.executor.name, 'failed');
      logError(this.logger, dispatchError, 'Job dispatch failed; job missed for this minute', {
        jobId: job.id,
        line: job.line,
        scheduledAt: scheduledAt.toISOString(),
      });
      throw dispatchError;
    }
  }

  /**
   * Evaluate every minute since the last evaluated one, up to `now`.
   *
   * Dispatch failures are logged and counted; they never reject the tick.
   */
  async tick(now: Date = this.clock()): Promise<TickReport> {
    const minutes = this.minutesToEvaluate(minuteKey(now));
    let due = 0;
    let dispatched = 0;
    let failed = 0;

    try {
      for (const key of minutes.keys) {
        const instant = minuteStart(key);
        this.state = 'checking';
        const jobs = this.due(instant);
        this.metrics?.recordTick(jobs.length, key !== minuteKey(now));
        due += jobs.length;

        if (jobs.length === 0) {
          continue;
        }

        this.state = 'dispatching';
        const results = await Promise.allSettled(jobs.map((job) => this.dispatch(job, instant)));
        for (const result of results) {
          if (result.status === 'fulfilled') {
            dispatched += 1;
          } else {
            failed += 1;
          }
        }
      }
    } finally {
      this.state = 'idle';
    }

    return {
      minutes: minutes.keys.map(minuteStart),
      due,
      dispatched,
      failed,
      skippedMinutes: minutes.skipped,
    };
  }

  /**
   * Start the minute timer. The minute the scheduler starts in is not
   * evaluated; the first evaluation happens at the next minute boundary.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Scheduler already running');
      return;
    }

    this.running = true;
    this.state = 'idle';
    this.lastMinute = minuteKey(this.clock());
    this.logger.info(
      { jobs: this.table.length, timezone: this.timezone ?? 'local' },
      'Scheduler started'
    );
    this.scheduleNext();
  }

  /**
   * Stop the timer and wait for an in-progress tick to finish handing off jobs.
   * Jobs already launched keep running.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.activeTick) {
      await this.activeTick.catch(() => undefined);
    }

    this.state = 'stopped';
    this.logger.info('Scheduler stopped');
  }

  private install(result: LoadResult): LoadResult {
    for (const error of result.errors) {
      this.logger.warn(
        { line: error.line, text: error.text, code: error.code },
        `Skipping job table line: ${error.message}`
      );
    }

    this.table = result.jobs;
    this.metrics?.recordParseFailures(result.errors.length);
    this.metrics?.setLoadedJobs(result.jobs.length);
    this.logger.info(
      { jobs: result.jobs.length, skipped: result.errors.length },
      'Job table loaded'
    );
    return result;
  }

  private minutesToEvaluate(nowKey: number): { keys: number[]; skipped: number } {
    const last = this.lastMinute;

    if (last === null || nowKey < last) {
      if (last !== null) {
        this.logger.warn(
          { from: minuteStart(last).toISOString(), to: minuteStart(nowKey).toISOString() },
          'Clock moved backwards; re-anchoring on the current minute'
        );
      }
      this.lastMinute = nowKey;
      return { keys: [nowKey], skipped: 0 };
    }

    if (nowKey === last) {
      return { keys: [], skipped: 0 };
    }

    this.lastMinute = nowKey;
    const missed = nowKey - last - 1;
    if (missed > this.maxCatchUpMinutes) {
      this.logger.warn(
        { missedMinutes: missed, maxCatchUpMinutes: this.maxCatchUpMinutes },
        'Woke up too late to catch up; evaluating the current minute only'
      );
      return { keys: [nowKey], skipped: missed };
    }

    const keys: number[] = [];
    for (let key = last + 1; key <= nowKey; key += 1) {
      keys.push(key);
    }
    return { keys, skipped: 0 };
  }

  private scheduleNext(): void {
    if (!this.running) return;

    const delay = msUntilNextMinute(this.clock());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.activeTick = this.tick();
      void this.activeTick
        .then((report) => {
          if (report.due > 0 || report.skippedMinutes > 0) {
            this.logger.debug({ ...report, minutes: report.minutes.length }, 'Tick complete');
          }
        })
        .catch((error: unknown) => {
          logError(this.logger, toError(error), 'Scheduler tick failed');
        })
        .finally(() => {
          this.activeTick = null;
          this.scheduleNext();
        });
    }, delay);
  }

  private watchCompletion(job: JobDefinition, handle: ExecutionHandle): void {
    if (!handle.completion) return;

    void handle.completion.then(
      (outcome) => {
        const context = {
          jobId: job.id,
          executionId: handle.executionId,
          exitCode: outcome.exitCode,
          signal: outcome.signal,
        };
        if (outcome.exitCode === 0) {
          this.logger.info(context, 'Job finished');
        } else {
          this.logger.warn(context, 'Job finished with failure');
        }
      },
      (error: unknown) => {
        logError(this.logger, toError(error), 'Lost track of job process', {
          jobId: job.id,
          executionId: handle.executionId,
        });
      }
    );
  }
}
