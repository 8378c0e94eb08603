/**
 * @fileoverview Job registry for graphile-worker task lists
 * @module core/worker/JobRegistry
 */

import type { TaskList } from 'graphile-worker';
import type { Logger } from 'pino';

import type { IJob, JobName } from '../types';

/**
 * Registry of the tasks a worker process can run
 *
 * @example
 * ```typescript
 * const registry = new JobRegistry(logger);
 * registry.register(new RunCommandJob({ executor }));
 *
 * const runner = await run({ connectionString, taskList: registry.getTaskList() });
 * ```
 */
export class JobRegistry {
  private readonly jobs = new Map<JobName, IJob>();
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Register a job
   *
   * @throws {Error} If a job with the same name is already registered
   */
  register(job: IJob): this {
    if (this.jobs.has(job.jobName)) {
      throw new Error(`Job '${job.jobName}' is already registered`);
    }

    this.jobs.set(job.jobName, job);
    this.logger?.info({ jobName: job.jobName }, `Registered job: ${job.jobName}`);
    return this;
  }

  getJob(name: JobName): IJob | undefined {
    return this.jobs.get(name);
  }

  getJobNames(): JobName[] {
    return Array.from(this.jobs.keys());
  }

  /**
   * Build the graphile-worker task list
   */
  getTaskList(): TaskList {
    const tasks: TaskList = {};

    for (const [name, job] of this.jobs) {
      tasks[name] = job.getTaskFunction();
    }

    return tasks;
  }
}
