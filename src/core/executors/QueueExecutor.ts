/**
 * @fileoverview Executor that hands commands to the graphile-worker queue.
 * @module core/executors/QueueExecutor
 */

import { makeWorkerUtils, type Job, type TaskSpec } from 'graphile-worker';

import { DispatchError } from '../errors';

import { RUN_COMMAND_TASK, toRunCommandPayload } from './types';

import type { ExecutionHandle, Executor, LaunchRequest, RunCommandPayload } from './types';

/**
 * The slice of graphile-worker's `addJob` the executor relies on.
 */
export type EnqueueJob = (
  identifier: string,
  payload: RunCommandPayload,
  taskSpec: TaskSpec
) => Promise<Pick<Job, 'id'>>;

export interface QueueExecutorOptions {
  addJob: EnqueueJob;
  /** Named queue; jobs sharing a queue name run one at a time. */
  queueName?: string;
  maxAttempts?: number;
  release?: () => Promise<void>;
}

export interface QueueConnectionOptions {
  connectionString: string;
  schema?: string;
}

/**
 * Message-passing executor: each due job becomes a `run-command` job row.
 *
 * The job key combines the job id and its due minute, so a restart inside the
 * same minute updates the pending row instead of adding a second one.
 */
export class QueueExecutor implements Executor {
  readonly name = 'queue';

  private readonly addJob: EnqueueJob;
  private readonly queueName?: string;
  private readonly maxAttempts: number;
  private readonly release?: () => Promise<void>;

  constructor(options: QueueExecutorOptions) {
    this.addJob = options.addJob;
    this.queueName = options.queueName;
    this.maxAttempts = options.maxAttempts ?? 1;
    this.release = options.release;
  }

  /**
   * Create an executor backed by its own graphile-worker utils connection.
   */
  static async connect(
    connection: QueueConnectionOptions,
    options: Omit<QueueExecutorOptions, 'addJob' | 'release'> = {}
  ): Promise<QueueExecutor> {
    const utils = await makeWorkerUtils({
      connectionString: connection.connectionString,
      schema: connection.schema,
    });
    return new QueueExecutor({
      ...options,
      addJob: utils.addJob,
      release: async () => {
        await utils.release();
      },
    });
  }

  static jobKeyFor(request: LaunchRequest): string {
    return `${request.jobId}@${request.scheduledAt.toISOString()}`;
  }

  async launch(request: LaunchRequest): Promise<ExecutionHandle> {
    const taskSpec: TaskSpec = {
      maxAttempts: this.maxAttempts,
      jobKey: QueueExecutor.jobKeyFor(request),
      jobKeyMode: 'preserve_run_at',
    };
    if (this.queueName) {
      taskSpec.queueName = this.queueName;
    }

    try {
      const job = await this.addJob(RUN_COMMAND_TASK, toRunCommandPayload(request), taskSpec);
      return {
        executionId: String(job.id),
        executor: this.name,
        launchedAt: new Date(),
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DispatchError(`Failed to enqueue command: ${reason}`, request.jobId, this.name, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    await this.release?.();
  }
}
