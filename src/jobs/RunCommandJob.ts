/**
 * @fileoverview Worker task that runs commands handed over by the queue executor.
 * @module jobs/RunCommandJob
 */

import { BaseJob } from '../core/abstractions/BaseJob';
import {
  RUN_COMMAND_TASK,
  RunCommandPayloadSchema,
  fromRunCommandPayload,
  type ExecutionOutcome,
  type Executor,
  type RunCommandPayload,
} from '../core/executors';

import type { CommandMetrics } from '../core/instrumentation/metrics';
import type { JobContext, JobName } from '../core/types';

export interface RunCommandJobOptions {
  /** Executor that can observe completion, normally a ProcessExecutor. */
  executor: Executor;
  metrics?: CommandMetrics;
}

/**
 * Runs one queued command to completion. A non-zero exit or a signal fails the
 * job; graphile-worker then applies the job's own `maxAttempts`.
 */
export class RunCommandJob extends BaseJob<typeof RunCommandPayloadSchema, ExecutionOutcome> {
  readonly jobName = RUN_COMMAND_TASK as JobName;
  readonly schema = RunCommandPayloadSchema;

  private readonly executor: Executor;
  private readonly metrics?: CommandMetrics;

  constructor(options: RunCommandJobOptions) {
    super();
    this.executor = options.executor;
    this.metrics = options.metrics;
  }

  async execute(payload: RunCommandPayload, context: JobContext): Promise<ExecutionOutcome> {
    const startedAt = Date.now();
    this.metrics?.incrementActive(payload.jobId);

    try {
      const handle = await this.executor.launch(fromRunCommandPayload(payload));
      if (!handle.completion) {
        throw new Error(`Executor '${handle.executor}' cannot report command completion`);
      }

      context.span.setAttribute('command.execution_id', handle.executionId);
      const outcome = await handle.completion;

      if (outcome.exitCode !== 0) {
        const reason =
          outcome.signal !== null ? `signal ${outcome.signal}` : `exit code ${String(outcome.exitCode)}`;
        throw new Error(`Command for job ${payload.jobId} ended with ${reason}`);
      }

      this.metrics?.recordCommand(payload.jobId, 'success', Date.now() - startedAt);
      return outcome;
    } catch (error) {
      this.metrics?.recordCommand(payload.jobId, 'failure', Date.now() - startedAt);
      throw error;
    } finally {
      this.metrics?.decrementActive(payload.jobId);
    }
  }
}
