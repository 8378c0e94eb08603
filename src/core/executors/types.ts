/**
 * @fileoverview Executor contract and the wire payload of queued commands.
 * @module core/executors/types
 */

import { z } from 'zod';

import type { JobEnvironment } from '../scheduler/types';

/**
 * Everything an executor needs to run one due job.
 */
export interface LaunchRequest {
  readonly jobId: string;
  readonly command: string;
  readonly identity: string;
  readonly environment: JobEnvironment;
  /** Minute the job was due at. */
  readonly scheduledAt: Date;
}

export interface ExecutionOutcome {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
}

/**
 * Returned once the executor has accepted a job. Opaque to the scheduler apart
 * from logging.
 */
export interface ExecutionHandle {
  readonly executionId: string;
  readonly executor: string;
  readonly launchedAt: Date;
  /** Settles when the command ends, for executors that can observe it. */
  readonly completion?: Promise<ExecutionOutcome>;
}

/**
 * External launcher the scheduler hands due jobs to.
 */
export interface Executor {
  readonly name: string;
  /**
   * Start the job without waiting for it to finish.
   *
   * @throws {DispatchError} When the job could not be handed over
   */
  launch(request: LaunchRequest): Promise<ExecutionHandle>;
  /** Release connections held by the executor. */
  close?(): Promise<void>;
}

/**
 * Task identifier of queued commands.
 */
export const RUN_COMMAND_TASK = 'run-command';

/**
 * Payload written to the queue by the queue executor and read by the command worker.
 */
export const RunCommandPayloadSchema = z.object({
  jobId: z.string().min(1),
  command: z.string().min(1),
  identity: z.string().min(1),
  environment: z.record(z.string()),
  scheduledAt: z.string().datetime({ offset: true }),
});

export type RunCommandPayload = z.infer<typeof RunCommandPayloadSchema>;

export function toRunCommandPayload(request: LaunchRequest): RunCommandPayload {
  return RunCommandPayloadSchema.parse({
    jobId: request.jobId,
    command: request.command,
    identity: request.identity,
    environment: { ...request.environment },
    scheduledAt: request.scheduledAt.toISOString(),
  });
}

export function fromRunCommandPayload(payload: RunCommandPayload): LaunchRequest {
  return {
    jobId: payload.jobId,
    command: payload.command,
    identity: payload.identity,
    environment: payload.environment,
    scheduledAt: new Date(payload.scheduledAt),
  };
}
