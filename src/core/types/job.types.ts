/**
 * @fileoverview Types shared by graphile-worker tasks
 * @module core/types/job
 */

import type { Brand } from './common.types';
import type { Span } from '@opentelemetry/api';
import type { Logger as GraphileLogger, Task } from 'graphile-worker';
import type { z } from 'zod';

export type { JobHelpers } from 'graphile-worker';

/**
 * Job identifier - branded string for type safety
 */
export type JobId = Brand<string, 'JobId'>;

/**
 * Job name - branded string for type safety
 */
export type JobName = Brand<string, 'JobName'>;

/**
 * Context handed to a task's execute method
 */
export interface JobContext {
  logger: GraphileLogger;
  span: Span;
  jobId: JobId;
  jobName: JobName;
  attemptNumber: number;
  maxAttempts: number;
  startedAt: Date;
}

/**
 * Task contract registered with graphile-worker
 * @template TPayload - Zod schema of the payload
 * @template TResult - Execution result
 */
export interface IJob<TPayload extends z.ZodTypeAny = z.ZodTypeAny, TResult = unknown> {
  readonly jobName: JobName;
  readonly schema: TPayload;
  validate(payload: unknown): z.infer<TPayload>;
  execute(payload: z.infer<TPayload>, context: JobContext): Promise<TResult>;
  getTaskFunction(): Task;
}
