/**
 * @fileoverview Base class for graphile-worker tasks with payload validation and lifecycle hooks
 * @module core/abstractions/BaseJob
 */

import { SpanStatusCode, trace, type Span } from '@opentelemetry/api';
import { z } from 'zod';

import type { IJob, JobContext, JobHelpers, JobId, JobName } from '../types';
import type { Task } from 'graphile-worker';

/**
 * Abstract base class for worker tasks
 *
 * @template TPayload - Zod schema type for payload validation
 * @template TResult - Job execution result type
 *
 * @example
 * ```typescript
 * class RunCommandJob extends BaseJob<typeof RunCommandPayloadSchema, ExecutionOutcome> {
 *   readonly jobName = 'run-command' as JobName;
 *   readonly schema = RunCommandPayloadSchema;
 *
 *   async execute(payload, context) {
 *     return this.run(payload);
 *   }
 * }
 * ```
 */
export abstract class BaseJob<TPayload extends z.ZodTypeAny, TResult = void>
  implements IJob<TPayload, TResult>
{
  public abstract readonly jobName: JobName;

  public abstract readonly schema: TPayload;

  private readonly tracer = trace.getTracer('cron-dispatch.worker');

  abstract execute(payload: z.infer<TPayload>, context: JobContext): Promise<TResult>;

  /**
   * Validate job payload against schema
   *
   * @throws {Error} If validation fails
   */
  validate(payload: unknown): z.infer<TPayload> {
    const result = this.schema.safeParse(payload);
    if (result.success) {
      return result.data;
    }

    const formattedErrors = result.error.errors.map((err) => ({
      path: err.path.join('.'),
      message: err.message,
      code: err.code,
    }));
    throw new Error(`Payload validation failed: ${JSON.stringify(formattedErrors)}`);
  }

  /**
   * Pre-execution hook
   */
  async beforeExecute(_payload: z.infer<TPayload>, context: JobContext): Promise<void> {
    context.logger.info(`Starting job: ${this.jobName}`, {
      jobId: context.jobId,
      attemptNumber: context.attemptNumber,
    });

    context.span.setAttributes({
      'job.name': this.jobName,
      'job.id': context.jobId,
      'job.attempt': context.attemptNumber,
      'job.max_attempts': context.maxAttempts,
    });
  }

  /**
   * Post-execution hook
   */
  async afterExecute(_result: TResult, context: JobContext): Promise<void> {
    context.logger.info(`Completed job: ${this.jobName}`, {
      jobId: context.jobId,
      duration: Date.now() - context.startedAt.getTime(),
    });
    context.span.setAttribute('job.status', 'completed');
  }

  /**
   * Error handling hook
   */
  async onError(error: Error, context: JobContext): Promise<void> {
    const retryable = context.attemptNumber < context.maxAttempts;
    context.logger.error(`Job failed: ${this.jobName}`, {
      jobId: context.jobId,
      attemptNumber: context.attemptNumber,
      maxAttempts: context.maxAttempts,
      retryable,
      error: error.message,
    });

    context.span.recordException(error);
    context.span.setAttributes({
      'job.status': 'failed',
      'job.error.message': error.message,
      'job.error.retryable': retryable,
    });
  }

  protected createContext(helpers: JobHelpers, span: Span): JobContext {
    return {
      logger: helpers.logger,
      span,
      jobId: helpers.job.id as JobId,
      jobName: this.jobName,
      attemptNumber: helpers.job.attempts,
      maxAttempts: helpers.job.max_attempts,
      startedAt: new Date(),
    };
  }

  /**
   * Task function registered with graphile-worker
   */
  getTaskFunction(): Task {
    return async (payload: unknown, helpers: JobHelpers): Promise<void> => {
      const span = this.tracer.startSpan(`job.${this.jobName}`);
      const context = this.createContext(helpers, span);

      try {
        const validatedPayload = this.validate(payload);
        await this.beforeExecute(validatedPayload, context);
        const result = await this.execute(validatedPayload, context);
        await this.afterExecute(result, context);
        span.setStatus({ code: SpanStatusCode.OK });
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        await this.onError(err, context);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        throw err;
      } finally {
        span.end();
      }
    };
  }
}
