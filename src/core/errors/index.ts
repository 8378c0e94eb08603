/**
 * @fileoverview Error taxonomy shared by the scheduler, loader and executors
 * @module core/errors
 */

export type SchedulerErrorCode = 'PARSE_ERROR' | 'DISPATCH_ERROR' | 'CONFIG_ERROR';

/**
 * Base class for every error the scheduler raises on purpose.
 */
export abstract class SchedulerError extends Error {
  abstract readonly code: SchedulerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * A job table line that could not be turned into a job definition.
 * Recovered by skipping the line.
 */
export class ParseError extends SchedulerError {
  readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    readonly line: number,
    readonly text: string
  ) {
    super(`line ${line}: ${message}`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), line: this.line, text: this.text };
  }
}

/**
 * The executor refused or failed to launch a job. The job is missed for that tick.
 */
export class DispatchError extends SchedulerError {
  readonly code = 'DISPATCH_ERROR';

  constructor(
    message: string,
    readonly jobId: string,
    readonly executor: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), jobId: this.jobId, executor: this.executor };
  }
}

/**
 * Unreadable table file or invalid configuration. Fatal at start-up.
 */
export class ConfigError extends SchedulerError {
  readonly code = 'CONFIG_ERROR';
}

export function isSchedulerError(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError;
}

/**
 * Normalise anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
