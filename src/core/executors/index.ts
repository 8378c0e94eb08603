/**
 * @fileoverview Public entry-point for executors.
 * @module core/executors
 */

export { ProcessExecutor } from './ProcessExecutor';
export { QueueExecutor } from './QueueExecutor';
export {
  RUN_COMMAND_TASK,
  RunCommandPayloadSchema,
  fromRunCommandPayload,
  toRunCommandPayload,
} from './types';
export type {
  ExecutionHandle,
  ExecutionOutcome,
  Executor,
  LaunchRequest,
  RunCommandPayload,
} from './types';
export type { ProcessExecutorOptions, SpawnCommand } from './ProcessExecutor';
export type { EnqueueJob, QueueConnectionOptions, QueueExecutorOptions } from './QueueExecutor';
