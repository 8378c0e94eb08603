/**
 * @fileoverview Executor that runs commands as local child processes.
 * @module core/executors/ProcessExecutor
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { userInfo } from 'node:os';

import { DispatchError } from '../errors';

import type { ExecutionHandle, ExecutionOutcome, Executor, LaunchRequest } from './types';
import type { Logger } from 'pino';
import type { Readable } from 'node:stream';

export type SpawnCommand = (
  file: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

export interface ProcessExecutorOptions {
  logger: Logger;
  /** Interpreter used when the job environment has no `SHELL`. */
  defaultShell?: string;
  /** Run commands as their table identity via `sudo -n -u`. */
  switchUser?: boolean;
  /** User the daemon runs as; no switch happens for jobs owned by it. */
  currentUser?: string;
  spawn?: SpawnCommand;
}

export interface Invocation {
  readonly file: string;
  readonly args: readonly string[];
}

const MAX_OUTPUT_LINE = 2000;

function resolveCurrentUser(): string | undefined {
  try {
    return userInfo().username;
  } catch {
    // No passwd entry for the current uid (common in containers)
    return undefined;
  }
}

/**
 * Spawns `<shell> -c <command>` and resolves as soon as the child is running.
 *
 * @example
 * ```ts
 * const executor = new ProcessExecutor({ logger, switchUser: true });
 * const handle = await executor.launch(request);
 * ```
 */
export class ProcessExecutor implements Executor {
  readonly name = 'process';

  private readonly logger: Logger;
  private readonly defaultShell: string;
  private readonly switchUser: boolean;
  private readonly currentUser: string | undefined;
  private readonly spawnCommand: SpawnCommand;

  constructor(options: ProcessExecutorOptions) {
    this.logger = options.logger;
    this.defaultShell = options.defaultShell ?? '/bin/sh';
    this.switchUser = options.switchUser ?? false;
    this.currentUser = options.currentUser ?? resolveCurrentUser();
    this.spawnCommand = options.spawn ?? spawn;
  }

  /**
   * Build the program and arguments for a request.
   */
  buildInvocation(request: LaunchRequest): Invocation {
    const shell = request.environment['SHELL'] ?? this.defaultShell;

    if (this.switchUser && request.identity !== this.currentUser) {
      // sudo resets the environment, so pass it through env(1)
      const assignments = Object.entries(request.environment).map(
        ([name, value]) => `${name}=${value}`
      );
      return {
        file: 'sudo',
        args: ['-n', '-u', request.identity, '--', 'env', ...assignments, shell, '-c', request.command],
      };
    }

    return { file: shell, args: ['-c', request.command] };
  }

  launch(request: LaunchRequest): Promise<ExecutionHandle> {
    const invocation = this.buildInvocation(request);
    const logger = this.logger.child({ jobId: request.jobId, identity: request.identity });

    return new Promise<ExecutionHandle>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = this.spawnCommand(invocation.file, invocation.args, {
          env: { ...request.environment },
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        reject(this.toDispatchError(request, error));
        return;
      }

      const onLaunchError = (error: Error): void => {
        reject(this.toDispatchError(request, error));
      };

      child.once('error', onLaunchError);
      child.once('spawn', () => {
        child.off('error', onLaunchError);
        const executionId = child.pid === undefined ? request.jobId : String(child.pid);

        this.forwardOutput(child.stdout, logger, 'stdout');
        this.forwardOutput(child.stderr, logger, 'stderr');

        const completion = new Promise<ExecutionOutcome>((settle, fail) => {
          child.once('error', fail);
          child.once('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
            settle({ exitCode, signal });
          });
        });

        resolve({
          executionId,
          executor: this.name,
          launchedAt: new Date(),
          completion,
        });
      });
    });
  }

  private forwardOutput(
    stream: Readable | null,
    logger: Logger,
    source: 'stdout' | 'stderr'
  ): void {
    if (!stream) return;

    stream.setEncoding('utf8');
    let pending = '';

    const emit = (line: string): void => {
      if (line === '') return;
      const output = line.length > MAX_OUTPUT_LINE ? `${line.slice(0, MAX_OUTPUT_LINE)}…` : line;
      if (source === 'stderr') {
        logger.warn({ stream: source, output }, 'Command output');
      } else {
        logger.info({ stream: source, output }, 'Command output');
      }
    };

    stream.on('data', (chunk: string) => {
      const lines = (pending + chunk).split('\n');
      pending = lines.pop() ?? '';
      lines.forEach(emit);
    });
    stream.on('end', () => {
      emit(pending);
      pending = '';
    });
  }

  private toDispatchError(request: LaunchRequest, error: unknown): DispatchError {
    const reason = error instanceof Error ? error.message : String(error);
    return new DispatchError(`Failed to start command: ${reason}`, request.jobId, this.name, {
      cause: error,
    });
  }
}
