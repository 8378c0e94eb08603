/**
 * @fileoverview Process and queue executor unit tests
 * @module tests/unit/executors
 */

import { ChildProcess } from 'node:child_process';
import { PassThrough } from 'node:stream';

import { describe, expect, it, vi } from 'vitest';

import { DispatchError } from '../../src/core/errors';
import { ProcessExecutor, QueueExecutor } from '../../src/core/executors';
import { createCapturingLogger, createTestLogger, launchRequest } from '../setup';

import type { EnqueueJob, SpawnCommand } from '../../src/core/executors';

interface FakeChild {
  child: ChildProcess;
  stdout: PassThrough;
  stderr: PassThrough;
}

function createFakeChild(pid: number | null = 4242): FakeChild {
  const child = new ChildProcess();
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  Object.defineProperty(child, 'pid', { value: pid ?? undefined });
  Object.defineProperty(child, 'stdout', { value: stdout });
  Object.defineProperty(child, 'stderr', { value: stderr });
  return { child, stdout, stderr };
}

describe('unit: Process Executor', () => {
  it('should run the command through the job shell', () => {
    const executor = new ProcessExecutor({ logger: createTestLogger(), currentUser: 'root' });

    expect(executor.buildInvocation(launchRequest({ command: 'echo hi' }))).toEqual({
      file: '/bin/bash',
      args: ['-c', 'echo hi'],
    });
  });

  it('should fall back to the default shell', () => {
    const executor = new ProcessExecutor({
      logger: createTestLogger(),
      defaultShell: '/bin/dash',
      currentUser: 'root',
    });

    expect(executor.buildInvocation(launchRequest({ environment: {} })).file).toBe('/bin/dash');
  });

  it('should switch to the job identity through sudo', () => {
    const executor = new ProcessExecutor({
      logger: createTestLogger(),
      switchUser: true,
      currentUser: 'root',
    });

    expect(
      executor.buildInvocation(launchRequest({ identity: 'dokku', command: 'dokku run app' }))
    ).toEqual({
      file: 'sudo',
      args: [
        '-n',
        '-u',
        'dokku',
        '--',
        'env',
        'PATH=/usr/bin:/bin',
        'SHELL=/bin/bash',
        '/bin/bash',
        '-c',
        'dokku run app',
      ],
    });
  });

  it('should not switch users for jobs owned by the current user', () => {
    const executor = new ProcessExecutor({
      logger: createTestLogger(),
      switchUser: true,
      currentUser: 'root',
    });

    expect(executor.buildInvocation(launchRequest({ identity: 'root' })).file).toBe('/bin/bash');
  });

  it('should resolve once the child has spawned and report its exit', async () => {
    const { child } = createFakeChild();
    const spawn = vi.fn<SpawnCommand>(() => child);
    const executor = new ProcessExecutor({ logger: createTestLogger(), currentUser: 'root', spawn });
    const request = launchRequest();

    const launching = executor.launch(request);
    child.emit('spawn');
    const handle = await launching;

    expect(handle.executionId).toBe('4242');
    expect(handle.executor).toBe('process');
    expect(spawn).toHaveBeenCalledWith('/bin/bash', ['-c', 'echo hello'], {
      env: { PATH: '/usr/bin:/bin', SHELL: '/bin/bash' },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    child.emit('close', 2, null);
    await expect(handle.completion).resolves.toEqual({ exitCode: 2, signal: null });
  });

  it('should fall back to the job id when the child has no pid', async () => {
    const { child } = createFakeChild(null);
    const executor = new ProcessExecutor({
      logger: createTestLogger(),
      currentUser: 'root',
      spawn: () => child,
    });

    const launching = executor.launch(launchRequest());
    child.emit('spawn');

    await expect(launching).resolves.toMatchObject({ executionId: '0123456789ab' });
  });

  it('should reject with a DispatchError when the child fails to start', async () => {
    const { child } = createFakeChild();
    const executor = new ProcessExecutor({
      logger: createTestLogger(),
      currentUser: 'root',
      spawn: () => child,
    });

    const launching = executor.launch(launchRequest());
    child.emit('error', new Error('spawn /bin/bash ENOENT'));

    await expect(launching).rejects.toBeInstanceOf(DispatchError);
    await expect(launching).rejects.toThrowError('Failed to start command: spawn /bin/bash ENOENT');
  });

  it('should reject with a DispatchError when spawn throws', async () => {
    const executor = new ProcessExecutor({
      logger: createTestLogger(),
      currentUser: 'root',
      spawn: () => {
        throw new Error('EAGAIN');
      },
    });

    await expect(executor.launch(launchRequest())).rejects.toMatchObject({
      message: 'Failed to start command: EAGAIN',
      jobId: '0123456789ab',
      executor: 'process',
    });
  });

  it('should log command output line by line', async () => {
    const { logger, lines } = createCapturingLogger();
    const { child, stdout, stderr } = createFakeChild();
    const executor = new ProcessExecutor({ logger, currentUser: 'root', spawn: () => child });

    const launching = executor.launch(launchRequest());
    child.emit('spawn');
    await launching;

    stdout.emit('data', 'first\nsec');
    stdout.emit('data', 'ond\n');
    stderr.emit('data', 'oops');
    stderr.emit('end');

    const output = lines.filter((line) => line['msg'] === 'Command output');
    expect(output.map((line) => [line['level'], line['stream'], line['output']])).toEqual([
      [30, 'stdout', 'first'],
      [30, 'stdout', 'second'],
      [40, 'stderr', 'oops'],
    ]);
    expect(output[0]?.['jobId']).toBe('0123456789ab');
  });
});

describe('unit: Queue Executor', () => {
  it('should enqueue a run-command job keyed by job and minute', async () => {
    const addJob = vi.fn<EnqueueJob>(async () => ({ id: '17' }));
    const executor = new QueueExecutor({ addJob });

    const handle = await executor.launch(launchRequest({ jobId: 'abc' }));

    expect(addJob).toHaveBeenCalledWith(
      'run-command',
      {
        jobId: 'abc',
        command: 'echo hello',
        identity: 'root',
        environment: { PATH: '/usr/bin:/bin', SHELL: '/bin/bash' },
        scheduledAt: '2024-06-02T02:23:00.000Z',
      },
      {
        maxAttempts: 1,
        jobKey: 'abc@2024-06-02T02:23:00.000Z',
        jobKeyMode: 'preserve_run_at',
      }
    );
    expect(handle.executionId).toBe('17');
    expect(handle.executor).toBe('queue');
    expect(handle.completion).toBeUndefined();
  });

  it('should pass the queue name and attempts when configured', async () => {
    const addJob = vi.fn<EnqueueJob>(async () => ({ id: '18' }));
    const executor = new QueueExecutor({ addJob, queueName: 'serial', maxAttempts: 3 });

    await executor.launch(launchRequest());

    expect(addJob.mock.calls[0]?.[2]).toEqual({
      maxAttempts: 3,
      jobKey: '0123456789ab@2024-06-02T02:23:00.000Z',
      jobKeyMode: 'preserve_run_at',
      queueName: 'serial',
    });
  });

  it('should reject with a DispatchError when the queue refuses the job', async () => {
    const addJob = vi.fn<EnqueueJob>(async () => {
      throw new Error('connection refused');
    });
    const executor = new QueueExecutor({ addJob });

    await expect(executor.launch(launchRequest())).rejects.toMatchObject({
      name: 'DispatchError',
      message: 'Failed to enqueue command: connection refused',
      executor: 'queue',
    });
  });

  it('should release its connection on close', async () => {
    const release = vi.fn(async () => undefined);
    const executor = new QueueExecutor({ addJob: async () => ({ id: '1' }), release });

    await executor.close();

    expect(release).toHaveBeenCalledTimes(1);
  });
});
