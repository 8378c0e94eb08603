#!/usr/bin/env node
/**
 * @fileoverview Command worker entry point: runs commands queued by the scheduler daemon
 * @module worker
 */

import { run, type RunnerOptions } from 'graphile-worker';
import { Pool } from 'pg';

import { createHealthServer } from './api/healthServer';
import { getConfig, getDatabaseUrl } from './core/config';
import { toError } from './core/errors';
import { ProcessExecutor } from './core/executors';
import {
  CommandMetrics,
  createLogger,
  forComponent,
  setupMetrics,
  setupTracing,
} from './core/instrumentation';
import { GracefulShutdown } from './core/lifecycle/GracefulShutdown';
import { JobRegistry } from './core/worker/JobRegistry';
import { RunCommandJob } from './jobs/RunCommandJob';

/**
 * Main worker function
 */
async function main(): Promise<void> {
  const config = getConfig();

  const logger = createLogger(config.observability.logging, config.observability.serviceName);
  logger.info(
    { config: { ...config, database: { ...config.database, password: '***' } } },
    'Starting command worker'
  );

  const tracingSDK = setupTracing(config.observability);
  if (tracingSDK) {
    tracingSDK.start();
    logger.info('OpenTelemetry tracing initialized');
  }

  const metricsExporter = setupMetrics(config.observability);
  if (metricsExporter) {
    logger.info({ port: config.observability.metrics.port }, 'OpenTelemetry metrics initialized');
  }

  const pool = new Pool({
    connectionString: getDatabaseUrl(config),
    max: config.database.maxConnections,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });

  try {
    const client = await pool.connect();
    await client.query('SELECT NOW()');
    client.release();
    logger.info('Database connection successful');
  } catch (error) {
    logger.fatal({ err: toError(error) }, 'Failed to connect to database');
    await pool.end();
    process.exit(1);
  }

  const registry = new JobRegistry(logger);
  registry.register(
    new RunCommandJob({
      executor: new ProcessExecutor({
        logger: forComponent(logger, 'executor'),
        defaultShell: config.scheduler.environment.shell,
        switchUser: config.executor.switchUser,
      }),
      metrics: new CommandMetrics(),
    })
  );

  const runnerOptions: RunnerOptions = {
    pgPool: pool,
    concurrency: config.worker.concurrency,
    pollInterval: config.worker.pollInterval,
    schema: config.worker.schema,
    taskList: registry.getTaskList(),
    noHandleSignals: config.worker.noHandleSignals,
  };

  logger.info(
    {
      concurrency: config.worker.concurrency,
      pollInterval: config.worker.pollInterval,
      tasks: registry.getJobNames(),
    },
    'Starting graphile-worker runner'
  );

  const runner = await run(runnerOptions);

  runner.events.on('job:error', ({ job, error }) => {
    logger.warn(
      {
        jobId: job.id,
        taskIdentifier: job.task_identifier,
        attempts: job.attempts,
        maxAttempts: job.max_attempts,
        err: toError(error),
      },
      'Queued command failed'
    );
  });

  runner.events.on('job:complete', ({ job }) => {
    logger.debug(
      { jobId: job.id, taskIdentifier: job.task_identifier },
      'Job complete (all attempts exhausted or succeeded)'
    );
  });

  const healthServer = createHealthServer(config.healthCheck, forComponent(logger, 'health'), () => ({
    concurrency: config.worker.concurrency,
    tasks: registry.getJobNames(),
  }));

  const shutdown = new GracefulShutdown({ logger });
  shutdown
    .register('database-pool', () => pool.end())
    .register('health-server', () => healthServer.stop())
    .register('tracing', async () => {
      await tracingSDK?.shutdown();
    })
    .register('metrics', async () => {
      await metricsExporter?.shutdown();
    })
    .register('runner', () => runner.stop());
  shutdown.setupHandlers();

  if (config.healthCheck.enabled) {
    await healthServer.start();
  }
  healthServer.setReadiness(true);

  logger.info('Worker is ready to process commands');
}

main().catch((error: unknown) => {
  console.error('Fatal error starting worker:', error);
  process.exit(1);
});
