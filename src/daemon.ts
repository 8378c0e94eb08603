#!/usr/bin/env node
/**
 * @fileoverview Scheduler daemon entry point
 * @module daemon
 */

import { createHealthServer } from './api/healthServer';
import { getConfig, getDatabaseUrl, type AppConfig } from './core/config';
import { isSchedulerError, toError } from './core/errors';
import { ProcessExecutor, QueueExecutor, type Executor } from './core/executors';
import {
  createLogger,
  forComponent,
  logError,
  SchedulerMetrics,
  setupMetrics,
  setupTracing,
} from './core/instrumentation';
import { GracefulShutdown } from './core/lifecycle/GracefulShutdown';
import { RecurrenceScheduler } from './core/scheduler';

import type { Logger } from 'pino';

async function createExecutor(config: AppConfig, logger: Logger): Promise<Executor> {
  if (config.executor.kind === 'queue') {
    const executor = await QueueExecutor.connect(
      { connectionString: getDatabaseUrl(config), schema: config.worker.schema },
      { queueName: config.executor.queueName, maxAttempts: config.executor.maxAttempts }
    );
    logger.info(
      { queueName: config.executor.queueName ?? null, maxAttempts: config.executor.maxAttempts },
      'Queue executor connected'
    );
    return executor;
  }

  return new ProcessExecutor({
    logger: forComponent(logger, 'executor'),
    defaultShell: config.scheduler.environment.shell,
    switchUser: config.executor.switchUser,
  });
}

/**
 * Main daemon function
 */
async function main(): Promise<void> {
  const config = getConfig();

  const logger = createLogger(config.observability.logging, config.observability.serviceName);
  logger.info(
    {
      config: {
        ...config,
        database: { ...config.database, password: '***' },
      },
    },
    'Starting cron-dispatch'
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

  const schedulerMetrics = new SchedulerMetrics();
  const executor = await createExecutor(config, logger);
  const scheduler = new RecurrenceScheduler({
    executor,
    logger: forComponent(logger, 'scheduler'),
    metrics: schedulerMetrics,
    timezone: config.scheduler.timezone,
    maxCatchUpMinutes: config.scheduler.maxCatchUpMinutes,
    defaults: {
      PATH: config.scheduler.environment.path,
      SHELL: config.scheduler.environment.shell,
    },
  });

  // An unreadable table at start is fatal
  await scheduler.loadFile(config.scheduler.tablePath);

  const healthServer = createHealthServer(config.healthCheck, forComponent(logger, 'health'), () => ({
    state: scheduler.currentState,
    jobs: scheduler.jobs.length,
    executor: executor.name,
  }));

  const shutdown = new GracefulShutdown({ logger });
  shutdown
    .register('executor', async () => {
      await executor.close?.();
    })
    .register('health-server', () => healthServer.stop())
    .register('tracing', async () => {
      await tracingSDK?.shutdown();
    })
    .register('metrics', async () => {
      await metricsExporter?.shutdown();
    })
    .register('scheduler', () => scheduler.stop());
  shutdown.setupHandlers();

  process.on('SIGHUP', () => {
    logger.info({ path: config.scheduler.tablePath }, 'Reloading job table');
    void scheduler.loadFile(config.scheduler.tablePath).then(
      () => {
        schedulerMetrics.recordReload(true);
      },
      (error: unknown) => {
        schedulerMetrics.recordReload(false);
        logError(logger, toError(error), 'Job table reload failed; keeping the loaded table');
      }
    );
  });

  if (config.healthCheck.enabled) {
    await healthServer.start();
  }

  scheduler.start();
  healthServer.setReadiness(true);
  logger.info('Scheduler daemon is ready');
}

main().catch((error: unknown) => {
  const code = isSchedulerError(error) ? error.code : 'UNEXPECTED';
  console.error(`Fatal error starting scheduler daemon [${code}]:`, error);
  process.exit(1);
});
