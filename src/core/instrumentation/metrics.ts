/**
 * @fileoverview OpenTelemetry metrics collection with Prometheus exporter
 * @module core/instrumentation/metrics
 */

import { MeterProvider, type MetricReader } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { Resource } from '@opentelemetry/resources';
import { SEMRESATTRS_SERVICE_NAME, SEMRESATTRS_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
  type UpDownCounter,
} from '@opentelemetry/api';

import type { ObservabilityConfig } from '../config/schema';

/**
 * Setup OpenTelemetry metrics with Prometheus exporter
 *
 * @param config - Observability configuration
 * @returns Prometheus exporter instance, or null when metrics are disabled
 */
export function setupMetrics(config: ObservabilityConfig): PrometheusExporter | null {
  if (!config.metrics.enabled) {
    return null;
  }

  const resource = new Resource({
    [SEMRESATTRS_SERVICE_NAME]: config.serviceName,
    [SEMRESATTRS_SERVICE_VERSION]: config.serviceVersion,
  });

  const prometheusExporter = new PrometheusExporter({
    port: config.metrics.port,
    endpoint: config.metrics.path,
  });

  // PrometheusExporter acts as its own reader.
  // Type assertion needed: the exporter pins its own sdk-metrics release.
  const meterProvider = new MeterProvider({
    resource,
    readers: [prometheusExporter] as unknown as MetricReader[],
  });

  metrics.setGlobalMeterProvider(meterProvider);

  return prometheusExporter;
}

export type DispatchOutcome = 'launched' | 'failed';

/**
 * Scheduler metrics collector
 */
export class SchedulerMetrics {
  private readonly ticks: Counter;
  private readonly dueJobs: Counter;
  private readonly dispatches: Counter;
  private readonly parseFailures: Counter;
  private readonly reloads: Counter;
  private readonly loadedJobs: UpDownCounter;
  private loadedJobCount = 0;

  constructor(meter: Meter = metrics.getMeter('cron-dispatch.scheduler', '1.0.0')) {
    this.ticks = meter.createCounter('scheduler_ticks_total', {
      description: 'Minutes evaluated by the scheduler',
      unit: '1',
    });

    this.dueJobs = meter.createCounter('scheduler_due_jobs_total', {
      description: 'Jobs found due across all evaluated minutes',
      unit: '1',
    });

    this.dispatches = meter.createCounter('scheduler_dispatches_total', {
      description: 'Dispatch attempts by outcome',
      unit: '1',
    });

    this.parseFailures = meter.createCounter('scheduler_parse_failures_total', {
      description: 'Job table lines skipped because they failed to parse',
      unit: '1',
    });

    this.reloads = meter.createCounter('scheduler_reloads_total', {
      description: 'Job table reloads by outcome',
      unit: '1',
    });

    this.loadedJobs = meter.createUpDownCounter('scheduler_loaded_jobs', {
      description: 'Job definitions currently loaded',
      unit: '1',
    });
  }

  recordTick(dueCount: number, catchUp: boolean): void {
    this.ticks.add(1, { catch_up: catchUp });
    if (dueCount > 0) {
      this.dueJobs.add(dueCount);
    }
  }

  recordDispatch(jobId: string, executor: string, outcome: DispatchOutcome): void {
    this.dispatches.add(1, { job_id: jobId, executor, outcome });
  }

  recordParseFailures(count: number): void {
    if (count > 0) {
      this.parseFailures.add(count);
    }
  }

  recordReload(success: boolean): void {
    this.reloads.add(1, { outcome: success ? 'success' : 'failure' });
  }

  setLoadedJobs(count: number): void {
    this.loadedJobs.add(count - this.loadedJobCount);
    this.loadedJobCount = count;
  }
}

/**
 * Command worker metrics collector
 */
export class CommandMetrics {
  private readonly commandsRun: Counter;
  private readonly commandDuration: Histogram;
  private readonly activeCommands: UpDownCounter;

  constructor(meter: Meter = metrics.getMeter('cron-dispatch.worker', '1.0.0')) {
    this.commandsRun = meter.createCounter('commands_run_total', {
      description: 'Queued commands executed by status',
      unit: '1',
    });

    this.commandDuration = meter.createHistogram('command_duration_seconds', {
      description: 'Queued command run time in seconds',
      unit: 's',
    });

    this.activeCommands = meter.createUpDownCounter('active_commands', {
      description: 'Commands currently running',
      unit: '1',
    });
  }

  recordCommand(jobId: string, status: 'success' | 'failure', durationMs: number): void {
    this.commandsRun.add(1, { job_id: jobId, status });
    this.commandDuration.record(durationMs / 1000, { job_id: jobId });
  }

  incrementActive(jobId: string): void {
    this.activeCommands.add(1, { job_id: jobId });
  }

  decrementActive(jobId: string): void {
    this.activeCommands.add(-1, { job_id: jobId });
  }
}
