/**
 * @fileoverview Zod schemas for application configuration with full type safety
 * @module core/config/schema
 */

import { z } from 'zod';

/**
 * Database configuration schema (queue executor and command worker)
 */
export const DatabaseConfigSchema = z.object({
  host: z.string().min(1).describe('Database host'),
  port: z.number().int().min(1).max(65535).default(5432).describe('Database port'),
  database: z.string().min(1).describe('Database name'),
  user: z.string().min(1).describe('Database user'),
  password: z.string().min(1).describe('Database password'),
  ssl: z.boolean().default(false).describe('Enable SSL connection'),
  maxConnections: z.number().int().min(1).default(10).describe('Maximum connection pool size'),
});

/**
 * Recurrence scheduler configuration schema
 */
export const SchedulerConfigSchema = z.object({
  tablePath: z.string().min(1).describe('Path of the job table file'),
  timezone: z
    .string()
    .min(1)
    .refine(isKnownTimeZone, { message: 'Unknown IANA time zone' })
    .optional()
    .describe('Time zone used to read the wall clock; host local time when unset'),
  maxCatchUpMinutes: z
    .number()
    .int()
    .min(0)
    .max(180)
    .default(5)
    .describe('Missed minutes evaluated after a late wake-up'),
  environment: z
    .object({
      path: z.string().min(1).default('/usr/bin:/bin').describe('Default search path for jobs'),
      shell: z.string().min(1).default('/bin/sh').describe('Default command interpreter for jobs'),
    })
    .default({}),
});

/**
 * Executor selection schema
 */
export const ExecutorConfigSchema = z.object({
  kind: z.enum(['process', 'queue']).default('process').describe('Executor that launches due jobs'),
  switchUser: z
    .boolean()
    .default(false)
    .describe('Run each command as its table identity through sudo'),
  queueName: z
    .string()
    .min(1)
    .optional()
    .describe('Named queue; commands sharing one queue run one at a time'),
  maxAttempts: z.number().int().min(1).default(1).describe('Attempts granted to queued commands'),
});

/**
 * Command worker configuration schema
 */
export const WorkerConfigSchema = z.object({
  concurrency: z.number().int().min(1).default(5).describe('Number of concurrent commands'),
  pollInterval: z
    .number()
    .int()
    .min(100)
    .default(1000)
    .describe('Poll interval for new jobs in milliseconds'),
  schema: z.string().default('graphile_worker').describe('Database schema for worker tables'),
  noHandleSignals: z
    .boolean()
    .default(true)
    .describe('Leave signal handling to the process instead of graphile-worker'),
});

/**
 * Metrics configuration schema
 */
export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true).describe('Enable metrics collection'),
  port: z.number().int().min(1).max(65535).default(9090).describe('Metrics server port'),
  path: z.string().default('/metrics').describe('Metrics endpoint path'),
});

/**
 * Tracing configuration schema
 */
export const TracingConfigSchema = z.object({
  enabled: z.boolean().default(false).describe('Enable distributed tracing'),
  otlpEndpoint: z.string().url().optional().describe('OTLP collector endpoint'),
});

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
    .default('info')
    .describe('Log level'),
  pretty: z.boolean().default(false).describe('Pretty print logs (development only)'),
});

/**
 * Observability configuration schema
 */
export const ObservabilityConfigSchema = z.object({
  serviceName: z.string().min(1).describe('Service name for observability'),
  serviceVersion: z.string().default('1.0.0').describe('Service version'),
  environment: z
    .enum(['development', 'staging', 'production', 'test'])
    .default('development')
    .describe('Deployment environment'),
  metrics: MetricsConfigSchema,
  tracing: TracingConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * Health check configuration schema
 */
export const HealthCheckConfigSchema = z.object({
  enabled: z.boolean().default(true).describe('Enable health check server'),
  port: z.number().int().min(1).max(65535).default(8080).describe('Health check server port'),
  path: z.string().default('/health').describe('Health check endpoint path'),
  readinessPath: z.string().default('/health/ready').describe('Readiness probe endpoint path'),
  livenessPath: z.string().default('/health/live').describe('Liveness probe endpoint path'),
});

/**
 * Main application configuration schema
 */
export const AppConfigSchema = z.object({
  nodeEnv: z
    .enum(['development', 'test', 'staging', 'production'])
    .default('development')
    .describe('Node environment'),
  scheduler: SchedulerConfigSchema,
  executor: ExecutorConfigSchema,
  database: DatabaseConfigSchema,
  worker: WorkerConfigSchema,
  observability: ObservabilityConfigSchema,
  healthCheck: HealthCheckConfigSchema,
});

/**
 * Inferred TypeScript types from schemas
 */
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type ExecutorConfig = z.infer<typeof ExecutorConfigSchema>;
export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type TracingConfig = z.infer<typeof TracingConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type HealthCheckConfig = z.infer<typeof HealthCheckConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Database connection string builder
 */
export function buildDatabaseUrl(config: DatabaseConfig): string {
  const { user, password, host, port, database } = config;
  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${database}${
    config.ssl ? '?ssl=true' : ''
  }`;
}

function isKnownTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}
