/**
 * @fileoverview Configuration loader with environment variable support
 * @module core/config
 */

import { config as loadEnv } from 'dotenv';

import { ConfigError } from '../errors';

import { AppConfigSchema, buildDatabaseUrl, type AppConfig } from './schema';

// Load environment variables
loadEnv();

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load and validate application configuration from environment variables
 *
 * @param env - Environment to read, `process.env` by default
 * @returns Validated application configuration
 * @throws {ConfigError} If configuration is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    nodeEnv: env['NODE_ENV'] ?? 'development',
    scheduler: {
      tablePath: env['CRONTAB_PATH'] ?? '/etc/cron-dispatch/crontab',
      timezone: nonEmpty(env['SCHEDULER_TIMEZONE']),
      maxCatchUpMinutes: parseNumber(env['SCHEDULER_MAX_CATCH_UP_MINUTES'], 5),
      environment: {
        path: nonEmpty(env['SCHEDULER_PATH']),
        shell: nonEmpty(env['SCHEDULER_SHELL']),
      },
    },
    executor: {
      kind: env['EXECUTOR_KIND'] ?? 'process',
      switchUser: parseBoolean(env['EXECUTOR_SWITCH_USER'], false),
      queueName: nonEmpty(env['QUEUE_NAME']),
      maxAttempts: parseNumber(env['QUEUE_MAX_ATTEMPTS'], 1),
    },
    database: {
      host: env['DB_HOST'] ?? 'localhost',
      port: parseNumber(env['DB_PORT'], 5432),
      database: env['DB_NAME'] ?? 'cron_dispatch',
      user: env['DB_USER'] ?? 'postgres',
      password: env['DB_PASSWORD'] ?? 'postgres',
      ssl: parseBoolean(env['DB_SSL'], false),
      maxConnections: parseNumber(env['DB_MAX_CONNECTIONS'], 10),
    },
    worker: {
      concurrency: parseNumber(env['WORKER_CONCURRENCY'], 5),
      pollInterval: parseNumber(env['WORKER_POLL_INTERVAL'], 1000),
      schema: env['WORKER_SCHEMA'] ?? 'graphile_worker',
      noHandleSignals: parseBoolean(env['WORKER_NO_HANDLE_SIGNALS'], true),
    },
    observability: {
      serviceName: env['SERVICE_NAME'] ?? 'cron-dispatch',
      serviceVersion: env['SERVICE_VERSION'] ?? '1.0.0',
      environment: env['ENVIRONMENT'] ?? env['NODE_ENV'] ?? 'development',
      metrics: {
        enabled: parseBoolean(env['METRICS_ENABLED'], true),
        port: parseNumber(env['METRICS_PORT'], 9090),
        path: env['METRICS_PATH'] ?? '/metrics',
      },
      tracing: {
        enabled: parseBoolean(env['TRACING_ENABLED'], false),
        otlpEndpoint: nonEmpty(env['OTLP_ENDPOINT']),
      },
      logging: {
        level: env['LOG_LEVEL'] ?? 'info',
        pretty: parseBoolean(env['LOG_PRETTY'], env['NODE_ENV'] === 'development'),
      },
    },
    healthCheck: {
      enabled: parseBoolean(env['HEALTH_CHECK_ENABLED'], true),
      port: parseNumber(env['HEALTH_CHECK_PORT'], 8080),
      path: env['HEALTH_CHECK_PATH'] ?? '/health',
      readinessPath: env['HEALTH_READINESS_PATH'] ?? '/health/ready',
      livenessPath: env['HEALTH_LIVENESS_PATH'] ?? '/health/live',
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): AppConfig {
  configInstance ??= loadConfig();
  return configInstance;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Get database connection URL
 *
 * @param config - Optional config (uses singleton if not provided)
 */
export function getDatabaseUrl(config?: AppConfig): string {
  const cfg = config ?? getConfig();
  return buildDatabaseUrl(cfg.database);
}

// Export schemas and types
export * from './schema';
