/**
 * @fileoverview Unit tests for configuration loading
 * @module tests/unit/config
 */

import { describe, expect, it } from 'vitest';

import { buildDatabaseUrl, loadConfig } from '../../src/core/config';
import { ConfigError } from '../../src/core/errors';

describe('unit: Configuration loading', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.scheduler).toEqual({
      tablePath: '/etc/cron-dispatch/crontab',
      timezone: undefined,
      maxCatchUpMinutes: 5,
      environment: { path: '/usr/bin:/bin', shell: '/bin/sh' },
    });
    expect(config.executor).toEqual({
      kind: 'process',
      switchUser: false,
      queueName: undefined,
      maxAttempts: 1,
    });
    expect(config.observability.serviceName).toBe('cron-dispatch');
    expect(config.observability.logging).toEqual({ level: 'info', pretty: false });
  });

  it('should read scheduler and executor settings', () => {
    const config = loadConfig({
      CRONTAB_PATH: '/srv/crontab',
      SCHEDULER_TIMEZONE: 'Europe/Berlin',
      SCHEDULER_MAX_CATCH_UP_MINUTES: '0',
      SCHEDULER_SHELL: '/bin/bash',
      EXECUTOR_KIND: 'queue',
      EXECUTOR_SWITCH_USER: 'true',
      QUEUE_NAME: 'serial',
      QUEUE_MAX_ATTEMPTS: '3',
    });

    expect(config.scheduler.tablePath).toBe('/srv/crontab');
    expect(config.scheduler.timezone).toBe('Europe/Berlin');
    expect(config.scheduler.maxCatchUpMinutes).toBe(0);
    expect(config.scheduler.environment.shell).toBe('/bin/bash');
    expect(config.executor).toEqual({
      kind: 'queue',
      switchUser: true,
      queueName: 'serial',
      maxAttempts: 3,
    });
  });

  it('should treat a blank queue name as unset', () => {
    expect(loadConfig({ QUEUE_NAME: '  ' }).executor.queueName).toBeUndefined();
  });

  it('should reject unknown time zones', () => {
    expect(() => loadConfig({ SCHEDULER_TIMEZONE: 'Mars/Olympus_Mons' })).toThrowError(ConfigError);
    expect(() => loadConfig({ SCHEDULER_TIMEZONE: 'Mars/Olympus_Mons' })).toThrowError(
      'Invalid configuration: scheduler.timezone: Unknown IANA time zone'
    );
  });

  it('should reject unknown executors', () => {
    expect(() => loadConfig({ EXECUTOR_KIND: 'carrier-pigeon' })).toThrowError(
      /^Invalid configuration: executor\.kind: /
    );
  });

  it('should encode credentials in the database URL', () => {
    expect(
      buildDatabaseUrl({
        host: 'db',
        port: 5432,
        database: 'cron',
        user: 'svc',
        password: 'p@ss word',
        ssl: false,
        maxConnections: 10,
      })
    ).toBe('postgresql://svc:p%40ss%20word@db:5432/cron');
  });
});
