/**
 * @fileoverview Health endpoint helpers unit tests
 * @module tests/unit/health-server
 */

import { describe, expect, it } from 'vitest';

import { createHealthPayload, resolveHealthRoute } from '../../src/api/healthServer';
import { HealthCheckConfigSchema } from '../../src/core/config';

const config = HealthCheckConfigSchema.parse({});

describe('unit: Health Server', () => {
  it('should resolve configured routes and ignore query strings', () => {
    expect(resolveHealthRoute('/health', config)).toBe('health');
    expect(resolveHealthRoute('/health/ready?verbose=1', config)).toBe('readiness');
    expect(resolveHealthRoute('/health/live', config)).toBe('liveness');
    expect(resolveHealthRoute('/metrics', config)).toBeNull();
    expect(resolveHealthRoute(undefined, config)).toBeNull();
  });

  it('should report scheduler details and degraded readiness', () => {
    const payload = JSON.parse(
      createHealthPayload({ ready: false, live: true }, { state: 'idle', jobs: 3 })
    );

    expect(payload).toMatchObject({
      status: 'degraded',
      checks: {
        readiness: { status: 'fail' },
        liveness: { status: 'pass' },
      },
      details: { state: 'idle', jobs: 3 },
    });
  });
});
