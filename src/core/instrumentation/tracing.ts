/**
 * @fileoverview OpenTelemetry distributed tracing setup
 * @module core/instrumentation/tracing
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { Resource } from '@opentelemetry/resources';
import {
  SEMRESATTRS_DEPLOYMENT_ENVIRONMENT,
  SEMRESATTRS_SERVICE_NAME,
  SEMRESATTRS_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-node';
import { PgInstrumentation } from '@opentelemetry/instrumentation-pg';
import { HttpInstrumentation } from '@opentelemetry/instrumentation-http';
import { SpanStatusCode, trace, type Attributes, type Span, type Tracer } from '@opentelemetry/api';

import { toError } from '../errors';

import type { ObservabilityConfig } from '../config/schema';

/**
 * Setup OpenTelemetry tracing
 *
 * @param config - Observability configuration
 * @returns NodeSDK instance, or null when tracing is disabled
 */
export function setupTracing(config: ObservabilityConfig): NodeSDK | null {
  if (!config.tracing.enabled) {
    return null;
  }

  const resource = new Resource({
    [SEMRESATTRS_SERVICE_NAME]: config.serviceName,
    [SEMRESATTRS_SERVICE_VERSION]: config.serviceVersion,
    [SEMRESATTRS_DEPLOYMENT_ENVIRONMENT]: config.environment,
  });

  const traceExporter = config.tracing.otlpEndpoint
    ? new OTLPTraceExporter({
        url: config.tracing.otlpEndpoint,
      })
    : new ConsoleSpanExporter();

  return new NodeSDK({
    resource,
    traceExporter,
    instrumentations: [
      new HttpInstrumentation({
        ignoreIncomingRequestHook: (req) => {
          // Ignore health check requests
          return req.url?.includes('/health') ?? false;
        },
      }),
      // Queue executor and command worker talk to Postgres
      new PgInstrumentation({
        enhancedDatabaseReporting: false,
      }),
    ],
  });
}

/**
 * Get tracer instance for a component
 */
export function getTracer(name: string, version: string = '1.0.0'): Tracer {
  return trace.getTracer(name, version);
}

/**
 * Execute function inside an active span
 *
 * @template T - Return type
 * @param tracer - Tracer instance
 * @param spanName - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 */
export async function withTracing<T>(
  tracer: Tracer,
  spanName: string,
  fn: (span: Span) => Promise<T>,
  attributes?: Attributes
): Promise<T> {
  return tracer.startActiveSpan(spanName, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const err = toError(error);
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}
