/**
 * @fileoverview Central export for instrumentation (logging, tracing, metrics)
 * @module core/instrumentation
 */

export { createLogger, forComponent, logError } from './logger';
export { setupTracing, getTracer, withTracing } from './tracing';
export { setupMetrics, SchedulerMetrics, CommandMetrics } from './metrics';
export type { DispatchOutcome } from './metrics';
