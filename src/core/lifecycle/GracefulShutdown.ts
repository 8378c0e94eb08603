/**
 * @fileoverview Signal-driven graceful shutdown shared by the daemon and the worker
 * @module core/lifecycle/GracefulShutdown
 */

import { toError } from '../errors';
import { logError } from '../instrumentation/logger';

import type { Logger } from 'pino';

type ShutdownStep = () => Promise<void>;

export interface GracefulShutdownOptions {
  logger: Logger;
  /** Hard deadline before the process is forced to exit. */
  timeoutMs?: number;
  exit?: (code: number) => void;
}

/**
 * Runs registered shutdown steps in reverse registration order, once.
 */
export class GracefulShutdown {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly exit: (code: number) => void;
  private readonly steps: Array<{ name: string; run: ShutdownStep }> = [];
  private shutdownInProgress = false;

  constructor(options: GracefulShutdownOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  register(name: string, run: ShutdownStep): this {
    this.steps.push({ name, run });
    return this;
  }

  async shutdown(signal: string, exitCode: number = 0): Promise<void> {
    if (this.shutdownInProgress) {
      this.logger.warn({ signal }, 'Shutdown already in progress, ignoring signal');
      return;
    }

    this.shutdownInProgress = true;
    this.logger.info({ signal }, 'Starting graceful shutdown');

    const shutdownTimer = setTimeout(() => {
      this.logger.error('Graceful shutdown timeout, forcing exit');
      this.exit(1);
    }, this.timeoutMs);

    let failed = false;
    for (const step of [...this.steps].reverse()) {
      try {
        this.logger.info({ step: step.name }, 'Running shutdown step');
        await step.run();
      } catch (error) {
        failed = true;
        logError(this.logger, toError(error), 'Error during shutdown', { step: step.name });
      }
    }

    clearTimeout(shutdownTimer);
    this.logger.info('Graceful shutdown complete');
    this.exit(failed ? 1 : exitCode);
  }

  setupHandlers(): void {
    process.on('SIGTERM', () => void this.shutdown('SIGTERM'));
    process.on('SIGINT', () => void this.shutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      this.logger.fatal({ err: error }, 'Uncaught exception');
      void this.shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.fatal({ reason }, 'Unhandled rejection');
      void this.shutdown('unhandledRejection', 1);
    });
  }
}
