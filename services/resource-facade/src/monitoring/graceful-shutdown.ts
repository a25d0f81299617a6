import type { Server } from 'node:http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createLogger, type Logger } from '../utils/logger.js';

export interface ShutdownOptions {
  timeout: number;
  forceExit: boolean;
  cleanupTasks: Array<{ name: string; run: () => Promise<void> }>;
  /** Replaced in tests */
  exit: (code: number) => void;
  logger: Logger;
}

/**
 * Ordered shutdown: stop accepting requests, let in-flight requests finish,
 * then run cleanup tasks (worker pool, queue, registry) in registration order.
 */
export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private server: Server | null = null;
  private activeRequests: number = 0;
  private drainWaiters: Array<() => void> = [];
  private readonly options: ShutdownOptions;
  private readonly logger: Logger;

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      cleanupTasks: [],
      exit: (code) => process.exit(code),
      logger: options.logger ?? createLogger({ name: 'graceful-shutdown' }),
      ...options,
    };
    this.logger = this.options.logger;
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  installSignalHandlers(): void {
    process.on('SIGTERM', () => {
      this.logger.info('Received SIGTERM signal');
      void this.shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      this.logger.info('Received SIGINT signal');
      void this.shutdown('SIGINT');
    });
    process.on('uncaughtException', (error) => {
      this.logger.fatal({ err: error }, 'Uncaught exception');
      void this.shutdown('uncaughtException', error);
    });
    process.on('unhandledRejection', (reason) => {
      this.logger.fatal({ err: reason }, 'Unhandled rejection');
      void this.shutdown('unhandledRejection', reason);
    });
  }

  attachServer(server: Server): void {
    this.server = server;
  }

  addCleanupTask(name: string, run: () => Promise<void>): void {
    this.options.cleanupTasks.push({ name, run });
  }

  /**
   * Counts in-flight requests and refuses new ones with 503 once shutdown
   * has started.
   */
  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      if (this.isShuttingDown) {
        res.set('Connection', 'close');
        res.status(503).json({ success: false, error: 'SHUTTING_DOWN', message: 'Service is shutting down' });
        return;
      }
      this.activeRequests++;
      let finished = false;
      const done = (): void => {
        if (finished) return;
        finished = true;
        this.activeRequests--;
        if (this.activeRequests === 0) {
          this.drainWaiters.splice(0).forEach((resolve) => resolve());
        }
      };
      res.on('finish', done);
      res.on('close', done);
      next();
    };
  }

  /**
   * Initiate graceful shutdown
   */
  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.info({ signal }, 'Shutdown already in progress');
      return;
    }
    this.isShuttingDown = true;
    this.logger.info({ signal }, 'Initiating graceful shutdown');

    this.shutdownTimeout = setTimeout(() => {
      this.logger.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);
    this.shutdownTimeout.unref();

    let failed = false;
    try {
      await this.stopAcceptingRequests();
      await this.waitForOngoingRequests();
      failed = await this.executeCleanupTasks();
      this.logger.info('Graceful shutdown completed');
    } catch (shutdownError) {
      failed = true;
      this.logger.error({ err: shutdownError }, 'Error during graceful shutdown');
    } finally {
      if (this.shutdownTimeout) {
        clearTimeout(this.shutdownTimeout);
        this.shutdownTimeout = null;
      }
    }
    this.options.exit(error !== undefined || failed ? 1 : 0);
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }

  getShutdownStatus(): { isShuttingDown: boolean; timeout: number; activeRequests: number } {
    return {
      isShuttingDown: this.isShuttingDown,
      timeout: this.options.timeout,
      activeRequests: this.activeRequests,
    };
  }

  private async stopAcceptingRequests(): Promise<void> {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve) => {
      server.close((closeError) => {
        if (closeError) {
          this.logger.warn({ err: closeError }, 'HTTP server was not listening');
        }
        resolve();
      });
      server.closeIdleConnections();
    });
    this.logger.info('HTTP server closed to new connections');
  }

  private async waitForOngoingRequests(): Promise<void> {
    if (this.activeRequests === 0) return;
    this.logger.info({ activeRequests: this.activeRequests }, 'Waiting for ongoing requests');
    await new Promise<void>((resolve) => this.drainWaiters.push(resolve));
  }

  /** Returns true when at least one task failed; the rest still run. */
  private async executeCleanupTasks(): Promise<boolean> {
    let failed = false;
    for (const task of this.options.cleanupTasks) {
      try {
        await task.run();
        this.logger.info({ task: task.name }, 'Cleanup task completed');
      } catch (error) {
        failed = true;
        this.logger.error({ err: error, task: task.name }, 'Cleanup task failed');
      }
    }
    return failed;
  }
}
