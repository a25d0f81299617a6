import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { isFacadeError } from '../errors/index.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  code: string;
  message: string;
  statusCode: number;
  stack?: string;
  details?: Record<string, unknown>;
  context: {
    url?: string;
    method?: string;
    userAgent?: string;
    ip?: string;
    entity?: string;
    workItemId?: string;
  };
  severity: 'low' | 'medium' | 'high' | 'critical';
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byType: Record<string, number>;
}

export interface ErrorHandlerOptions {
  logger?: Logger;
  /** Include stack and context in responses */
  exposeDetails?: boolean;
  /** Captured errors kept for inspection */
  maxStoredErrors?: number;
}

// Body-parser and similar middleware attach an HTTP status to their errors
function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 600 ? error.status : undefined;
  }
  return undefined;
}

/**
 * Captures every error with an id, severity and request context, logs it
 * and answers with the status mapped from its class.
 */
export class ErrorHandler {
  private readonly errors: Map<string, ErrorInfo> = new Map();
  private readonly logger: Logger;
  private readonly exposeDetails: boolean;
  private readonly maxStoredErrors: number;

  constructor(options: ErrorHandlerOptions = {}) {
    this.logger = options.logger ?? createLogger({ name: 'error-handler' });
    this.exposeDetails = options.exposeDetails ?? false;
    this.maxStoredErrors = options.maxStoredErrors ?? 500;
  }

  /**
   * Express error handling middleware
   */
  middleware(): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const errorInfo = this.captureError(error, {
        url: req.originalUrl,
        method: req.method,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
        entity: typeof req.params['entity'] === 'string' ? req.params['entity'] : undefined,
        workItemId: typeof req.params['id'] === 'string' ? req.params['id'] : undefined,
      });
      this.sendErrorResponse(errorInfo, res);
    };
  }

  /**
   * Capture and categorize an error
   */
  captureError(error: unknown, context: ErrorInfo['context'] = {}): ErrorInfo {
    const normalized = error instanceof Error ? error : new Error(String(error));
    const statusCode = isFacadeError(error) ? error.statusCode : httpStatusOf(error) ?? 500;

    const errorInfo: ErrorInfo = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      type: normalized.name,
      code: isFacadeError(error) ? error.code : statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR',
      message: normalized.message,
      statusCode,
      stack: normalized.stack,
      details: isFacadeError(error) ? error.details : undefined,
      context,
      severity: this.determineSeverity(statusCode),
    };

    this.errors.set(errorInfo.id, errorInfo);
    if (this.errors.size > this.maxStoredErrors) {
      const oldest = this.errors.keys().next();
      if (!oldest.done) this.errors.delete(oldest.value);
    }
    this.logError(errorInfo);
    return errorInfo;
  }

  getErrorStats(): ErrorStats {
    const stats: ErrorStats = { total: this.errors.size, bySeverity: {}, byType: {} };
    for (const error of this.errors.values()) {
      stats.bySeverity[error.severity] = (stats.bySeverity[error.severity] ?? 0) + 1;
      stats.byType[error.type] = (stats.byType[error.type] ?? 0) + 1;
    }
    return stats;
  }

  /** Most recent server-side errors, newest first */
  getRecentErrors(limit: number = 10): ErrorInfo[] {
    return Array.from(this.errors.values())
      .filter((error) => error.statusCode >= 500)
      .slice(-limit)
      .reverse();
  }

  clearOldErrors(maxAgeMs: number = 24 * 60 * 60 * 1000): number {
    const cutoff = Date.now() - maxAgeMs;
    let cleared = 0;
    for (const [id, error] of this.errors) {
      if (new Date(error.timestamp).getTime() < cutoff) {
        this.errors.delete(id);
        cleared++;
      }
    }
    return cleared;
  }

  private sendErrorResponse(errorInfo: ErrorInfo, res: Response): void {
    res.status(errorInfo.statusCode).json({
      success: false,
      error: errorInfo.code,
      message: errorInfo.statusCode >= 500 && errorInfo.code === 'INTERNAL_ERROR' ? 'Internal server error' : errorInfo.message,
      errorId: errorInfo.id,
      timestamp: errorInfo.timestamp,
      ...(errorInfo.details && { details: errorInfo.details }),
      ...(this.exposeDetails && { stack: errorInfo.stack, context: errorInfo.context }),
    });
  }

  private determineSeverity(statusCode: number): ErrorInfo['severity'] {
    if (statusCode === 503) return 'critical';
    if (statusCode >= 500) return 'high';
    if (statusCode === 499 || statusCode === 422 || statusCode === 429) return 'medium';
    return 'low';
  }

  private logError(errorInfo: ErrorInfo): void {
    const bindings = {
      errorId: errorInfo.id,
      code: errorInfo.code,
      severity: errorInfo.severity,
      statusCode: errorInfo.statusCode,
      context: errorInfo.context,
    };
    if (errorInfo.severity === 'critical' || errorInfo.severity === 'high') {
      this.logger.error({ ...bindings, stack: errorInfo.stack }, `${errorInfo.type}: ${errorInfo.message}`);
    } else {
      this.logger.warn(bindings, `${errorInfo.type}: ${errorInfo.message}`);
    }
  }
}
