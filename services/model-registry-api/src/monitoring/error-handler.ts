import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { HttpError, getErrorMessage } from '../errors/http-errors.js';
import { isConnectivityError } from '../database/errors.js';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  message: string;
  stack?: string;
  statusCode: number;
  context: {
    url?: string;
    method?: string;
    userAgent?: string;
    ip?: string;
    username?: string;
  };
  severity: 'low' | 'medium' | 'high' | 'critical';
  resolved: boolean;
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byType: Record<string, number>;
  resolved: number;
  unresolved: number;
}

export interface ErrorHandlerOptions {
  /** Include stack traces and request context in responses */
  exposeDetails?: boolean;
  /** Oldest records are evicted beyond this many */
  maxStoredErrors?: number;
}

export class ErrorHandler {
  private errors: Map<string, ErrorInfo> = new Map();
  private exposeDetails: boolean;
  private maxStoredErrors: number;

  constructor(options: ErrorHandlerOptions = {}) {
    this.exposeDetails = options.exposeDetails ?? false;
    this.maxStoredErrors = options.maxStoredErrors ?? 1000;
  }

  /**
   * Express error handling middleware
   */
  middleware() {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        // Streaming responses can fail after the status line went out
        next(error);
        return;
      }

      const errorInfo = this.captureError(error, {
        url: req.originalUrl,
        method: req.method,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
        username: typeof res.locals.username === 'string' ? res.locals.username : undefined,
      });

      if (error instanceof HttpError) {
        res.set(error.headers);
      }
      this.sendErrorResponse(errorInfo, error, res);
    };
  }

  /**
   * Capture and categorize an error
   */
  captureError(error: unknown, context: ErrorInfo['context'] = {}): ErrorInfo {
    const statusCode = this.getStatusCode(error);
    const errorInfo: ErrorInfo = {
      id: `err_${uuidv4()}`,
      timestamp: new Date().toISOString(),
      type: error instanceof Error ? error.name : typeof error,
      message: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
      statusCode,
      context,
      severity: this.determineSeverity(statusCode),
      resolved: false
    };

    this.errors.set(errorInfo.id, errorInfo);
    this.evictOverflow();
    this.logError(errorInfo);

    return errorInfo;
  }

  /**
   * Send the JSON error envelope
   */
  private sendErrorResponse(errorInfo: ErrorInfo, error: unknown, res: Response): void {
    res.status(errorInfo.statusCode).json({
      success: false,
      error: this.getReason(error, errorInfo.statusCode),
      message: this.getClientMessage(errorInfo),
      errorId: errorInfo.id,
      timestamp: errorInfo.timestamp,
      ...(this.exposeDetails && {
        stack: errorInfo.stack,
        context: errorInfo.context
      })
    });
  }

  /**
   * Get HTTP status code for error
   */
  getStatusCode(error: unknown): number {
    if (error instanceof HttpError) {
      return error.statusCode;
    }
    if (isConnectivityError(error)) {
      return 503;
    }
    if (isBodyParserError(error)) {
      return error.status;
    }
    return 500;
  }

  private determineSeverity(statusCode: number): ErrorInfo['severity'] {
    if (statusCode === 503) {
      return 'critical';
    }
    if (statusCode >= 500) {
      return 'high';
    }
    if (statusCode === 401 || statusCode === 429) {
      return 'medium';
    }
    return 'low';
  }

  private getReason(error: unknown, statusCode: number): string {
    if (error instanceof HttpError) {
      return error.reason;
    }
    if (statusCode === 503) {
      return 'Service Unavailable';
    }
    return statusCode >= 500 ? 'Internal Server Error' : 'Bad Request';
  }

  /**
   * Driver connectivity messages name hosts, so 503s get a fixed message
   * unless details are exposed.
   */
  private getClientMessage(errorInfo: ErrorInfo): string {
    if (errorInfo.statusCode === 503 && !this.exposeDetails) {
      return 'Database temporarily unavailable. Please try again later.';
    }
    return errorInfo.message || 'An unexpected error occurred.';
  }

  private logError(errorInfo: ErrorInfo): void {
    const logLevel = errorInfo.severity === 'critical' || errorInfo.severity === 'high' ? 'error' : 'warn';
    console[logLevel](`Error ${errorInfo.id}: ${errorInfo.type} - ${errorInfo.message}`, {
      statusCode: errorInfo.statusCode,
      severity: errorInfo.severity,
      context: errorInfo.context
    });
  }

  private evictOverflow(): void {
    while (this.errors.size > this.maxStoredErrors) {
      const oldest = this.errors.keys().next();
      if (oldest.done) {
        return;
      }
      this.errors.delete(oldest.value);
    }
  }

  /**
   * Get error statistics
   */
  getErrorStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errors.size,
      bySeverity: {},
      byType: {},
      resolved: 0,
      unresolved: 0
    };

    for (const error of this.errors.values()) {
      stats.bySeverity[error.severity] = (stats.bySeverity[error.severity] || 0) + 1;
      stats.byType[error.type] = (stats.byType[error.type] || 0) + 1;

      if (error.resolved) {
        stats.resolved++;
      } else {
        stats.unresolved++;
      }
    }

    return stats;
  }

  /**
   * Mark error as resolved
   */
  markErrorResolved(errorId: string): boolean {
    const error = this.errors.get(errorId);
    if (error) {
      error.resolved = true;
      return true;
    }
    return false;
  }

  getAllErrors(): ErrorInfo[] {
    return Array.from(this.errors.values());
  }

  /**
   * Clear resolved errors older than specified time
   */
  clearOldErrors(maxAgeMs: number = 24 * 60 * 60 * 1000): number {
    const cutoff = Date.now() - maxAgeMs;
    let cleared = 0;

    for (const [id, error] of this.errors.entries()) {
      if (error.resolved && new Date(error.timestamp).getTime() < cutoff) {
        this.errors.delete(id);
        cleared++;
      }
    }

    return cleared;
  }
}

/**
 * express.json() rejects malformed bodies with a 4xx `status` on the error
 */
function isBodyParserError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}
