/**
 * Error Logger
 *
 * Keeps a bounded in-memory history of errors for debugging and forwards each
 * one to the structured logger.
 */

import { loggers } from '../logger';
import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? error.toErrorInfo()
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    loggers.errors.error(
      {
        category: errorInfo.category,
        severity: errorInfo.severity,
        details: errorInfo.technicalDetails,
        context: errorInfo.context
      },
      errorInfo.userMessage
    );
  }

  /**
   * Change how many entries are retained
   */
  static setMaxLogs(maxLogs: number): void {
    this.maxLogs = Math.max(1, maxLogs);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  static clearLogs(): void {
    this.logs = [];
  }

  static getLogsByCategory(category: ErrorCategory): ErrorInfo[] {
    return this.logs.filter(log => log.category === category);
  }

  static getLogsBySeverity(severity: ErrorSeverity): ErrorInfo[] {
    return this.logs.filter(log => log.severity === severity);
  }

  /**
   * Get recent logs (last N entries)
   */
  static getRecentLogs(count: number): ErrorInfo[] {
    return this.logs.slice(-count);
  }
}
