/**
 * Structured error handling for the ledger node
 * Classifies failures and keeps a bounded error log for monitoring
 */
import type { Logger } from 'pino';
import { logger as rootLogger } from '@config/logger.js';
import { ErrorType, LedgerError } from './errors.js';

export { ErrorType } from './errors.js';

export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL'
}

export interface ErrorContext {
  operation: string;
  blockId?: string;
  transactionId?: string;
  additionalData?: Record<string, unknown>;
}

export interface StructuredError {
  type: ErrorType;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context: ErrorContext;
  timestamp: Date;
  recoverable: boolean;
  retryable: boolean;
}

export interface ErrorStatistics {
  totalErrors: number;
  recentErrors: number;
  dailyErrors: number;
  errorsByType: Partial<Record<ErrorType, number>>;
  errorsBySeverity: Partial<Record<ErrorSeverity, number>>;
  lastError: StructuredError | null;
}

interface Classification {
  type: ErrorType;
  severity: ErrorSeverity;
  recoverable: boolean;
  retryable: boolean;
}

const CLASSIFICATIONS: Record<ErrorType, Omit<Classification, 'type'>> = {
  [ErrorType.VALIDATION_ERROR]: { severity: ErrorSeverity.MEDIUM, recoverable: false, retryable: false },
  [ErrorType.INSUFFICIENT_FUNDS]: { severity: ErrorSeverity.LOW, recoverable: false, retryable: false },
  [ErrorType.INVALID_SIGNATURE]: { severity: ErrorSeverity.MEDIUM, recoverable: false, retryable: false },
  [ErrorType.INVALID_INPUT]: { severity: ErrorSeverity.MEDIUM, recoverable: false, retryable: false },
  [ErrorType.INVALID_BLOCK]: { severity: ErrorSeverity.MEDIUM, recoverable: false, retryable: false },
  [ErrorType.STORE_UNAVAILABLE]: { severity: ErrorSeverity.HIGH, recoverable: true, retryable: true },
  [ErrorType.CONCURRENCY_ERROR]: { severity: ErrorSeverity.MEDIUM, recoverable: true, retryable: false },
  [ErrorType.SYSTEM_ERROR]: { severity: ErrorSeverity.HIGH, recoverable: true, retryable: false }
};

export class ErrorHandler {
  private static instance: ErrorHandler | undefined;
  private errorLog: StructuredError[] = [];

  constructor(
    private readonly log: Logger = rootLogger.child({ module: 'error-handler' }),
    private readonly maxLogSize = 1000
  ) { }

  static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  /**
   * Create a structured error from a raw error
   * @param error The original error
   * @param context Where the error occurred
   */
  createStructuredError(error: unknown, context: ErrorContext): StructuredError {
    const originalError = error instanceof Error ? error : undefined;
    const message = error instanceof Error ? error.message : String(error);
    const { type, severity, recoverable, retryable } = this.classifyError(error);

    const structuredError: StructuredError = {
      type,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoverable,
      retryable
    };

    this.logError(structuredError);

    return structuredError;
  }

  /**
   * Get error statistics for monitoring
   */
  getErrorStatistics(): ErrorStatistics {
    const now = Date.now();
    const oneHourAgo = new Date(now - 60 * 60 * 1000);
    const oneDayAgo = new Date(now - 24 * 60 * 60 * 1000);

    const errorsByType: Partial<Record<ErrorType, number>> = {};
    const errorsBySeverity: Partial<Record<ErrorSeverity, number>> = {};
    for (const error of this.errorLog) {
      errorsByType[error.type] = (errorsByType[error.type] ?? 0) + 1;
      errorsBySeverity[error.severity] = (errorsBySeverity[error.severity] ?? 0) + 1;
    }

    return {
      totalErrors: this.errorLog.length,
      recentErrors: this.errorLog.filter(e => e.timestamp >= oneHourAgo).length,
      dailyErrors: this.errorLog.filter(e => e.timestamp >= oneDayAgo).length,
      errorsByType,
      errorsBySeverity,
      lastError: this.errorLog[this.errorLog.length - 1] ?? null
    };
  }

  /**
   * Drop errors older than a day from the log
   */
  clearOldErrors(): void {
    const oneDayAgo = new Date(Date.now() - 24 * 60 * 60 * 1000);
    this.errorLog = this.errorLog.filter(error => error.timestamp >= oneDayAgo);
  }

  /**
   * Classify an error. Ledger errors carry their own type; anything else is
   * matched on its message.
   */
  classifyError(error: unknown): Classification {
    if (error instanceof LedgerError) {
      return { type: error.type, ...CLASSIFICATIONS[error.type] };
    }

    const lowerMessage = (error instanceof Error ? error.message : String(error)).toLowerCase();

    if (lowerMessage.includes('database') ||
      lowerMessage.includes('connection') ||
      lowerMessage.includes('econnrefused') ||
      lowerMessage.includes('timeout')) {
      return { type: ErrorType.STORE_UNAVAILABLE, ...CLASSIFICATIONS[ErrorType.STORE_UNAVAILABLE] };
    }

    if (lowerMessage.includes('validation') ||
      lowerMessage.includes('invalid') ||
      lowerMessage.includes('must be')) {
      return { type: ErrorType.VALIDATION_ERROR, ...CLASSIFICATIONS[ErrorType.VALIDATION_ERROR] };
    }

    if (lowerMessage.includes('queue') || lowerMessage.includes('concurrent')) {
      return { type: ErrorType.CONCURRENCY_ERROR, ...CLASSIFICATIONS[ErrorType.CONCURRENCY_ERROR] };
    }

    return { type: ErrorType.SYSTEM_ERROR, ...CLASSIFICATIONS[ErrorType.SYSTEM_ERROR] };
  }

  private logError(error: StructuredError): void {
    this.errorLog.push(error);

    if (this.errorLog.length > this.maxLogSize) {
      this.errorLog = this.errorLog.slice(-this.maxLogSize);
    }

    const logData = {
      type: error.type,
      severity: error.severity,
      context: error.context,
      recoverable: error.recoverable,
      retryable: error.retryable
    };

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        this.log.fatal(logData, error.message);
        break;
      case ErrorSeverity.HIGH:
        this.log.error(logData, error.message);
        break;
      case ErrorSeverity.MEDIUM:
        this.log.warn(logData, error.message);
        break;
      case ErrorSeverity.LOW:
        this.log.info(logData, error.message);
        break;
    }
  }
}

// Export singleton instance
export const errorHandler = ErrorHandler.getInstance();
