/**
 * Profiler Error Types
 *
 * Error codes and response structures for the profiling pipeline.
 * Extends shared error types from src/shared/errors/types.ts
 *
 * Only conditions that stop a stage are errors. Unresolved fields,
 * low-confidence matches and missing rubric fields are record state.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import type { ValidationError } from '../../shared/validation/types';

/**
 * Profiler error codes
 */
export enum ProfilerErrorCode {
  UNREADABLE_DOCUMENT = 'UNREADABLE_DOCUMENT',
  INVALID_RUBRIC = 'INVALID_RUBRIC',
  INVALID_EDIT = 'INVALID_EDIT',
  PROCESSING_CANCELLED = 'PROCESSING_CANCELLED',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * Error response structure for the calling service layer
 */
export interface ErrorResponse {
  error: ProfilerErrorCode;
  message: string;
  details?: string;
  timestamp: string;
  request_id?: string;
  validation_errors?: ValidationError[];
  retryable?: boolean;
  suggested_action?: string;
}

export interface ProfilerErrorOptions {
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  validationErrors?: ValidationError[];
  retryable?: boolean;
  suggestedAction?: string;
}

/**
 * Profiler-specific error class
 */
export class ProfilerError extends AppError {
  public readonly code: ProfilerErrorCode;
  public readonly validationErrors?: ValidationError[];
  public readonly retryable: boolean;

  constructor(
    code: ProfilerErrorCode,
    userMessage: string,
    technicalDetails: string,
    options?: ProfilerErrorOptions
  ) {
    super({
      category: options?.category || ErrorCategory.UNEXPECTED,
      severity: options?.severity || ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options?.context,
      recoverable: options?.retryable ?? false,
      suggestedAction: options?.suggestedAction
    });

    this.name = 'ProfilerError';
    this.code = code;
    this.validationErrors = options?.validationErrors;
    this.retryable = options?.retryable ?? false;
  }

  /**
   * Convert to error response format
   */
  toErrorResponse(requestId?: string): ErrorResponse {
    return {
      error: this.code,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      request_id: requestId,
      validation_errors: this.validationErrors,
      retryable: this.retryable,
      suggested_action: this.suggestedAction
    };
  }
}

/**
 * Type guard, optionally narrowed to one code
 */
export function isProfilerError(error: unknown, code?: ProfilerErrorCode): error is ProfilerError {
  return error instanceof ProfilerError && (code === undefined || error.code === code);
}

/**
 * Factory functions for the error taxonomy
 */
export class ProfilerErrorFactory {
  /**
   * The byte stream is not a PDF or holds no extractable text
   */
  static unreadableDocument(
    reason: string,
    context?: Record<string, unknown>
  ): ProfilerError {
    return new ProfilerError(
      ProfilerErrorCode.UNREADABLE_DOCUMENT,
      `Document could not be read: ${reason}`,
      reason,
      {
        category: ErrorCategory.DOCUMENT,
        severity: ErrorSeverity.HIGH,
        context,
        retryable: false,
        suggestedAction: 'Upload a text-based PDF or re-export the document'
      }
    );
  }

  static invalidRubric(
    validationErrors: ValidationError[]
  ): ProfilerError {
    const summary = validationErrors
      .map(err => `${err.field || 'rubric'}: ${err.message}`)
      .join('; ');

    return new ProfilerError(
      ProfilerErrorCode.INVALID_RUBRIC,
      'Rubric validation failed',
      summary,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        validationErrors,
        retryable: false,
        suggestedAction: 'Fix the rubric configuration; criterion weights must sum to 1.0'
      }
    );
  }

  static invalidEdit(
    field: string,
    reason: string,
    received?: unknown
  ): ProfilerError {
    return new ProfilerError(
      ProfilerErrorCode.INVALID_EDIT,
      `Invalid edit: ${field}`,
      reason,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.LOW,
        context: { field },
        validationErrors: [{ field, message: reason, received }],
        retryable: false,
        suggestedAction: 'Check the edit target and value format'
      }
    );
  }

  static processingCancelled(
    documentId: string,
    stage: string
  ): ProfilerError {
    return new ProfilerError(
      ProfilerErrorCode.PROCESSING_CANCELLED,
      'Document processing was cancelled',
      `Processing of ${documentId} was aborted during ${stage}`,
      {
        category: ErrorCategory.CANCELLATION,
        severity: ErrorSeverity.LOW,
        context: { documentId, stage },
        retryable: true,
        suggestedAction: 'Resubmit the document'
      }
    );
  }

  static configurationError(
    field: string,
    reason: string
  ): ProfilerError {
    return new ProfilerError(
      ProfilerErrorCode.CONFIGURATION_ERROR,
      'Configuration error',
      `Invalid configuration for ${field}: ${reason}`,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        context: { field },
        retryable: false,
        suggestedAction: 'Check configuration settings'
      }
    );
  }
}
