/**
 * Tests for shared error handling utilities
 * Verifies the error model and the bounded error log used by every stage
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ErrorLogger,
  ErrorCategory,
  ErrorSeverity,
  AppError
} from '../../shared/errors';
import { ProfilerErrorCode, ProfilerErrorFactory, isProfilerError } from '../../profiler/errors/types';

function appError(userMessage: string, category = ErrorCategory.VALIDATION, severity = ErrorSeverity.LOW): AppError {
  return new AppError({
    category,
    severity,
    userMessage,
    technicalDetails: 'Details',
    timestamp: new Date('2024-01-01T00:00:00Z'),
    recoverable: false
  });
}

describe('Shared Error Handling', () => {
  beforeEach(() => {
    ErrorLogger.clearLogs();
  });

  afterEach(() => {
    ErrorLogger.setMaxLogs(1000);
  });

  describe('AppError', () => {
    it('should carry the structured error information', () => {
      const error = appError('Invalid value');

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('Invalid value');
      expect(error.name).toBe('AppError');
      expect(error.toErrorInfo()).toEqual({
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.LOW,
        userMessage: 'Invalid value',
        technicalDetails: 'Details',
        timestamp: new Date('2024-01-01T00:00:00Z'),
        context: undefined,
        recoverable: false,
        suggestedAction: undefined
      });
    });
  });

  describe('Error Logging', () => {
    it('should log app errors', () => {
      ErrorLogger.logError(appError('Logged'));

      const logs = ErrorLogger.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].userMessage).toBe('Logged');
      expect(logs[0].category).toBe(ErrorCategory.VALIDATION);
    });

    it('should log plain errors as unexpected', () => {
      ErrorLogger.logError(new Error('boom'));

      const [log] = ErrorLogger.getLogs();
      expect(log.category).toBe(ErrorCategory.UNEXPECTED);
      expect(log.severity).toBe(ErrorSeverity.CRITICAL);
      expect(log.technicalDetails).toBe('boom');
    });

    it('should get logs by category', () => {
      ErrorLogger.logError(appError('Val error'));
      ErrorLogger.logError(appError('Doc error', ErrorCategory.DOCUMENT));
      ErrorLogger.logError(appError('Val error 2'));

      expect(ErrorLogger.getLogsByCategory(ErrorCategory.VALIDATION)).toHaveLength(2);
      expect(ErrorLogger.getLogsByCategory(ErrorCategory.DOCUMENT)).toHaveLength(1);
    });

    it('should get logs by severity', () => {
      ErrorLogger.logError(appError('Low'));
      ErrorLogger.logError(appError('High', ErrorCategory.DOCUMENT, ErrorSeverity.HIGH));

      expect(ErrorLogger.getLogsBySeverity(ErrorSeverity.HIGH).map(log => log.userMessage)).toEqual(['High']);
    });

    it('should get recent logs', () => {
      for (let i = 0; i < 5; i++) {
        ErrorLogger.logError(appError(`Error ${i}`));
      }

      expect(ErrorLogger.getRecentLogs(2).map(log => log.userMessage)).toEqual(['Error 3', 'Error 4']);
    });

    it('should keep only the most recent entries', () => {
      ErrorLogger.setMaxLogs(3);
      for (let i = 0; i < 5; i++) {
        ErrorLogger.logError(appError(`Error ${i}`));
      }

      expect(ErrorLogger.getLogs().map(log => log.userMessage)).toEqual(['Error 2', 'Error 3', 'Error 4']);
    });

    it('should clear logs', () => {
      ErrorLogger.logError(appError('Test'));
      ErrorLogger.clearLogs();

      expect(ErrorLogger.getLogs()).toHaveLength(0);
    });
  });

  describe('Profiler errors', () => {
    it('should build unreadable document errors', () => {
      const error = ProfilerErrorFactory.unreadableDocument('not a PDF');

      expect(error).toBeInstanceOf(AppError);
      expect(error.code).toBe(ProfilerErrorCode.UNREADABLE_DOCUMENT);
      expect(error.category).toBe(ErrorCategory.DOCUMENT);
      expect(error.message).toBe('Document could not be read: not a PDF');
      expect(error.retryable).toBe(false);
    });

    it('should mark cancellation as retryable', () => {
      const error = ProfilerErrorFactory.processingCancelled('doc-1', 'extraction');

      expect(error.retryable).toBe(true);
      expect(error.technicalDetails).toBe('Processing of doc-1 was aborted during extraction');
    });

    it('should summarize rubric validation errors', () => {
      const error = ProfilerErrorFactory.invalidRubric([
        { field: 'criteria', message: 'weights must sum to 1.0' },
        { field: '', message: 'bad' }
      ]);

      expect(error.technicalDetails).toBe('criteria: weights must sum to 1.0; rubric: bad');
    });

    it('should convert to an error response', () => {
      const response = ProfilerErrorFactory.invalidEdit('contact.email', 'invalid email', 'nope').toErrorResponse('req-1');

      expect(response.error).toBe(ProfilerErrorCode.INVALID_EDIT);
      expect(response.request_id).toBe('req-1');
      expect(response.validation_errors).toEqual([{ field: 'contact.email', message: 'invalid email', received: 'nope' }]);
    });

    it('should narrow by code', () => {
      const error = ProfilerErrorFactory.configurationError('synthesis.swapPenalty', 'too large');

      expect(isProfilerError(error)).toBe(true);
      expect(isProfilerError(error, ProfilerErrorCode.CONFIGURATION_ERROR)).toBe(true);
      expect(isProfilerError(error, ProfilerErrorCode.INVALID_EDIT)).toBe(false);
      expect(isProfilerError(new Error('plain'))).toBe(false);
    });
  });
});
