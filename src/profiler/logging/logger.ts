/**
 * Profiler Logger
 *
 * Audit log for every pipeline stage: what was loaded, how it was segmented,
 * how many candidates each document produced, how synthesis resolved them and
 * how the profile was rated. Entries are kept in memory (bounded) and
 * forwarded to the structured logger.
 */

import { ErrorLogger } from '../../shared/errors/logger';
import { AppError } from '../../shared/errors/types';
import { createComponentLogger } from '../../shared/logger';
import type { ProfileRecord, Rating, Section } from '../types';

/**
 * Log entry types
 */
export enum LogType {
  LOAD = 'LOAD',
  SEGMENTATION = 'SEGMENTATION',
  EXTRACTION = 'EXTRACTION',
  SYNTHESIS = 'SYNTHESIS',
  RATING = 'RATING',
  EDIT = 'EDIT',
  ERROR = 'ERROR',
  INFO = 'INFO'
}

export interface LogEntry {
  type: LogType;
  timestamp: Date;
  message: string;
  context?: Record<string, unknown>;
}

const pinoLogger = createComponentLogger('profiler');

export class ProfilerLogger {
  private static logs: LogEntry[] = [];
  private static maxLogs = 5000;
  private static enabled = true;

  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  static setMaxLogs(maxLogs: number): void {
    this.maxLogs = Math.max(1, maxLogs);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  static logLoad(
    documentId: string,
    blockCount: number,
    pageCount: number,
    duration?: number
  ): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.LOAD,
      timestamp: new Date(),
      message: `Loaded ${documentId}: ${blockCount} blocks on ${pageCount} pages`,
      context: { documentId, blockCount, pageCount, durationMs: duration }
    });
  }

  static logSegmentation(documentId: string, sections: readonly Section[]): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.SEGMENTATION,
      timestamp: new Date(),
      message: `Segmented ${documentId} into ${sections.length} sections`,
      context: {
        documentId,
        sections: sections.map(section => ({
          kind: section.kind,
          blocks: section.blocks.length
        }))
      }
    });
  }

  static logExtraction(
    documentId: string,
    spanCount: number,
    taskCount: number,
    duration?: number
  ): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.EXTRACTION,
      timestamp: new Date(),
      message: `Extracted ${spanCount} candidate spans from ${taskCount} extractor runs`,
      context: { documentId, spanCount, taskCount, durationMs: duration }
    });
  }

  /**
   * Log the outcome of synthesis with its conflict summary
   */
  static logSynthesis(documentId: string, record: ProfileRecord): void {
    if (!this.enabled) return;

    const unresolved = record.unresolvedConflicts.filter(note => note.resolution === 'LEFT_UNRESOLVED');

    this.addLog({
      type: LogType.SYNTHESIS,
      timestamp: new Date(),
      message: `Synthesized ${documentId}: ${record.unresolvedConflicts.length} conflict notes`,
      context: {
        documentId,
        educationCount: record.education.length,
        experienceCount: record.experience.length,
        skillCount: record.skills.length,
        conflictCount: record.unresolvedConflicts.length,
        unresolvedFields: unresolved.map(note => note.field),
        needsReview: record.needsReview
      }
    });
  }

  static logRating(documentId: string, rating: Rating): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.RATING,
      timestamp: new Date(),
      message: `Rating calculated: ${rating.aggregate.toFixed(3)}`,
      context: {
        documentId,
        profileVersion: rating.profileVersion,
        aggregate: rating.aggregate,
        subScores: rating.subScores,
        failedClosed: rating.explanation
          .filter(entry => entry.note !== undefined)
          .map(entry => entry.criterion)
      }
    });
  }

  static logEdit(field: string, profileVersion: number): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.EDIT,
      timestamp: new Date(),
      message: `Manual edit of ${field}`,
      context: { field, profileVersion }
    });
  }

  static logError(error: AppError | Error, context?: Record<string, unknown>): void {
    ErrorLogger.logError(error);

    if (!this.enabled) return;

    this.addLog({
      type: LogType.ERROR,
      timestamp: new Date(),
      message: error.message,
      context: {
        ...context,
        error: error instanceof AppError ? {
          category: error.category,
          severity: error.severity,
          recoverable: error.recoverable
        } : {
          name: error.name
        }
      }
    });
  }

  static logInfo(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled) return;

    this.addLog({
      type: LogType.INFO,
      timestamp: new Date(),
      message,
      context
    });
  }

  static getLogs(): LogEntry[] {
    return [...this.logs];
  }

  static getLogsByType(type: LogType): LogEntry[] {
    return this.logs.filter(log => log.type === type);
  }

  static getRecentLogs(count: number): LogEntry[] {
    return this.logs.slice(-count);
  }

  static getLogsForDocument(documentId: string): LogEntry[] {
    return this.logs.filter(log => log.context?.documentId === documentId);
  }

  static clearLogs(): void {
    this.logs = [];
  }

  static exportLogs(): string {
    return JSON.stringify(this.logs, null, 2);
  }

  private static addLog(entry: LogEntry): void {
    this.logs.push(entry);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    if (entry.type === LogType.ERROR) {
      pinoLogger.warn({ logType: entry.type, ...entry.context }, entry.message);
    } else {
      pinoLogger.debug({ logType: entry.type, ...entry.context }, entry.message);
    }
  }
}
