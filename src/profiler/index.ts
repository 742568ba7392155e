/**
 * Resume Profiler
 *
 * Turns résumé PDFs into structured, auditable candidate profiles and rates
 * them against a configurable rubric.
 *
 * Usage:
 *   import { ResumeProfiler } from './profiler';
 *   const profiler = new ResumeProfiler();
 *   const { record, rating } = await profiler.processDocument(bytes, { rubric });
 */

export {
  ResumeProfiler,
  processDocument,
  processDocuments,
  editProfile,
  currentMonth
} from './pipeline';
export type {
  BatchOptions,
  DocumentInput,
  DocumentOutcome,
  EditResult,
  ProcessOptions,
  ProcessResult,
  ProfilerOptions,
  RatingOutcome
} from './pipeline';

export * from './types';
export * from './errors/types';
export * from './config';
export * from './loader';
export * from './segmenter';
export * from './extractors';
export * from './synthesizer';
export * from './rating';
export * from './validation';
export { ProfilerLogger, LogType } from './logging/logger';
export type { LogEntry } from './logging/logger';
