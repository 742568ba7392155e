/**
 * Profiling Pipeline
 *
 * Main entry point that wires the stages together:
 * load -> segment -> extract (concurrently) -> synthesize -> rate.
 *
 * Only an unreadable document (or cancellation) stops a document. An invalid
 * rubric does not block synthesis; it is reported beside the record.
 */

import { randomUUID } from 'crypto';
import { ErrorLogger } from '../shared/errors/logger';
import { createDocumentLogger, loggers } from '../shared/logger';
import { ConfigManager } from './config';
import type { ProfilerConfig, ProfilerConfigOverrides } from './config';
import { isProfilerError, ProfilerErrorCode, ProfilerErrorFactory } from './errors/types';
import type { ProfilerError } from './errors/types';
import { CandidatePool } from './extractors/candidatePool';
import { createDefaultRegistry, ExtractorRegistry } from './extractors/registry';
import { runExtractors } from './extractors/runner';
import { DocumentLoader } from './loader/documentLoader';
import type { PdfReader } from './loader/pdfReader';
import { ProfilerLogger } from './logging/logger';
import { rate } from './rating/ratingEngine';
import { segment } from './segmenter/segmenter';
import { applyEdit } from './synthesizer/edit';
import { synthesize } from './synthesizer/synthesizer';
import type { DateValue, DocumentMetadata, ProfileRecord, Rating, Section } from './types';

export interface ProfilerOptions {
  config?: ProfilerConfigOverrides;
  /** PDF backend; defaults to pdf-parse */
  reader?: PdfReader;
  /** Extractor set; defaults to the built-in extractors */
  registry?: ExtractorRegistry;
}

export interface ProcessOptions {
  documentId?: string;
  /** Rubric configuration; rating is skipped when absent */
  rubric?: unknown;
  signal?: AbortSignal;
  /** Month PRESENT resolves to; defaults to the current month */
  asOf?: DateValue;
}

export interface RatingOutcome {
  rating: Rating | null;
  /** Set when the rubric failed validation */
  ratingError?: ProfilerError;
}

export interface ProcessResult extends RatingOutcome {
  documentId: string;
  record: ProfileRecord;
  /** Every candidate span, for audit and conflict-note lookups */
  pool: CandidatePool;
  sections: Section[];
  metadata: DocumentMetadata;
}

export interface DocumentInput {
  id: string;
  bytes: Uint8Array;
  signal?: AbortSignal;
}

export type DocumentOutcome =
  | { documentId: string; status: 'fulfilled'; result: ProcessResult }
  | { documentId: string; status: 'rejected'; error: Error };

export interface BatchOptions {
  rubric?: unknown;
  asOf?: DateValue;
  /** Documents processed at once; defaults to the configured concurrency */
  concurrency?: number;
}

export interface EditResult extends RatingOutcome {
  record: ProfileRecord;
}

/**
 * Current month as `YYYY-MM` (UTC)
 */
export function currentMonth(now: Date = new Date()): DateValue {
  return `${now.getUTCFullYear()}-${String(now.getUTCMonth() + 1).padStart(2, '0')}`;
}

function throwIfAborted(signal: AbortSignal | undefined, documentId: string, stage: string): void {
  if (signal?.aborted) {
    throw ProfilerErrorFactory.processingCancelled(documentId, stage);
  }
}

/**
 * Resume profiler
 *
 * Holds the configuration, PDF backend and extractor set shared by every
 * document it processes. Documents share no mutable state.
 */
export class ResumeProfiler {
  private readonly configManager: ConfigManager;
  private readonly loader: DocumentLoader;
  private readonly registry: ExtractorRegistry;

  constructor(options: ProfilerOptions = {}) {
    this.configManager = new ConfigManager(options.config);

    const logging = this.configManager.getLoggingConfig();
    ProfilerLogger.setEnabled(logging.enabled);
    ProfilerLogger.setMaxLogs(logging.maxLogs);
    ErrorLogger.setMaxLogs(logging.maxLogs);

    this.loader = new DocumentLoader(options.reader);
    this.registry = options.registry ?? createDefaultRegistry(this.configManager.getExtractionConfig());

    ProfilerLogger.logInfo('Resume profiler initialized', {
      config: this.configManager.getConfig(),
      extractors: this.registry.list().map(extractor => extractor.id)
    });
  }

  getConfig(): ProfilerConfig {
    return this.configManager.getConfig();
  }

  /**
   * Process one document end to end
   * @throws ProfilerError with code UNREADABLE_DOCUMENT or PROCESSING_CANCELLED
   */
  async processDocument(bytes: Uint8Array, options: ProcessOptions = {}): Promise<ProcessResult> {
    const documentId = options.documentId ?? randomUUID();
    const { signal } = options;
    const startTime = Date.now();
    const log = createDocumentLogger(documentId);
    log.debug({ bytes: bytes.length }, 'Processing started');

    try {
      throwIfAborted(signal, documentId, 'load');
      const { blocks, metadata } = await this.loader.loadDocument(bytes);
      ProfilerLogger.logLoad(documentId, blocks.length, metadata.pageCount, Date.now() - startTime);

      throwIfAborted(signal, documentId, 'segmentation');
      const sections = segment(blocks);
      ProfilerLogger.logSegmentation(documentId, sections);

      const pool = await runExtractors(sections, this.registry, { signal, documentId });

      throwIfAborted(signal, documentId, 'synthesis');
      const record = synthesize(pool, {
        ...this.configManager.getSynthesisConfig(),
        asOf: options.asOf ?? currentMonth()
      });
      ProfilerLogger.logSynthesis(documentId, record);

      const outcome = options.rubric === undefined
        ? { rating: null }
        : this.rateRecord(record, options.rubric, documentId);

      ProfilerLogger.logInfo('Document processed', {
        documentId,
        durationMs: Date.now() - startTime,
        needsReview: record.needsReview
      });
      log.debug({ spans: pool.size, sections: sections.length }, 'Processing finished');

      return { documentId, record, ...outcome, pool, sections, metadata };
    } catch (error) {
      ProfilerLogger.logError(error instanceof Error ? error : new Error(String(error)), {
        operation: 'process_document',
        documentId
      });
      throw error;
    }
  }

  /**
   * Process independent documents through a bounded worker pool.
   * Each document settles on its own; one failure never affects another.
   */
  async processDocuments(documents: readonly DocumentInput[], options: BatchOptions = {}): Promise<DocumentOutcome[]> {
    const configured = this.configManager.getProcessingConfig().concurrency;
    const requested = options.concurrency ?? configured;
    const concurrency = Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : configured;
    const outcomes: DocumentOutcome[] = new Array(documents.length);
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < documents.length) {
        const index = nextIndex++;
        const document = documents[index];
        try {
          const result = await this.processDocument(document.bytes, {
            documentId: document.id,
            signal: document.signal,
            rubric: options.rubric,
            asOf: options.asOf
          });
          outcomes[index] = { documentId: document.id, status: 'fulfilled', result };
        } catch (error) {
          outcomes[index] = {
            documentId: document.id,
            status: 'rejected',
            error: error instanceof Error ? error : new Error(String(error))
          };
        }
      }
    };

    loggers.pipeline.info({ documents: documents.length, concurrency }, 'Batch started');
    await Promise.all(Array.from({ length: Math.min(concurrency, documents.length) }, worker));

    const rejected = outcomes.filter(outcome => outcome.status === 'rejected').length;
    loggers.pipeline.info({ documents: documents.length, rejected }, 'Batch finished');
    return outcomes;
  }

  /**
   * Apply a manual edit and recompute the rating for the new version
   * @throws ProfilerError with code INVALID_EDIT
   */
  editProfile(record: ProfileRecord, target: unknown, value: unknown, rubric?: unknown): EditResult {
    const edited = applyEdit(record, target, value);
    const outcome = rubric === undefined ? { rating: null } : this.rateRecord(edited, rubric);
    return { record: edited, ...outcome };
  }

  private rateRecord(record: ProfileRecord, rubric: unknown, documentId?: string): RatingOutcome {
    try {
      const rating = rate(record, rubric);
      if (documentId) {
        ProfilerLogger.logRating(documentId, rating);
      }
      return { rating };
    } catch (error) {
      if (isProfilerError(error, ProfilerErrorCode.INVALID_RUBRIC)) {
        ProfilerLogger.logError(error, { operation: 'rating', documentId });
        return { rating: null, ratingError: error };
      }
      throw error;
    }
  }
}

let defaultProfiler: ResumeProfiler | null = null;

function getProfiler(): ResumeProfiler {
  if (!defaultProfiler) {
    defaultProfiler = new ResumeProfiler();
  }
  return defaultProfiler;
}

export function processDocument(bytes: Uint8Array, options?: ProcessOptions): Promise<ProcessResult> {
  return getProfiler().processDocument(bytes, options);
}

export function processDocuments(documents: readonly DocumentInput[], options?: BatchOptions): Promise<DocumentOutcome[]> {
  return getProfiler().processDocuments(documents, options);
}

export function editProfile(record: ProfileRecord, target: unknown, value: unknown, rubric?: unknown): EditResult {
  return getProfiler().editProfile(record, target, value, rubric);
}
