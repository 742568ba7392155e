/**
 * Extraction Runner
 *
 * Runs every applicable extractor over every section as an independent task
 * and joins them into the document's candidate pool. A failing extractor
 * contributes no spans; an aborted signal discards the whole run.
 */

import { loggers } from '../../shared/logger';
import { ProfilerErrorFactory } from '../errors/types';
import { ProfilerLogger } from '../logging/logger';
import type { CandidateSpan, Section } from '../types';
import { CandidatePool } from './candidatePool';
import type { ExtractorRegistry } from './registry';
import type { Extractor } from './types';

export interface RunExtractorsOptions {
  signal?: AbortSignal;
  documentId?: string;
}

function nextTick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

function throwIfAborted(signal: AbortSignal | undefined, documentId: string): void {
  if (signal?.aborted) {
    throw ProfilerErrorFactory.processingCancelled(documentId, 'extraction');
  }
}

async function runTask(
  extractor: Extractor,
  section: Section,
  signal: AbortSignal | undefined,
  documentId: string
): Promise<CandidateSpan[]> {
  await nextTick();
  throwIfAborted(signal, documentId);

  try {
    return extractor.extract(section);
  } catch (error) {
    // Fall back to no candidates from this extractor
    ProfilerLogger.logError(error instanceof Error ? error : new Error(String(error)), {
      operation: 'extraction',
      documentId,
      extractorId: extractor.id,
      sectionId: section.id,
      fallback: 'no_candidates'
    });
    return [];
  }
}

export async function runExtractors(
  sections: readonly Section[],
  registry: ExtractorRegistry,
  options: RunExtractorsOptions = {}
): Promise<CandidatePool> {
  const { signal, documentId = 'document' } = options;
  throwIfAborted(signal, documentId);
  const startTime = Date.now();

  const tasks = sections.flatMap(section =>
    registry.forKind(section.kind).map(extractor => runTask(extractor, section, signal, documentId))
  );

  const results = await Promise.all(tasks);
  throwIfAborted(signal, documentId);

  const pool = new CandidatePool(results.flat());
  loggers.extraction.debug({ documentId, tasks: tasks.length, spans: pool.size }, 'Extraction joined');
  ProfilerLogger.logExtraction(documentId, pool.size, tasks.length, Date.now() - startTime);
  return pool;
}
