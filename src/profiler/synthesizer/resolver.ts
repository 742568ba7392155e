/**
 * Field Resolution
 *
 * Picks one value for a field from its candidate spans. Candidates agree
 * when their comparison keys match; disagreeing clusters compete by summed
 * confidence, ties going to the earliest in document order.
 */

import { compareSpans } from '../extractors/candidatePool';
import { canonicalValue, comparisonKey } from '../extractors/normalize';
import type { CandidateSpan, ConflictNote, ResolvedField } from '../types';

/** Summed confidences closer than this are a tie */
export const TIE_EPSILON = 1e-9;

export interface ResolutionOptions {
  resolutionThreshold: number;
}

export interface FieldResolution {
  field: ResolvedField;
  /** Null when every candidate agreed and the field resolved */
  note: ConflictNote | null;
}

interface Cluster {
  spans: CandidateSpan[];
  sum: number;
}

export function emptyField<T = string>(): ResolvedField<T> {
  return { value: null, confidence: 0, provenance: 'extracted', sourceSpanIds: [] };
}

function clusterSpans(spans: readonly CandidateSpan[]): Cluster[] {
  const clusters = new Map<string, Cluster>();
  for (const span of spans) {
    const key = comparisonKey(span.field, span.value);
    const cluster = clusters.get(key);
    if (cluster) {
      cluster.spans.push(span);
      cluster.sum += span.confidence;
    } else {
      clusters.set(key, { spans: [span], sum: span.confidence });
    }
  }
  // Insertion order is the document order of each cluster's first span
  return [...clusters.values()];
}

/**
 * Highest confidence span, earliest on ties
 */
export function bestSpan(spans: readonly CandidateSpan[]): CandidateSpan {
  return spans.reduce((best, span) => (span.confidence > best.confidence ? span : best));
}

function unresolved(path: string, spans: readonly CandidateSpan[]): FieldResolution {
  return {
    field: emptyField(),
    note: {
      field: path,
      candidateIds: spans.map(span => span.id),
      resolution: 'LEFT_UNRESOLVED',
      reason: 'below_threshold',
      overrides: []
    }
  };
}

/**
 * Resolve one field path from its candidates
 */
export function resolveField(
  path: string,
  candidates: readonly CandidateSpan[],
  options: ResolutionOptions
): FieldResolution {
  if (candidates.length === 0) {
    return { field: emptyField(), note: null };
  }

  const spans = [...candidates].sort(compareSpans);
  const clusters = clusterSpans(spans);

  let winner = clusters[0];
  for (const cluster of clusters.slice(1)) {
    if (cluster.sum > winner.sum + TIE_EPSILON) {
      winner = cluster;
    }
  }

  if (winner.sum < options.resolutionThreshold) {
    return unresolved(path, spans);
  }

  const best = bestSpan(winner.spans);
  const value = canonicalValue(best.field, best.value);
  const sourceSpanIds = winner.spans.map(span => span.id);

  if (clusters.length === 1) {
    return {
      field: { value, confidence: best.confidence, provenance: 'extracted', sourceSpanIds },
      note: null
    };
  }

  const total = clusters.reduce((sum, cluster) => sum + cluster.sum, 0);

  return {
    field: {
      value,
      confidence: total > 0 ? best.confidence * (winner.sum / total) : 0,
      provenance: 'extracted',
      sourceSpanIds
    },
    note: {
      field: path,
      candidateIds: spans.map(span => span.id),
      resolution: 'AUTO_RESOLVED',
      chosenId: best.id,
      reason: 'value_disagreement',
      overrides: []
    }
  };
}
