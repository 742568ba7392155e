/**
 * Candidate Pool
 *
 * Every span extracted from one document, frozen in document order. Conflict
 * notes and rating explanations refer to spans by id; the pool resolves them.
 */

import { FIELD_KINDS } from '../types';
import type { CandidateSpan, FieldKind } from '../types';

const FIELD_ORDER: ReadonlyMap<FieldKind, number> = new Map(FIELD_KINDS.map((field, index) => [field, index] as const));

/**
 * Document order: section, block, field, extractor, then id
 */
export function compareSpans(a: CandidateSpan, b: CandidateSpan): number {
  return a.position.sectionIndex - b.position.sectionIndex
    || a.position.blockIndex - b.position.blockIndex
    || (FIELD_ORDER.get(a.field) ?? 0) - (FIELD_ORDER.get(b.field) ?? 0)
    || a.extractorId.localeCompare(b.extractorId)
    || a.id.localeCompare(b.id);
}

export class CandidatePool {
  private readonly spans: readonly CandidateSpan[];
  private readonly index: ReadonlyMap<string, CandidateSpan>;

  constructor(spans: Iterable<CandidateSpan>) {
    this.spans = Object.freeze([...spans].sort(compareSpans));
    this.index = new Map(this.spans.map(span => [span.id, span] as const));
  }

  get size(): number {
    return this.spans.length;
  }

  all(): readonly CandidateSpan[] {
    return this.spans;
  }

  get(id: string): CandidateSpan | undefined {
    return this.index.get(id);
  }

  /**
   * Spans for the given ids, skipping unknown ones
   */
  resolve(ids: readonly string[]): CandidateSpan[] {
    return ids.flatMap(id => {
      const span = this.index.get(id);
      return span ? [span] : [];
    });
  }

  byField(field: FieldKind): CandidateSpan[] {
    return this.spans.filter(span => span.field === field);
  }
}
