/**
 * Extractor Types
 */

import type { CandidateSpan, FieldKind, Section, SectionKind } from '../types';

/**
 * A pluggable extraction strategy: consumes sections of the listed kinds and
 * emits candidate spans for the listed fields. Must not throw on malformed
 * text; no match means an empty list.
 */
export interface Extractor {
  readonly id: string;
  readonly kinds: readonly SectionKind[];
  readonly fields: readonly FieldKind[];
  extract(section: Section): CandidateSpan[];
}

export interface ExtractorOptions {
  /** Minimum similarity for a fuzzy organization lexicon match */
  fuzzyMatchThreshold: number;
}
