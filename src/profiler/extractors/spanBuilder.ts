/**
 * Span Builder
 *
 * Creates candidate spans for one extractor run over one section. Span ids
 * are stable: `extractor/section/block/field/ordinal`.
 */

import type { CandidateSpan, FieldKind, Section, TextBlock } from '../types';

export class SpanBuilder {
  private readonly spans: CandidateSpan[] = [];
  private readonly ordinals = new Map<string, number>();

  constructor(
    private readonly extractorId: string,
    private readonly section: Section
  ) {}

  add(
    block: TextBlock,
    field: FieldKind,
    value: string,
    rawText: string,
    confidence: number
  ): CandidateSpan | null {
    if (!value.trim()) {
      return null;
    }

    const slot = `${block.index}/${field}`;
    const ordinal = this.ordinals.get(slot) ?? 0;
    this.ordinals.set(slot, ordinal + 1);

    const span: CandidateSpan = Object.freeze({
      id: `${this.extractorId}/${this.section.index}/${slot}/${ordinal}`,
      field,
      value,
      rawText,
      confidence: Math.min(1, Math.max(0, confidence)),
      extractorId: this.extractorId,
      sourceSectionId: this.section.id,
      sectionKind: this.section.kind,
      position: Object.freeze({ sectionIndex: this.section.index, blockIndex: block.index })
    });

    this.spans.push(span);
    return span;
  }

  build(): CandidateSpan[] {
    return [...this.spans];
  }
}
