/**
 * Test fixtures: in-process PDF reader, block and span builders
 */

import type { PdfReader, RawDocument, RawPage, RawTextItem } from '../../profiler/loader/pdfReader';
import type { BlockStyle, CandidateSpan, FieldKind, Section, SectionKind, TextBlock } from '../../profiler/types';

export interface LineSpec {
  text: string;
  /** Font size, defaults to 10 */
  size?: number;
  bold?: boolean;
}

export type PageSpec = Array<string | LineSpec>;

const LINE_PITCH = 20;
const LEFT_MARGIN = 50;

function toLine(spec: string | LineSpec): LineSpec {
  return typeof spec === 'string' ? { text: spec } : spec;
}

/**
 * One text item per line, stacked top to bottom
 */
export function rawPage(pageNumber: number, lines: PageSpec): RawPage {
  const items: RawTextItem[] = lines.map(toLine).map((line, index) => {
    const fontSize = line.size ?? 10;
    return {
      text: line.text,
      x: LEFT_MARGIN,
      top: 50 + index * LINE_PITCH,
      width: line.text.length * fontSize * 0.5,
      height: fontSize,
      fontSize,
      fontName: line.bold ? 'Helvetica-Bold' : 'Helvetica'
    };
  });

  return { pageNumber, width: 612, height: 792, items };
}

/**
 * Stands in for pdf-parse: serves a fixed layout for any byte stream
 */
export class FakePdfReader implements PdfReader {
  readCount = 0;

  constructor(
    private readonly pages: PageSpec[],
    private readonly metadata: Partial<RawDocument['metadata']> = {}
  ) {}

  async read(): Promise<RawDocument> {
    this.readCount++;
    return {
      pages: this.pages.map((lines, index) => rawPage(index + 1, lines)),
      metadata: { pageCount: this.pages.length, ...this.metadata }
    };
  }
}

export class FailingPdfReader implements PdfReader {
  constructor(private readonly message: string) {}

  async read(): Promise<RawDocument> {
    throw new Error(this.message);
  }
}

export function pdfBytes(body = 'fake document body'): Uint8Array {
  return new Uint8Array(Buffer.from(`%PDF-1.4\n${body}\n%%EOF`, 'latin1'));
}

const BODY_STYLE: BlockStyle = { fontSizeBucket: 'body', isBold: false, fontSize: 10 };

export function block(index: number, text: string, style: Partial<BlockStyle> = {}): TextBlock {
  return {
    index,
    text,
    page: 1,
    bbox: { x: LEFT_MARGIN, y: 50 + index * LINE_PITCH, width: text.length * 5, height: 10 },
    style: { ...BODY_STYLE, ...style }
  };
}

export function header(index: number, text: string): TextBlock {
  return block(index, text, { isBold: true });
}

/**
 * Section over the given lines; the first line is the heading when `heading` is set
 */
export function section(
  kind: SectionKind,
  lines: readonly string[],
  options: { index?: number; heading?: string; firstBlock?: number } = {}
): Section {
  const index = options.index ?? 0;
  const first = options.firstBlock ?? index * 10;
  const texts = options.heading ? [options.heading, ...lines] : [...lines];
  const blocks = texts.map((text, offset) =>
    offset === 0 && options.heading ? header(first, text) : block(first + offset, text)
  );

  return {
    id: `section-${index}`,
    index,
    kind,
    heading: options.heading ?? null,
    blocks,
    span: { start: first, end: first + blocks.length }
  };
}

export interface SpanSpec {
  field: FieldKind;
  value: string;
  confidence: number;
  extractorId?: string;
  sectionIndex?: number;
  blockIndex?: number;
  sectionKind?: SectionKind;
  id?: string;
}

export function span(spec: SpanSpec): CandidateSpan {
  const extractorId = spec.extractorId ?? 'test';
  const sectionIndex = spec.sectionIndex ?? 0;
  const blockIndex = spec.blockIndex ?? 0;

  return {
    id: spec.id ?? `${extractorId}/${sectionIndex}/${blockIndex}/${spec.field}/${spec.value}`,
    field: spec.field,
    value: spec.value,
    rawText: spec.value,
    confidence: spec.confidence,
    extractorId,
    sourceSectionId: `section-${sectionIndex}`,
    sectionKind: spec.sectionKind ?? 'OTHER',
    position: { sectionIndex, blockIndex }
  };
}
