/**
 * Layout Grouping
 *
 * Turns positioned text items into line blocks in reading order: pages in
 * sequence, lines top-to-bottom, items left-to-right within a line band.
 * Pure and deterministic.
 */

import type { BlockStyle, FontSizeBucket, TextBlock } from '../types';
import type { RawPage, RawTextItem } from './pdfReader';
import { normalizeItemText } from './textNormalizer';

/** Items whose tops differ by at most this share of the line height share a line */
const LINE_BAND_RATIO = 0.5;

/** Horizontal gaps wider than this many font sizes read as a column break */
const COLUMN_GAP_RATIO = 2;

/** Gaps narrower than this share of the font size join without a space */
const WORD_GAP_RATIO = 0.1;

/** Separator kept between items split by a column gap */
export const COLUMN_SEPARATOR = '   ';

const BOLD_FONT = /bold|black|heavy|semibold|demi/i;

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Classify a font size relative to the document's body size
 */
export function bucketFontSize(fontSize: number, bodySize: number): FontSizeBucket {
  if (bodySize <= 0) {
    return 'body';
  }
  const ratio = fontSize / bodySize;
  if (ratio < 0.9) return 'small';
  if (ratio <= 1.15) return 'body';
  if (ratio <= 1.6) return 'large';
  return 'title';
}

export function isBoldFont(fontName: string): boolean {
  return BOLD_FONT.test(fontName);
}

function groupLines(items: readonly RawTextItem[]): RawTextItem[][] {
  const sorted = [...items].sort((a, b) => a.top - b.top || a.x - b.x);
  const lines: RawTextItem[][] = [];
  let current: RawTextItem[] = [];
  let bandTop = 0;
  let bandHeight = 0;

  for (const item of sorted) {
    if (current.length > 0 && item.top - bandTop <= LINE_BAND_RATIO * bandHeight) {
      current.push(item);
      continue;
    }
    if (current.length > 0) {
      lines.push(current);
    }
    current = [item];
    bandTop = item.top;
    bandHeight = item.height;
  }
  if (current.length > 0) {
    lines.push(current);
  }

  return lines.map(line => [...line].sort((a, b) => a.x - b.x));
}

function joinLine(line: readonly RawTextItem[]): string {
  let text = '';
  let previous: RawTextItem | null = null;

  for (const item of line) {
    const piece = normalizeItemText(item.text).replace(/\s+/g, ' ').trim();
    if (!piece) {
      continue;
    }
    if (previous) {
      const gap = item.x - (previous.x + previous.width);
      const size = Math.max(previous.fontSize, item.fontSize);
      if (gap > COLUMN_GAP_RATIO * size) {
        text += COLUMN_SEPARATOR;
      } else if (gap > WORD_GAP_RATIO * size) {
        text += ' ';
      }
    }
    text += piece;
    previous = item;
  }

  return text;
}

function lineStyle(line: readonly RawTextItem[], bodySize: number): BlockStyle {
  const fontSize = Math.max(...line.map(item => item.fontSize));
  return {
    fontSizeBucket: bucketFontSize(fontSize, bodySize),
    isBold: line.every(item => isBoldFont(item.fontName)),
    fontSize
  };
}

/**
 * Build the ordered block sequence for a document
 */
export function buildTextBlocks(pages: readonly RawPage[]): TextBlock[] {
  const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
  const bodySize = median(
    ordered.flatMap(page => page.items.filter(item => item.text.trim() !== '').map(item => item.fontSize))
  );
  const blocks: TextBlock[] = [];

  for (const page of ordered) {
    for (const line of groupLines(page.items)) {
      const text = joinLine(line);
      if (!text) {
        continue;
      }

      const left = Math.min(...line.map(item => item.x));
      const top = Math.min(...line.map(item => item.top));
      const right = Math.max(...line.map(item => item.x + item.width));
      const bottom = Math.max(...line.map(item => item.top + item.height));

      blocks.push(Object.freeze({
        index: blocks.length,
        text,
        page: page.pageNumber,
        bbox: Object.freeze({ x: left, y: top, width: right - left, height: bottom - top }),
        style: Object.freeze(lineStyle(line, bodySize))
      }));
    }
  }

  return blocks;
}
