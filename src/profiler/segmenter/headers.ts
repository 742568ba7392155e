/**
 * Section Header Detection
 *
 * A block opens a section when its text matches a header vocabulary and it is
 * styled like a header: short, and bold, enlarged, upper-case, title-cased or
 * ending in a colon.
 */

import headerVocabulary from '../data/headers.json';
import { SECTION_KINDS } from '../types';
import type { SectionKind, TextBlock } from '../types';

const MAX_HEADER_WORDS = 5;

const MINOR_WORDS = new Set(['and', 'of', 'the', 'for', 'in', '&']);

const HEADER_KINDS: ReadonlyMap<string, SectionKind> = new Map(
  SECTION_KINDS.flatMap(kind => headerVocabulary[kind].map(phrase => [phrase, kind] as const))
);

/**
 * Lowercase, spell out ampersands and drop everything but letters
 */
export function normalizeHeader(text: string): string {
  return text
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z]+/g, ' ')
    .trim();
}

export function headerKind(text: string): SectionKind | null {
  return HEADER_KINDS.get(normalizeHeader(text)) ?? null;
}

function isAllCaps(text: string): boolean {
  return /[A-Z]/.test(text) && text === text.toUpperCase();
}

function isTitleCase(words: readonly string[]): boolean {
  return words.every(word => MINOR_WORDS.has(word) || /^[A-Z]/.test(word));
}

export function looksLikeHeader(block: TextBlock): boolean {
  const text = block.text.trim();
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0 || words.length > MAX_HEADER_WORDS) {
    return false;
  }

  return block.style.isBold
    || block.style.fontSizeBucket === 'large'
    || block.style.fontSizeBucket === 'title'
    || isAllCaps(text)
    || text.endsWith(':')
    || isTitleCase(words);
}

/**
 * Section kind a block opens, or null when it is body text
 */
export function classifyHeader(block: TextBlock): SectionKind | null {
  if (!looksLikeHeader(block)) {
    return null;
  }
  return headerKind(block.text);
}
