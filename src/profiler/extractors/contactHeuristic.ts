/**
 * Contact Heuristic Extractor
 *
 * Lower-confidence contact signals: labelled fields, obfuscated addresses,
 * the candidate's name at the top of the document and a "City, ST" location.
 */

import { headerKind } from '../segmenter/headers';
import { bodyBlocks } from '../segmenter/segmenter';
import type { CandidateSpan, Section, TextBlock } from '../types';
import { normalizeEmail, normalizeName, normalizePhone } from './normalize';
import { SpanBuilder } from './spanBuilder';
import type { Extractor } from './types';

const LABELLED_CONFIDENCE = 0.6;
const STYLED_NAME_CONFIDENCE = 0.9;
const NAME_CONFIDENCE = 0.8;
const LOCATION_CONFIDENCE = 0.5;

const LABELLED_EMAIL = /\be-?mail\s*[:\-]\s*(\S+@\S+)/i;

const OBFUSCATED_EMAIL =
  /([a-z0-9._%+-]+)\s*(?:\[at\]|\(at\)|\s+at\s+)\s*([a-z0-9-]+(?:\s*(?:\[dot\]|\(dot\)|\s+dot\s+)\s*[a-z0-9-]+)+)/i;

const LABELLED_PHONE = /\b(?:phone|tel|telephone|mobile|cell)\s*[:.]?\s*(\+?[\d(][\d\s().-]{5,}\d)/i;

const LOCATION = /\b([A-Z][a-zA-Z.'-]+(?: [A-Z][a-zA-Z.'-]+){0,3}), ([A-Z]{2})\b/;

const NAME_WORD = /^(?:[A-Z][a-zA-Z'-]*\.?|[A-Z]{2,})$/;

const NAME_SEPARATORS = /\s{3,}|\s[|•·]\s|\t/;

/**
 * The first segment of a line if it reads as a personal name
 */
export function nameCandidate(text: string): string | null {
  const [first] = text.split(NAME_SEPARATORS);
  const candidate = first.trim();
  if (!candidate || /[\d@/]/.test(candidate) || headerKind(candidate) !== null) {
    return null;
  }

  const words = candidate.split(/\s+/);
  if (words.length < 2 || words.length > 4 || !words.every(word => NAME_WORD.test(word))) {
    return null;
  }
  return candidate;
}

function deobfuscate(local: string, domain: string): string {
  return `${local}@${domain.replace(/\s*(?:\[dot\]|\(dot\)|\s+dot\s+|\.)\s*/gi, '.')}`;
}

export class ContactHeuristicExtractor implements Extractor {
  readonly id = 'contact-heuristic';
  readonly kinds = ['CONTACT', 'OTHER'] as const;
  readonly fields = ['NAME', 'EMAIL', 'PHONE', 'LOCATION'] as const;

  extract(section: Section): CandidateSpan[] {
    const spans = new SpanBuilder(this.id, section);
    const blocks = bodyBlocks(section);
    const topOfDocument = section.index === 0 || section.kind === 'CONTACT';

    if (topOfDocument && blocks.length > 0) {
      this.extractName(spans, blocks[0]);
    }

    for (const block of blocks) {
      this.extractLabelled(spans, block);
      if (topOfDocument) {
        const location = LOCATION.exec(block.text);
        if (location) {
          spans.add(block, 'LOCATION', `${location[1]}, ${location[2]}`, location[0], LOCATION_CONFIDENCE);
        }
      }
    }

    return spans.build();
  }

  private extractName(spans: SpanBuilder, block: TextBlock): void {
    const name = nameCandidate(block.text);
    if (!name) {
      return;
    }
    const styled = block.style.isBold
      || block.style.fontSizeBucket === 'large'
      || block.style.fontSizeBucket === 'title';
    spans.add(block, 'NAME', normalizeName(name), name, styled ? STYLED_NAME_CONFIDENCE : NAME_CONFIDENCE);
  }

  private extractLabelled(spans: SpanBuilder, block: TextBlock): void {
    const labelledEmail = LABELLED_EMAIL.exec(block.text);
    const email = labelledEmail ? normalizeEmail(labelledEmail[1].replace(/[,;]$/, '')) : null;
    if (labelledEmail && email) {
      spans.add(block, 'EMAIL', email, labelledEmail[0], LABELLED_CONFIDENCE);
    } else {
      const obfuscated = OBFUSCATED_EMAIL.exec(block.text);
      const address = obfuscated ? normalizeEmail(deobfuscate(obfuscated[1], obfuscated[2])) : null;
      if (obfuscated && address && !block.text.includes('@')) {
        spans.add(block, 'EMAIL', address, obfuscated[0], LABELLED_CONFIDENCE);
      }
    }

    const labelledPhone = LABELLED_PHONE.exec(block.text);
    const phone = labelledPhone ? normalizePhone(labelledPhone[1]) : null;
    if (labelledPhone && phone) {
      spans.add(block, 'PHONE', phone, labelledPhone[0], LABELLED_CONFIDENCE);
    }
  }
}
