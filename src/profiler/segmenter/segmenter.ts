/**
 * Segmenter
 *
 * Partitions the block sequence into labelled, contiguous sections. Never
 * fails: the worst case is a single OTHER section spanning the document.
 */

import { loggers } from '../../shared/logger';
import type { Section, SectionKind, TextBlock } from '../types';
import { classifyHeader } from './headers';

interface SectionDraft {
  kind: SectionKind;
  heading: string | null;
  blocks: TextBlock[];
  /** A header that was immediately followed by another header */
  falseHeader: boolean;
}

function finalize(drafts: readonly SectionDraft[]): Section[] {
  let start = 0;
  return drafts.map((draft, index) => {
    const end = start + draft.blocks.length;
    const section: Section = Object.freeze({
      id: `section-${index}`,
      index,
      kind: draft.kind,
      heading: draft.heading,
      blocks: Object.freeze([...draft.blocks]),
      span: Object.freeze({ start, end })
    });
    start = end;
    return section;
  });
}

/**
 * Group blocks into sections.
 *
 * Text before the first header is OTHER. When two header candidates are
 * adjacent, the later one opens the section and the earlier one becomes an
 * OTHER section of its own; consecutive false headers share one section.
 */
export function segment(blocks: readonly TextBlock[]): Section[] {
  const drafts: SectionDraft[] = [];
  let current: SectionDraft = { kind: 'OTHER', heading: null, blocks: [], falseHeader: false };

  for (const block of blocks) {
    const kind = classifyHeader(block);
    if (kind === null) {
      current.blocks.push(block);
      continue;
    }

    if (current.heading !== null && current.blocks.length === 1) {
      current.kind = 'OTHER';
      current.falseHeader = true;
      const previous = drafts[drafts.length - 1];
      if (previous?.falseHeader) {
        previous.blocks.push(...current.blocks);
      } else {
        drafts.push(current);
      }
    } else if (current.blocks.length > 0) {
      drafts.push(current);
    }

    current = { kind, heading: block.text, blocks: [block], falseHeader: false };
  }

  if (current.blocks.length > 0 || drafts.length === 0) {
    drafts.push(current);
  }

  const sections = finalize(drafts);

  loggers.segmenter.debug(
    { sections: sections.map(section => `${section.kind}:${section.span.start}-${section.span.end}`) },
    'Segmentation complete'
  );

  return sections;
}

/**
 * Blocks of a section without its heading block
 */
export function bodyBlocks(section: Section): readonly TextBlock[] {
  return section.heading === null ? section.blocks : section.blocks.slice(1);
}
