/**
 * Skill Term Extractor
 *
 * Lexicon matches anywhere in skills, summary and experience sections, plus
 * the unknown items of a skills list.
 */

import { bodyBlocks } from '../segmenter/segmenter';
import type { CandidateSpan, Section } from '../types';
import { findSkills, lookupSkill } from './lexicon';
import { BULLET, skillKey } from './normalize';
import { SpanBuilder } from './spanBuilder';
import type { Extractor } from './types';

const SKILLS_SECTION_CONFIDENCE = 1.0;
const MENTION_CONFIDENCE = 0.8;
const LIST_ITEM_CONFIDENCE = 0.7;

const MAX_ITEM_WORDS = 4;
const MAX_ITEM_LENGTH = 40;

/** "Languages: ..." style labels ahead of a list */
const LIST_LABEL = /^[^:,]{1,30}:\s*/;

const LIST_SEPARATORS = /\s*[,;|•·]\s*| {3,}|\t/;

/**
 * Items of a comma, pipe or bullet separated skills line
 */
export function listItems(text: string): string[] {
  return text
    .replace(BULLET, '')
    .replace(LIST_LABEL, '')
    .split(LIST_SEPARATORS)
    .map(item => item.replace(/\s*\([^)]*\)/g, '').replace(/^[\s()[\]]+|[\s()[\].]+$/g, '').replace(/\s+/g, ' '))
    .filter(item =>
      item.length > 1
      && item.length <= MAX_ITEM_LENGTH
      && item.split(' ').length <= MAX_ITEM_WORDS
      && /[A-Za-z]/.test(item)
    );
}

export class SkillTermExtractor implements Extractor {
  readonly id = 'skill-term';
  readonly kinds = ['SKILLS', 'SUMMARY', 'EXPERIENCE'] as const;
  readonly fields = ['SKILL'] as const;

  extract(section: Section): CandidateSpan[] {
    const spans = new SpanBuilder(this.id, section);
    const inSkillsSection = section.kind === 'SKILLS';

    for (const block of bodyBlocks(section)) {
      const seen = new Set<string>();

      for (const match of findSkills(block.text)) {
        seen.add(skillKey(match.term));
        spans.add(
          block,
          'SKILL',
          match.term,
          match.text,
          inSkillsSection ? SKILLS_SECTION_CONFIDENCE : MENTION_CONFIDENCE
        );
      }

      if (!inSkillsSection) {
        continue;
      }

      for (const item of listItems(block.text)) {
        const key = skillKey(item);
        if (seen.has(key) || findSkills(item).length > 0) {
          continue;
        }
        seen.add(key);
        // Terms such as "Go" are only matched as whole list items
        const term = lookupSkill(item);
        spans.add(block, 'SKILL', term ?? item, item, term ? SKILLS_SECTION_CONFIDENCE : LIST_ITEM_CONFIDENCE);
      }
    }

    return spans.build();
  }
}
