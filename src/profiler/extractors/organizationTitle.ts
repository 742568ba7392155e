/**
 * Organization / Title Extractor
 *
 * Experience lines such as "Senior Engineer at Acme Corp" or
 * "Acme Corp | Senior Engineer | 2019 - 2021" yield ORG and TITLE spans,
 * plus a LOCATION span for "Austin, TX", "Remote" or the place after the
 * comma in "Acme Corp, Berlin". Bullet and prose lines yield DESCRIPTION
 * spans. Education lines yield institution (ORG) and DEGREE spans; their
 * bullets and "Achieved 85%" lines yield COURSEWORK.
 */

import { bodyBlocks } from '../segmenter/segmenter';
import type { CandidateSpan, FieldKind, Section, TextBlock } from '../types';
import { stripDateRanges } from './dateRange';
import {
  degreeLevel,
  hasCompanyMarker,
  hasInstitutionKeyword,
  hasTitleKeyword,
  matchOrganization
} from './lexicon';
import { BULLET, DATE_TOKEN_SOURCE, PRESENT_TOKEN_SOURCE, normalizeOrganization } from './normalize';
import { SpanBuilder } from './spanBuilder';
import type { Extractor, ExtractorOptions } from './types';

/** Lines longer than this read as prose */
const MAX_HEADLINE_WORDS = 10;

const MAX_SHORT_TITLE_WORDS = 6;

const PART_SEPARATORS = /\s+(?:at|@)\s+|\s+[-–—|]\s+|\s*\|\s*|,\s*|\t| {3,}/i;

const LOCATION = /\b[A-Z][a-zA-Z.'-]*(?: [A-Z][a-zA-Z.'-]*)*, [A-Z]{2}\b|\b[Rr]emote\b/g;

const PERCENTAGE = /\bachieved\b.*?(\d+(?:\.\d+)?)\s*%/i;

const MAX_PLACE_WORDS = 4;

const LONE_DATE = new RegExp(`(?<![\\w/])(?:${DATE_TOKEN_SOURCE}|${PRESENT_TOKEN_SOURCE})(?![\\w/])`, 'gi');

export const CONFIDENCE = {
  bulletDescription: 0.7,
  proseDescription: 0.5,
  shortTitle: 0.85,
  longTitle: 0.6,
  exactOrganization: 0.95,
  markedOrganization: 0.8,
  genericOrganization: 0.5,
  degree: 0.9,
  institution: 0.85,
  location: 0.7,
  commaLocation: 0.5,
  coursework: 0.7,
  achievement: 0.8
} as const;

export interface Candidate {
  value: string;
  raw: string;
  confidence: number;
}

/**
 * Split a headline into its parts with dates and locations removed
 */
export function headlineParts(text: string): string[] {
  const cleaned = stripDateRanges(text)
    .replace(LONE_DATE, ' ')
    .replace(LOCATION, ' ');

  return cleaned
    .split(PART_SEPARATORS)
    .map(part => part.replace(/[()[\]]/g, ' ').replace(/\s+/g, ' ').replace(/^[\s,;:|-]+|[\s,;:|-]+$/g, ''))
    .filter(part => /[A-Za-z]/.test(part));
}

function isCapitalized(part: string): boolean {
  const words = part.split(' ');
  return words.length <= MAX_SHORT_TITLE_WORDS && /^[A-Z0-9]/.test(part);
}

/**
 * Location named on an experience headline.
 * A "City, ST" or "Remote" match wins; otherwise a title-free line of the
 * form "Company, Place" gives the place.
 */
export function headlineLocation(text: string): Candidate | null {
  const match = stripDateRanges(text).match(LOCATION);
  if (match) {
    const [first] = match;
    return { value: first, raw: first, confidence: CONFIDENCE.location };
  }

  const [company, ...rest] = headlineParts(text);
  const place = rest.join(', ');
  if (
    company === undefined
    || rest.length === 0
    || !text.includes(',')
    || hasTitleKeyword(text)
    || hasCompanyMarker(place)
    || /\d/.test(place)
    || place.split(/[\s,]+/).length > MAX_PLACE_WORDS
    || !/^[A-Z]/.test(place)
  ) {
    return null;
  }
  return { value: place, raw: place, confidence: CONFIDENCE.commaLocation };
}

function better(current: Candidate | null, next: Candidate | null): Candidate | null {
  if (next === null) return current;
  if (current === null || next.confidence > current.confidence) return next;
  return current;
}

export class OrganizationTitleExtractor implements Extractor {
  readonly id = 'organization-title';
  readonly kinds = ['EDUCATION', 'EXPERIENCE'] as const;
  readonly fields = ['ORG', 'TITLE', 'LOCATION', 'DEGREE', 'DESCRIPTION', 'COURSEWORK'] as const;

  constructor(private readonly options: ExtractorOptions) {}

  extract(section: Section): CandidateSpan[] {
    const spans = new SpanBuilder(this.id, section);

    for (const block of bodyBlocks(section)) {
      if (section.kind === 'EXPERIENCE') {
        this.extractExperience(spans, block);
      } else {
        this.extractEducation(spans, block);
      }
    }

    return spans.build();
  }

  /**
   * Confidence that a headline part names an organisation
   */
  scoreOrganization(part: string): Candidate | null {
    const match = matchOrganization(part, this.options.fuzzyMatchThreshold);
    if (match && match.similarity === 1) {
      return { value: match.name, raw: part, confidence: CONFIDENCE.exactOrganization };
    }
    if (match) {
      return { value: match.name, raw: part, confidence: match.similarity };
    }

    const value = normalizeOrganization(part);
    if (hasCompanyMarker(part)) {
      return { value, raw: part, confidence: CONFIDENCE.markedOrganization };
    }
    if (isCapitalized(part)) {
      return { value, raw: part, confidence: CONFIDENCE.genericOrganization };
    }
    return null;
  }

  private extractExperience(spans: SpanBuilder, block: TextBlock): void {
    const text = block.text.trim();

    if (BULLET.test(text)) {
      spans.add(block, 'DESCRIPTION', text.replace(BULLET, '').trim(), text, CONFIDENCE.bulletDescription);
      return;
    }
    if (text.split(/\s+/).length > MAX_HEADLINE_WORDS) {
      spans.add(block, 'DESCRIPTION', text.replace(/\s+/g, ' '), text, CONFIDENCE.proseDescription);
      return;
    }

    let title: Candidate | null = null;
    let organization: Candidate | null = null;
    const location = headlineLocation(text);

    for (const part of headlineParts(text)) {
      if (location !== null && part === location.value) {
        continue;
      }
      if (hasTitleKeyword(part)) {
        const words = part.split(' ').length;
        title = better(title, {
          value: part,
          raw: part,
          confidence: words <= MAX_SHORT_TITLE_WORDS ? CONFIDENCE.shortTitle : CONFIDENCE.longTitle
        });
      } else {
        organization = better(organization, this.scoreOrganization(part));
      }
    }

    this.emit(spans, block, 'TITLE', title);
    this.emit(spans, block, 'ORG', organization);
    this.emit(spans, block, 'LOCATION', location);
  }

  private extractEducation(spans: SpanBuilder, block: TextBlock): void {
    const text = block.text.trim();
    if (BULLET.test(text)) {
      spans.add(block, 'COURSEWORK', text.replace(BULLET, '').trim(), text, CONFIDENCE.coursework);
      return;
    }
    const achievement = PERCENTAGE.exec(text);
    if (achievement) {
      spans.add(block, 'COURSEWORK', `Achieved ${achievement[1]}%`, achievement[0], CONFIDENCE.achievement);
      return;
    }
    if (text.split(/\s+/).length > MAX_HEADLINE_WORDS * 2) {
      return;
    }

    let degree: Candidate | null = null;
    let institution: Candidate | null = null;

    for (const part of headlineParts(text)) {
      if (degree === null && degreeLevel(part) !== null) {
        degree = { value: part, raw: part, confidence: CONFIDENCE.degree };
      } else if (institution === null && hasInstitutionKeyword(part)) {
        institution = { value: normalizeOrganization(part), raw: part, confidence: CONFIDENCE.institution };
      }
    }

    this.emit(spans, block, 'DEGREE', degree);
    this.emit(spans, block, 'ORG', institution);
  }

  private emit(spans: SpanBuilder, block: TextBlock, field: FieldKind, candidate: Candidate | null): void {
    if (candidate) {
      spans.add(block, field, candidate.value, candidate.raw, candidate.confidence);
    }
  }
}
