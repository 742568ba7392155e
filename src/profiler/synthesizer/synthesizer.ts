/**
 * Synthesizer
 *
 * Merges a document's candidate pool into one profile record. Total and
 * deterministic: the same pool always yields the same record, and
 * data-quality problems become conflict notes rather than errors.
 */

import { loggers } from '../../shared/logger';
import { DEFAULT_CONFIG } from '../config';
import { CandidatePool } from '../extractors/candidatePool';
import { canonicalValue, compareDates, comparisonKey } from '../extractors/normalize';
import { PRESENT } from '../types';
import type {
  CandidateSpan,
  ConflictNote,
  ContactField,
  ContactInfo,
  DateValue,
  FieldKind,
  ProfileRecord,
  SectionKind,
  SkillEntry
} from '../types';
import { buildEducation, buildExperience, placeNotes } from './entries';
import { calculateTotalExperience } from './experience';
import { resolveField } from './resolver';

export interface SynthesisOptions {
  resolutionThreshold: number;
  swapPenalty: number;
  /** Month PRESENT resolves to; defaults to the latest concrete date in the pool */
  asOf?: DateValue;
}

export const CONTACT_FIELDS: Record<ContactField, FieldKind> = {
  name: 'NAME',
  email: 'EMAIL',
  phone: 'PHONE',
  location: 'LOCATION',
  linkedin: 'LINKEDIN',
  website: 'WEBSITE'
};

/**
 * A record is flagged while any unresolved note lacks a manual override
 */
export function needsReview(notes: readonly ConflictNote[]): boolean {
  return notes.some(note => note.resolution === 'LEFT_UNRESOLVED' && note.overrides.length === 0);
}

/**
 * Latest concrete month among the pool's date candidates
 */
export function latestDate(spans: readonly CandidateSpan[]): DateValue | null {
  let latest: DateValue | null = null;
  for (const span of spans) {
    if ((span.field === 'DATE_START' || span.field === 'DATE_END') && span.value !== PRESENT) {
      const value = canonicalValue(span.field, span.value);
      if (/^\d{4}-\d{2}$/.test(value) && (latest === null || compareDates(value, latest) > 0)) {
        latest = value;
      }
    }
  }
  return latest;
}

/** Sections whose spans belong to an entry rather than to the candidate */
const ENTRY_SECTIONS: ReadonlySet<SectionKind> = new Set(['EDUCATION', 'EXPERIENCE']);

function resolveContact(
  spans: readonly CandidateSpan[],
  options: SynthesisOptions,
  notes: ConflictNote[]
): ContactInfo {
  const contactSpans = spans.filter(span => !ENTRY_SECTIONS.has(span.sectionKind));
  const resolve = (field: ContactField): ContactInfo[ContactField] => {
    const kind = CONTACT_FIELDS[field];
    const resolution = resolveField(`contact.${field}`, contactSpans.filter(span => span.field === kind), options);
    if (resolution.note) {
      notes.push(resolution.note);
    }
    return resolution.field;
  };

  return {
    name: resolve('name'),
    email: resolve('email'),
    phone: resolve('phone'),
    location: resolve('location'),
    linkedin: resolve('linkedin'),
    website: resolve('website')
  };
}

function resolveSkills(
  spans: readonly CandidateSpan[],
  options: SynthesisOptions,
  notes: ConflictNote[]
): SkillEntry[] {
  const groups = new Map<string, CandidateSpan[]>();
  for (const span of spans) {
    if (span.field !== 'SKILL') continue;
    const key = comparisonKey('SKILL', span.value);
    const group = groups.get(key);
    if (group) {
      group.push(span);
    } else {
      groups.set(key, [span]);
    }
  }

  const skills: SkillEntry[] = [];
  for (const key of [...groups.keys()].sort()) {
    const group = groups.get(key) ?? [];
    const resolution = resolveField(`skills.${key}`, group, options);
    if (resolution.note) {
      notes.push(resolution.note);
    }
    if (resolution.field.value !== null) {
      skills.push({
        term: resolution.field.value,
        confidence: resolution.field.confidence,
        provenance: 'extracted',
        sourceSpanIds: resolution.field.sourceSpanIds
      });
    }
  }
  return skills;
}

/**
 * Build the canonical profile record from a candidate pool
 */
export function synthesize(
  input: CandidatePool | readonly CandidateSpan[],
  options: Partial<SynthesisOptions> = {}
): ProfileRecord {
  const spans = input instanceof CandidatePool ? input.all() : new CandidatePool(input).all();
  const settings: SynthesisOptions = {
    resolutionThreshold: options.resolutionThreshold ?? DEFAULT_CONFIG.synthesis.resolutionThreshold,
    swapPenalty: options.swapPenalty ?? DEFAULT_CONFIG.synthesis.swapPenalty,
    asOf: options.asOf
  };
  const asOf = settings.asOf ?? latestDate(spans);

  const contactNotes: ConflictNote[] = [];
  const contact = resolveContact(spans, settings, contactNotes);

  const education = buildEducation(spans, settings);
  const experience = buildExperience(spans, settings);

  const skillNotes: ConflictNote[] = [];
  const skills = resolveSkills(spans, settings, skillNotes);

  const experienceEntries = experience.map(draft => draft.entry);
  const unresolvedConflicts = [
    ...contactNotes,
    ...placeNotes('education', education),
    ...placeNotes('experience', experience),
    ...skillNotes
  ];

  loggers.synthesis.debug(
    {
      spans: spans.length,
      education: education.length,
      experience: experience.length,
      skills: skills.length,
      notes: unresolvedConflicts.length
    },
    'Synthesis complete'
  );

  return {
    version: 1,
    contact,
    education: education.map(draft => draft.entry),
    experience: experienceEntries,
    skills,
    totalExperience: calculateTotalExperience(experienceEntries, asOf),
    asOf,
    unresolvedConflicts,
    needsReview: needsReview(unresolvedConflicts)
  };
}
