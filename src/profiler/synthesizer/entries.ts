/**
 * Entry Clustering
 *
 * Groups education and experience spans into discrete entries. Spans are
 * split into fragments per section (a repeated ORG, TITLE, DEGREE or date
 * from another block starts the next entry); a fragment that ends one
 * section and the fragment that starts the next are joined when their date
 * ranges overlap or touch.
 */

import { compareSpans } from '../extractors/candidatePool';
import { compareDates, monthNumber } from '../extractors/normalize';
import type {
  CandidateSpan,
  ConflictNote,
  DateValue,
  EducationEntry,
  ExperienceEntry,
  FieldKind,
  ResolvedField
} from '../types';
import { emptyField, resolveField } from './resolver';
import type { ResolutionOptions } from './resolver';

export type EntryKind = 'education' | 'experience';

export interface EntryOptions extends ResolutionOptions {
  swapPenalty: number;
}

const ENTRY_SECTION: Record<EntryKind, CandidateSpan['sectionKind']> = {
  education: 'EDUCATION',
  experience: 'EXPERIENCE'
};

const ENTRY_FIELDS: Record<EntryKind, readonly FieldKind[]> = {
  education: ['ORG', 'DEGREE', 'DATE_START', 'DATE_END', 'COURSEWORK'],
  experience: ['ORG', 'TITLE', 'LOCATION', 'DATE_START', 'DATE_END', 'DESCRIPTION']
};

/** Fields that open a new entry when already filled from another block */
const ENTRY_BOUNDARY_FIELDS: ReadonlySet<FieldKind> = new Set(['ORG', 'TITLE', 'DEGREE', 'DATE_START', 'DATE_END']);

/** Ranges this many months apart still count as touching */
const ADJACENT_MONTHS = 1;

interface Fragment {
  sectionIndex: number;
  spans: CandidateSpan[];
  filledBy: Map<FieldKind, number>;
}

/**
 * A resolved entry before its final position is known.
 * Notes carry the field suffix only (`title`, `dates`, ...).
 */
export interface EntryDraft<E> {
  entry: E;
  notes: ConflictNote[];
  firstSpan: CandidateSpan;
}

function fragmentSpans(spans: readonly CandidateSpan[]): Fragment[] {
  const fragments: Fragment[] = [];
  let current: Fragment | null = null;

  for (const span of spans) {
    const filledBy = current?.filledBy.get(span.field);
    const repeats = ENTRY_BOUNDARY_FIELDS.has(span.field)
      && filledBy !== undefined
      && filledBy !== span.position.blockIndex;

    if (current === null || current.sectionIndex !== span.position.sectionIndex || repeats) {
      current = { sectionIndex: span.position.sectionIndex, spans: [], filledBy: new Map() };
      fragments.push(current);
    }

    current.spans.push(span);
    if (!current.filledBy.has(span.field)) {
      current.filledBy.set(span.field, span.position.blockIndex);
    }
  }

  return fragments;
}

/**
 * Month range of a fragment from its strongest date candidates.
 * PRESENT and a missing end leave the range open.
 */
function fragmentRange(fragment: Fragment): { start: number; end: number } | null {
  const strongest = (field: FieldKind): CandidateSpan | undefined =>
    fragment.spans
      .filter(span => span.field === field)
      .reduce<CandidateSpan | undefined>((best, span) => (!best || span.confidence > best.confidence ? span : best), undefined);

  const start = strongest('DATE_START');
  const startMonth = start ? monthNumber(start.value, null) : null;
  if (startMonth === null) {
    return null;
  }

  const end = strongest('DATE_END');
  const endMonth = end ? monthNumber(end.value, null) : null;
  return { start: startMonth, end: endMonth ?? Number.POSITIVE_INFINITY };
}

export function datesCompatible(a: { start: number; end: number }, b: { start: number; end: number }): boolean {
  return a.start <= b.end + ADJACENT_MONTHS && b.start <= a.end + ADJACENT_MONTHS;
}

function mergeAcrossSections(fragments: readonly Fragment[]): Fragment[] {
  const merged: Fragment[] = [];

  fragments.forEach((fragment, index) => {
    const previous = merged[merged.length - 1];
    const opensSection = index > 0 && fragments[index - 1].sectionIndex !== fragment.sectionIndex;

    if (previous && opensSection && fragment.sectionIndex === previous.sectionIndex + 1) {
      const a = fragmentRange(previous);
      const b = fragmentRange(fragment);
      if (a && b && datesCompatible(a, b)) {
        merged[merged.length - 1] = {
          sectionIndex: fragment.sectionIndex,
          spans: [...previous.spans, ...fragment.spans],
          filledBy: fragment.filledBy
        };
        return;
      }
    }
    merged.push(fragment);
  });

  return merged;
}

interface DateResolution {
  start: ResolvedField<DateValue>;
  end: ResolvedField<DateValue>;
  note: ConflictNote | null;
}

/**
 * Enforce start before end: swap when the penalized confidences stay above
 * the threshold, otherwise clear both dates.
 */
export function orderDates(
  start: ResolvedField<DateValue>,
  end: ResolvedField<DateValue>,
  options: EntryOptions
): DateResolution {
  if (start.value === null || end.value === null || compareDates(start.value, end.value) <= 0) {
    return { start, end, note: null };
  }

  const candidateIds = [...start.sourceSpanIds, ...end.sourceSpanIds];
  const swappedStart = end.confidence * options.swapPenalty;
  const swappedEnd = start.confidence * options.swapPenalty;

  if (Math.min(swappedStart, swappedEnd) >= options.resolutionThreshold) {
    return {
      start: { ...end, confidence: swappedStart },
      end: { ...start, confidence: swappedEnd },
      note: { field: 'dates', candidateIds, resolution: 'AUTO_RESOLVED', reason: 'date_order_swapped', overrides: [] }
    };
  }

  return {
    start: emptyField(),
    end: emptyField(),
    note: { field: 'dates', candidateIds, resolution: 'LEFT_UNRESOLVED', reason: 'date_order_invalid', overrides: [] }
  };
}

/**
 * Line-per-span text field such as a description or coursework
 */
function joinLines(spans: readonly CandidateSpan[]): ResolvedField {
  if (spans.length === 0) {
    return emptyField();
  }
  return {
    value: spans.map(span => span.value).join('\n'),
    confidence: spans.reduce((sum, span) => sum + span.confidence, 0) / spans.length,
    provenance: 'extracted',
    sourceSpanIds: spans.map(span => span.id)
  };
}

/**
 * Mean confidence of the entry's resolved core fields
 */
export function entryConfidence(fields: readonly ResolvedField[]): number {
  const resolved = fields.filter(field => field.value !== null);
  if (resolved.length === 0) {
    return 0;
  }
  return resolved.reduce((sum, field) => sum + field.confidence, 0) / resolved.length;
}

interface CommonFields {
  organization: ResolvedField;
  label: ResolvedField;
  start: ResolvedField<DateValue>;
  end: ResolvedField<DateValue>;
  notes: ConflictNote[];
  take: (suffix: string, field: FieldKind) => ResolvedField;
}

function resolveCommon(
  fragment: Fragment,
  options: EntryOptions,
  organizationSuffix: string,
  label: { suffix: string; field: FieldKind }
): CommonFields {
  const notes: ConflictNote[] = [];
  const take = (suffix: string, field: FieldKind): ResolvedField => {
    const resolution = resolveField(suffix, fragment.spans.filter(span => span.field === field), options);
    if (resolution.note) {
      notes.push(resolution.note);
    }
    return resolution.field;
  };

  const organization = take(organizationSuffix, 'ORG');
  const labelField = take(label.suffix, label.field);
  const dates = orderDates(take('start', 'DATE_START'), take('end', 'DATE_END'), options);
  if (dates.note) {
    notes.push(dates.note);
  }

  return { organization, label: labelField, start: dates.start, end: dates.end, notes, take };
}

function resolveEducation(fragment: Fragment, options: EntryOptions): EntryDraft<EducationEntry> {
  const common = resolveCommon(fragment, options, 'institution', { suffix: 'degree', field: 'DEGREE' });
  return {
    entry: {
      institution: common.organization,
      degree: common.label,
      start: common.start,
      end: common.end,
      coursework: joinLines(fragment.spans.filter(span => span.field === 'COURSEWORK')),
      confidence: entryConfidence([common.organization, common.label, common.start, common.end])
    },
    notes: common.notes,
    firstSpan: fragment.spans[0]
  };
}

function resolveExperience(fragment: Fragment, options: EntryOptions): EntryDraft<ExperienceEntry> {
  const common = resolveCommon(fragment, options, 'organization', { suffix: 'title', field: 'TITLE' });
  const location = common.take('location', 'LOCATION');
  return {
    entry: {
      organization: common.organization,
      title: common.label,
      location,
      start: common.start,
      end: common.end,
      description: joinLines(fragment.spans.filter(span => span.field === 'DESCRIPTION')),
      confidence: entryConfidence([common.organization, common.label, common.start, common.end])
    },
    notes: common.notes,
    firstSpan: fragment.spans[0]
  };
}

function sortDate(entry: EducationEntry | ExperienceEntry): DateValue | null {
  return entry.start.value ?? entry.end.value;
}

/**
 * Most recent first; undated entries last, in document order
 */
export function compareEntries<E extends EducationEntry | ExperienceEntry>(a: EntryDraft<E>, b: EntryDraft<E>): number {
  const dateA = sortDate(a.entry);
  const dateB = sortDate(b.entry);
  if (dateA !== null && dateB !== null) {
    return compareDates(dateB, dateA) || compareSpans(a.firstSpan, b.firstSpan);
  }
  if (dateA !== null) return -1;
  if (dateB !== null) return 1;
  return compareSpans(a.firstSpan, b.firstSpan);
}

function fragmentsFor(kind: EntryKind, spans: readonly CandidateSpan[]): Fragment[] {
  const fields = ENTRY_FIELDS[kind];
  const relevant = spans
    .filter(span => span.sectionKind === ENTRY_SECTION[kind] && fields.includes(span.field))
    .sort(compareSpans);
  return mergeAcrossSections(fragmentSpans(relevant));
}

/**
 * Prefix suffix-only notes with the entry's final path
 */
export function placeNotes(kind: EntryKind, drafts: readonly EntryDraft<unknown>[]): ConflictNote[] {
  return drafts.flatMap((draft, index) =>
    draft.notes.map(note => ({ ...note, field: `${kind}.${index}.${note.field}` }))
  );
}

export function buildEducation(spans: readonly CandidateSpan[], options: EntryOptions): EntryDraft<EducationEntry>[] {
  return fragmentsFor('education', spans)
    .map(fragment => resolveEducation(fragment, options))
    .sort(compareEntries);
}

export function buildExperience(spans: readonly CandidateSpan[], options: EntryOptions): EntryDraft<ExperienceEntry>[] {
  return fragmentsFor('experience', spans)
    .map(fragment => resolveExperience(fragment, options))
    .sort(compareEntries);
}
