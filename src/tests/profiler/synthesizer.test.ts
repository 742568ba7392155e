/**
 * Tests for the Synthesizer
 *
 * Field resolution, entry clustering, date ordering, total experience and
 * manual edits.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { resolveField, bestSpan, emptyField } from '../../profiler/synthesizer/resolver';
import { datesCompatible, entryConfidence, orderDates } from '../../profiler/synthesizer/entries';
import { calculateTotalExperience, formatDuration } from '../../profiler/synthesizer/experience';
import { latestDate, needsReview, synthesize } from '../../profiler/synthesizer/synthesizer';
import { applyEdit, editPath } from '../../profiler/synthesizer/edit';
import { isProfilerError, ProfilerErrorCode } from '../../profiler/errors/types';
import type { CandidateSpan, EditTarget, ExperienceEntry, ProfileRecord, ResolvedField } from '../../profiler/types';
import { skillKey } from '../../profiler/extractors/normalize';
import { CandidatePool } from '../../profiler/extractors/candidatePool';
import { span } from './fixtures';

const OPTIONS = { resolutionThreshold: 0.5, swapPenalty: 0.9 };

function dated(value: string | null, confidence = 0.95): ResolvedField {
  return { value, confidence: value === null ? 0 : confidence, provenance: 'extracted', sourceSpanIds: value ? [value] : [] };
}

function job(start: string | null, end: string | null): ExperienceEntry {
  return {
    organization: emptyField(),
    title: emptyField(),
    location: emptyField(),
    start: dated(start),
    end: dated(end),
    description: emptyField(),
    confidence: 0
  };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a throw');
}

function experienceSpan(field: CandidateSpan['field'], value: string, confidence: number, blockIndex: number, sectionIndex = 1): CandidateSpan {
  return span({ field, value, confidence, blockIndex, sectionIndex, sectionKind: 'EXPERIENCE' });
}

describe('Field resolution', () => {
  it('should merge agreeing candidates without a note', () => {
    const upper = span({ field: 'EMAIL', value: 'J.DOE@X.COM', confidence: 0.9, blockIndex: 0 });
    const lower = span({ field: 'EMAIL', value: 'jdoe@x.com', confidence: 0.6, blockIndex: 1 });

    const { field, note } = resolveField('contact.email', [lower, upper], OPTIONS);

    expect(field).toEqual({
      value: 'jdoe@x.com',
      confidence: 0.9,
      provenance: 'extracted',
      sourceSpanIds: [upper.id, lower.id]
    });
    expect(note).toBeNull();
  });

  it('should pick the heavier cluster and record the disagreement', () => {
    const a = span({ field: 'EMAIL', value: 'a@x.com', confidence: 0.9, blockIndex: 0 });
    const b = span({ field: 'EMAIL', value: 'b@x.com', confidence: 0.6, blockIndex: 1 });

    const { field, note } = resolveField('contact.email', [b, a], OPTIONS);

    expect(field.value).toBe('a@x.com');
    expect(field.confidence).toBeCloseTo(0.54);
    expect(note).toEqual({
      field: 'contact.email',
      candidateIds: [a.id, b.id],
      resolution: 'AUTO_RESOLVED',
      chosenId: a.id,
      reason: 'value_disagreement',
      overrides: []
    });
  });

  it('should break ties by document order', () => {
    const later = span({ field: 'EMAIL', value: 'a@x.com', confidence: 0.7, blockIndex: 1 });
    const earlier = span({ field: 'EMAIL', value: 'b@x.com', confidence: 0.7, blockIndex: 0 });

    const { field, note } = resolveField('contact.email', [later, earlier], OPTIONS);

    expect(field.value).toBe('b@x.com');
    expect(note?.chosenId).toBe(earlier.id);
  });

  it('should leave weak fields unresolved', () => {
    const weak = span({ field: 'PHONE', value: '555-123-4567', confidence: 0.3 });

    const { field, note } = resolveField('contact.phone', [weak], OPTIONS);

    expect(field).toEqual(emptyField());
    expect(note).toEqual({
      field: 'contact.phone',
      candidateIds: [weak.id],
      resolution: 'LEFT_UNRESOLVED',
      reason: 'below_threshold',
      overrides: []
    });
  });

  it('should return an empty field without candidates', () => {
    expect(resolveField('contact.name', [], OPTIONS)).toEqual({ field: emptyField(), note: null });
  });

  it('should prefer the earliest span among equal confidences', () => {
    const first = span({ field: 'NAME', value: 'Jane Doe', confidence: 0.8, blockIndex: 0 });
    const second = span({ field: 'NAME', value: 'JANE DOE', confidence: 0.8, blockIndex: 1 });

    expect(bestSpan([first, second])).toBe(first);
  });

  describe('Property: conflict conservation', () => {
    it('should account for every candidate in the field or its note', () => {
      const candidate = fc.record({
        value: fc.constantFrom('a@x.com', 'A@X.com', 'b@x.com', 'c@y.org'),
        confidence: fc.double({ min: 0.05, max: 1, noNaN: true })
      });

      fc.assert(
        fc.property(fc.array(candidate, { maxLength: 8 }), candidates => {
          const spans = candidates.map((c, blockIndex) =>
            span({ field: 'EMAIL', value: c.value, confidence: c.confidence, blockIndex })
          );
          const ids = spans.map(s => s.id).sort();
          const { field, note } = resolveField('contact.email', spans, OPTIONS);

          if (note) {
            expect([...note.candidateIds].sort()).toEqual(ids);
          } else {
            expect([...field.sourceSpanIds].sort()).toEqual(ids);
          }
        })
      );
    });
  });
});

describe('Date ordering', () => {
  it('should keep ordered dates', () => {
    const result = orderDates(dated('2019-01'), dated('2021-03'), OPTIONS);

    expect(result.start.value).toBe('2019-01');
    expect(result.end.value).toBe('2021-03');
    expect(result.note).toBeNull();
  });

  it('should swap reversed dates with a confidence penalty', () => {
    const result = orderDates(dated('2021-03'), dated('2019-01'), OPTIONS);

    expect(result.start.value).toBe('2019-01');
    expect(result.start.confidence).toBeCloseTo(0.855);
    expect(result.end.value).toBe('2021-03');
    expect(result.end.confidence).toBeCloseTo(0.855);
    expect(result.note).toEqual({
      field: 'dates',
      candidateIds: ['2021-03', '2019-01'],
      resolution: 'AUTO_RESOLVED',
      reason: 'date_order_swapped',
      overrides: []
    });
  });

  it('should clear both dates when the penalty drops them below threshold', () => {
    const result = orderDates(dated('2021-03'), dated('2019-01'), { resolutionThreshold: 0.5, swapPenalty: 0.5 });

    expect(result.start).toEqual(emptyField());
    expect(result.end).toEqual(emptyField());
    expect(result.note?.resolution).toBe('LEFT_UNRESOLVED');
    expect(result.note?.reason).toBe('date_order_invalid');
  });

  it('should treat PRESENT as the latest end', () => {
    expect(orderDates(dated('2021-03'), dated('PRESENT'), OPTIONS).note).toBeNull();
  });

  it('should treat ranges a month apart as compatible', () => {
    expect(datesCompatible({ start: 10, end: 20 }, { start: 21, end: 30 })).toBe(true);
    expect(datesCompatible({ start: 10, end: 20 }, { start: 22, end: 30 })).toBe(false);
  });

  it('should average resolved fields for entry confidence', () => {
    expect(entryConfidence([dated('2020-01', 0.8), dated(null), dated('2021-01', 0.6)])).toBeCloseTo(0.7);
    expect(entryConfidence([dated(null)])).toBe(0);
  });
});

describe('Total experience', () => {
  it('should format durations', () => {
    expect(formatDuration(5)).toBe('5 months');
    expect(formatDuration(12)).toBe('1 year 0 months');
    expect(formatDuration(25)).toBe('2 years 1 month');
  });

  it('should count overlapping ranges once', () => {
    const total = calculateTotalExperience([job('2020-01', '2020-06'), job('2020-04', '2020-12')], null);

    expect(total).toEqual({ totalMonths: 12, years: 1, remainingMonths: 0, formatted: '1 year 0 months' });
  });

  it('should add disjoint ranges', () => {
    const total = calculateTotalExperience([job('2018-06', '2019-08'), job('2020-01', 'PRESENT')], '2024-06');

    expect(total?.totalMonths).toBe(69);
    expect(total?.formatted).toBe('5 years 9 months');
  });

  it('should count a start without an end as one month', () => {
    expect(calculateTotalExperience([job('2020-01', null)], null)?.totalMonths).toBe(1);
  });

  it('should skip undated and reversed entries', () => {
    expect(calculateTotalExperience([job(null, '2020-01'), job('2021-01', '2020-01')], null)).toBeNull();
  });

  it('should skip PRESENT without an as-of month', () => {
    expect(calculateTotalExperience([job('2020-01', 'PRESENT')], null)?.totalMonths).toBe(1);
  });
});

describe('Synthesizer', () => {
  const experienceSpans = [
    experienceSpan('ORG', 'Google', 0.95, 10),
    experienceSpan('TITLE', 'Software Engineer', 0.9, 10),
    experienceSpan('DATE_START', '2020-01', 0.95, 11),
    experienceSpan('DATE_END', 'PRESENT', 0.95, 11),
    experienceSpan('ORG', 'Acme', 0.8, 12),
    experienceSpan('TITLE', 'Intern', 0.9, 12),
    experienceSpan('DATE_START', '2018-06', 0.95, 13),
    experienceSpan('DATE_END', '2019-08', 0.95, 13)
  ];

  it('should build experience entries most recent first', () => {
    const record = synthesize(experienceSpans, { asOf: '2024-06' });

    expect(record.experience.map(e => [e.organization.value, e.title.value, e.start.value, e.end.value])).toEqual([
      ['Google', 'Software Engineer', '2020-01', 'PRESENT'],
      ['Acme', 'Intern', '2018-06', '2019-08']
    ]);
    expect(record.experience[0].confidence).toBeCloseTo(0.9375);
    expect(record.totalExperience?.formatted).toBe('5 years 9 months');
    expect(record.version).toBe(1);
    expect(record.needsReview).toBe(false);
  });

  it('should default the as-of month to the latest concrete date', () => {
    const record = synthesize(experienceSpans);

    expect(record.asOf).toBe('2020-01');
    expect(latestDate(experienceSpans)).toBe('2020-01');
  });

  it('should swap reversed entry dates and note the swap', () => {
    const spans = [
      experienceSpan('ORG', 'Acme', 0.9, 10),
      experienceSpan('DATE_START', '2021-03', 0.95, 11),
      experienceSpan('DATE_END', '2019-01', 0.95, 11)
    ];

    const record = synthesize(spans, OPTIONS);
    const [entry] = record.experience;

    expect(entry.start.value).toBe('2019-01');
    expect(entry.start.confidence).toBeCloseTo(0.855);
    expect(entry.end.value).toBe('2021-03');
    expect(entry.end.confidence).toBeCloseTo(0.855);
    expect(record.unresolvedConflicts).toEqual([{
      field: 'experience.0.dates',
      candidateIds: [spans[1].id, spans[2].id],
      resolution: 'AUTO_RESOLVED',
      reason: 'date_order_swapped',
      overrides: []
    }]);
    expect(record.needsReview).toBe(false);
  });

  it('should flag the record when reversed dates cannot be swapped', () => {
    const spans = [
      experienceSpan('DATE_START', '2021-03', 0.95, 11),
      experienceSpan('DATE_END', '2019-01', 0.95, 11)
    ];

    const record = synthesize(spans, { swapPenalty: 0.5 });

    expect(record.experience[0].start.value).toBeNull();
    expect(record.unresolvedConflicts[0].reason).toBe('date_order_invalid');
    expect(record.needsReview).toBe(true);
  });

  it('should join an entry continued across sections when dates overlap', () => {
    const spans = [
      experienceSpan('ORG', 'Google', 0.95, 10, 1),
      experienceSpan('DATE_START', '2020-01', 0.95, 11, 1),
      experienceSpan('DATE_END', 'PRESENT', 0.95, 11, 1),
      experienceSpan('TITLE', 'Staff Engineer', 0.9, 20, 2),
      experienceSpan('DATE_START', '2020-01', 0.95, 21, 2),
      experienceSpan('DATE_END', 'PRESENT', 0.95, 21, 2)
    ];

    const record = synthesize(spans, { asOf: '2024-06' });

    expect(record.experience).toHaveLength(1);
    expect(record.experience[0].organization.value).toBe('Google');
    expect(record.experience[0].title.value).toBe('Staff Engineer');
  });

  it('should keep entries in separate sections apart when dates differ', () => {
    const spans = [
      experienceSpan('ORG', 'Google', 0.95, 10, 1),
      experienceSpan('DATE_START', '2020-01', 0.95, 11, 1),
      experienceSpan('DATE_END', 'PRESENT', 0.95, 11, 1),
      experienceSpan('TITLE', 'Analyst', 0.9, 20, 2),
      experienceSpan('DATE_START', '2010-01', 0.95, 21, 2),
      experienceSpan('DATE_END', '2011-01', 0.95, 21, 2)
    ];

    expect(synthesize(spans, { asOf: '2024-06' }).experience).toHaveLength(2);
  });

  it('should build education entries', () => {
    const spans = [
      span({ field: 'ORG', value: 'Stanford University', confidence: 0.85, sectionIndex: 3, blockIndex: 30, sectionKind: 'EDUCATION' }),
      span({ field: 'DEGREE', value: 'B.S. Computer Science', confidence: 0.9, sectionIndex: 3, blockIndex: 30, sectionKind: 'EDUCATION' }),
      span({ field: 'DATE_END', value: '2016-12', confidence: 0.7, sectionIndex: 3, blockIndex: 31, sectionKind: 'EDUCATION' })
    ];

    const [entry] = synthesize(spans).education;

    expect(entry.institution.value).toBe('Stanford University');
    expect(entry.degree.value).toBe('B.S. Computer Science');
    expect(entry.start.value).toBeNull();
    expect(entry.end.value).toBe('2016-12');
    expect(entry.confidence).toBeCloseTo((0.85 + 0.9 + 0.7) / 3);
  });

  it('should collect coursework lines on the education entry', () => {
    const spans = [
      span({ field: 'ORG', value: 'Stanford University', confidence: 0.85, sectionIndex: 3, blockIndex: 30, sectionKind: 'EDUCATION' }),
      span({ field: 'DEGREE', value: 'B.S. Computer Science', confidence: 0.9, sectionIndex: 3, blockIndex: 30, sectionKind: 'EDUCATION' }),
      span({ field: 'COURSEWORK', value: "Dean's List", confidence: 0.7, sectionIndex: 3, blockIndex: 31, sectionKind: 'EDUCATION' }),
      span({ field: 'COURSEWORK', value: 'Achieved 92.5%', confidence: 0.8, sectionIndex: 3, blockIndex: 32, sectionKind: 'EDUCATION' })
    ];

    const record = synthesize(spans);
    const [entry] = record.education;

    expect(record.education).toHaveLength(1);
    expect(entry.coursework.value).toBe("Dean's List\nAchieved 92.5%");
    expect(entry.coursework.confidence).toBeCloseTo(0.75);
    expect(entry.coursework.sourceSpanIds).toEqual([spans[2].id, spans[3].id]);
    expect(entry.confidence).toBeCloseTo((0.85 + 0.9) / 2);
  });

  it('should keep an entry location apart from the contact location', () => {
    const spans = [
      span({ field: 'LOCATION', value: 'Denver, CO', confidence: 0.5, blockIndex: 1 }),
      experienceSpan('ORG', 'Acme Corp', 0.8, 10),
      experienceSpan('TITLE', 'Engineer', 0.85, 10),
      experienceSpan('LOCATION', 'Austin, TX', 0.7, 10),
      experienceSpan('DATE_START', '2019-01', 0.8, 10),
      experienceSpan('DATE_END', '2021-12', 0.8, 10)
    ];

    const record = synthesize(spans, { asOf: '2024-06' });
    const [entry] = record.experience;

    expect(record.contact.location.value).toBe('Denver, CO');
    expect(record.contact.location.sourceSpanIds).toEqual([spans[0].id]);
    expect(entry.location.value).toBe('Austin, TX');
    expect(entry.location.sourceSpanIds).toEqual([spans[3].id]);
    expect(entry.confidence).toBeCloseTo((0.8 + 0.85 + 0.8 + 0.8) / 4);
  });

  it('should group skills and drop weak ones with a note', () => {
    const mention = span({ field: 'SKILL', value: 'typescript', confidence: 0.8, sectionIndex: 1, blockIndex: 12, sectionKind: 'EXPERIENCE' });
    const listed = span({ field: 'SKILL', value: 'TypeScript', confidence: 1, sectionIndex: 4, blockIndex: 40, sectionKind: 'SKILLS' });
    const weak = span({ field: 'SKILL', value: 'Widgetry', confidence: 0.4, sectionIndex: 4, blockIndex: 41, sectionKind: 'SKILLS' });

    const record = synthesize([weak, listed, mention]);

    expect(record.skills).toEqual([{
      term: 'TypeScript',
      confidence: 1,
      provenance: 'extracted',
      sourceSpanIds: [mention.id, listed.id]
    }]);
    expect(record.unresolvedConflicts.map(n => [n.field, n.resolution])).toEqual([['skills.widgetry', 'LEFT_UNRESOLVED']]);
    expect(record.needsReview).toBe(true);
  });

  it('should return an empty record for an empty pool', () => {
    const record = synthesize([]);

    expect(record.contact.name).toEqual(emptyField());
    expect(record.education).toEqual([]);
    expect(record.experience).toEqual([]);
    expect(record.skills).toEqual([]);
    expect(record.totalExperience).toBeNull();
    expect(record.asOf).toBeNull();
    expect(record.needsReview).toBe(false);
  });

  it('should only flag unresolved notes without overrides', () => {
    expect(needsReview([
      { field: 'contact.phone', candidateIds: [], resolution: 'LEFT_UNRESOLVED', reason: 'below_threshold', overrides: [{ value: null, profileVersion: 2 }] },
      { field: 'contact.email', candidateIds: [], resolution: 'AUTO_RESOLVED', reason: 'value_disagreement', overrides: [] }
    ])).toBe(false);
  });

  describe('Property: determinism', () => {
    it('should not depend on candidate order', () => {
      fc.assert(
        fc.property(fc.shuffledSubarray(experienceSpans, { minLength: experienceSpans.length }), shuffled => {
          expect(synthesize(shuffled, { asOf: '2024-06' })).toEqual(synthesize(experienceSpans, { asOf: '2024-06' }));
        })
      );
    });

    it('should give the same record when re-synthesizing a pool', () => {
      const pool = new CandidatePool(experienceSpans);

      expect(synthesize(pool)).toEqual(synthesize(pool.all()));
    });
  });
});

describe('Manual edits', () => {
  function baseRecord(): ProfileRecord {
    return synthesize([
      span({ field: 'NAME', value: 'Jane Doe', confidence: 0.9, blockIndex: 0 }),
      span({ field: 'EMAIL', value: 'a@x.com', confidence: 0.9, blockIndex: 1 }),
      span({ field: 'EMAIL', value: 'b@x.com', confidence: 0.6, blockIndex: 2 }),
      span({ field: 'PHONE', value: '555-123-4567', confidence: 0.3, blockIndex: 3 }),
      experienceSpan('ORG', 'Google', 0.95, 10),
      experienceSpan('TITLE', 'Engineer', 0.9, 10),
      experienceSpan('DATE_START', '2020-01', 0.95, 11),
      experienceSpan('DATE_END', 'PRESENT', 0.95, 11),
      span({ field: 'SKILL', value: 'TypeScript', confidence: 1, sectionIndex: 2, blockIndex: 20, sectionKind: 'SKILLS' })
    ], { asOf: '2020-12' });
  }

  it('should start from a record needing review', () => {
    const record = baseRecord();

    expect(record.unresolvedConflicts.map(n => n.field)).toEqual(['contact.email', 'contact.phone']);
    expect(record.needsReview).toBe(true);
    expect(record.totalExperience?.formatted).toBe('1 year 0 months');
  });

  it('should set a normalized manual value and bump the version', () => {
    const record = baseRecord();
    const before = structuredClone(record);

    const edited = applyEdit(record, { section: 'contact', field: 'email' }, 'Jane.Doe@Example.com');

    expect(edited.contact.email).toEqual({ value: 'janedoe@example.com', confidence: 1, provenance: 'manual', sourceSpanIds: [] });
    expect(edited.version).toBe(2);
    expect(edited.unresolvedConflicts[0].overrides).toEqual([{ value: 'janedoe@example.com', profileVersion: 2 }]);
    expect(record).toEqual(before);
  });

  it('should clear review once unresolved notes are overridden', () => {
    const edited = applyEdit(baseRecord(), { section: 'contact', field: 'phone' }, '(555) 987-6543');

    expect(edited.contact.phone.value).toBe('5559876543');
    expect(edited.unresolvedConflicts[1].overrides).toEqual([{ value: '5559876543', profileVersion: 2 }]);
    expect(edited.needsReview).toBe(false);
  });

  it('should clear a field with null or blank text', () => {
    const edited = applyEdit(baseRecord(), { section: 'contact', field: 'name' }, '   ');

    expect(edited.contact.name).toEqual({ value: null, confidence: 1, provenance: 'manual', sourceSpanIds: [] });
  });

  it('should recalculate total experience after a date edit', () => {
    const edited = applyEdit(baseRecord(), { section: 'experience', index: 0, field: 'start' }, 'Jan 2019');

    expect(edited.experience[0].start.value).toBe('2019-01');
    expect(edited.experience[0].confidence).toBeCloseTo(0.95);
    expect(edited.totalExperience?.formatted).toBe('2 years 0 months');
  });

  it('should append an entry at the next index', () => {
    const edited = applyEdit(baseRecord(), { section: 'experience', index: 1, field: 'organization' }, 'Initech');

    expect(edited.experience).toHaveLength(2);
    expect(edited.experience[1].organization.value).toBe('Initech');
    expect(edited.experience[1].title.value).toBeNull();
    expect(edited.experience[1].confidence).toBe(1);
  });

  it('should edit entry locations and coursework', () => {
    const located = applyEdit(baseRecord(), { section: 'experience', index: 0, field: 'location' }, '  Berlin ');
    expect(located.experience[0].location).toEqual({ value: 'Berlin', confidence: 1, provenance: 'manual', sourceSpanIds: [] });
    expect(located.experience[0].confidence).toBeCloseTo((0.95 + 0.9 + 0.95 + 0.95) / 4);

    const studied = applyEdit(located, { section: 'education', index: 0, field: 'coursework' }, 'Distributed Systems');
    expect(studied.education).toHaveLength(1);
    expect(studied.education[0].coursework.value).toBe('Distributed Systems');
    expect(studied.education[0].institution.value).toBeNull();
    expect(studied.education[0].confidence).toBe(0);
    expect(studied.version).toBe(3);
  });

  it('should add and remove skills', () => {
    const added = applyEdit(baseRecord(), { section: 'skills', term: 'k8s' }, 'k8s');
    expect(added.skills.map(s => [s.term, s.provenance])).toEqual([['Kubernetes', 'manual'], ['TypeScript', 'extracted']]);

    const removed = applyEdit(added, { section: 'skills', term: 'typescript' }, null);
    expect(removed.skills.map(s => s.term)).toEqual(['Kubernetes']);
    expect(removed.version).toBe(3);
  });

  it('should name edit paths', () => {
    expect(editPath({ section: 'contact', field: 'email' })).toBe('contact.email');
    expect(editPath({ section: 'education', index: 2, field: 'degree' })).toBe('education.2.degree');
    expect(editPath({ section: 'skills', term: 'JS' })).toBe('skills.javascript');
  });

  describe('rejected edits', () => {
    it('should reject an invalid email', () => {
      const error = thrown(() => applyEdit(baseRecord(), { section: 'contact', field: 'email' }, 'not-an-email'));

      expect(isProfilerError(error, ProfilerErrorCode.INVALID_EDIT)).toBe(true);
      expect(isProfilerError(error) && error.technicalDetails).toBe('Invalid email address');
    });

    it('should reject an unknown target', () => {
      const error = thrown(() => applyEdit(baseRecord(), { section: 'contact', field: 'fax' }, 'x'));

      expect(isProfilerError(error, ProfilerErrorCode.INVALID_EDIT)).toBe(true);
    });

    it('should reject a non-string value', () => {
      const error = thrown(() => applyEdit(baseRecord(), { section: 'contact', field: 'name' }, 42));

      expect(isProfilerError(error) && error.technicalDetails).toBe('Value must be a string or null');
    });

    it('should reject an index past the end', () => {
      const error = thrown(() => applyEdit(baseRecord(), { section: 'experience', index: 3, field: 'title' }, 'CTO'));

      expect(isProfilerError(error) && error.technicalDetails).toBe('Index 3 is out of range (1 entries)');
    });

    it('should reject an unparseable date', () => {
      const error = thrown(() => applyEdit(baseRecord(), { section: 'experience', index: 0, field: 'end' }, 'someday'));

      expect(isProfilerError(error, ProfilerErrorCode.INVALID_EDIT)).toBe(true);
    });
  });

  describe('Property: edit monotonicity', () => {
    const edits: Array<{ target: EditTarget; value: string | null }> = [
      { target: { section: 'contact', field: 'name' }, value: 'Jane Q. Doe' },
      { target: { section: 'contact', field: 'location' }, value: 'Austin, TX' },
      { target: { section: 'contact', field: 'website' }, value: null },
      { target: { section: 'experience', index: 0, field: 'title' }, value: 'Staff Engineer' },
      { target: { section: 'experience', index: 0, field: 'location' }, value: 'Remote' },
      { target: { section: 'skills', term: 'Go' }, value: 'Go' }
    ];

    function editedField(record: ProfileRecord, target: EditTarget): Pick<ResolvedField, 'confidence' | 'provenance'> | undefined {
      switch (target.section) {
        case 'contact':
          return record.contact[target.field];
        case 'education':
          return record.education[target.index]?.[target.field];
        case 'experience':
          return record.experience[target.index]?.[target.field];
        case 'skills':
          return record.skills.find(skill => skillKey(skill.term) === skillKey(target.term));
      }
    }

    /**
     * The record with the edited path and the values derived from it blanked
     */
    function untouched(record: ProfileRecord, target: EditTarget): ProfileRecord {
      const copy = structuredClone({
        ...record,
        version: 0,
        unresolvedConflicts: [],
        needsReview: false,
        totalExperience: null
      });
      switch (target.section) {
        case 'contact':
          copy.contact[target.field] = emptyField();
          break;
        case 'education': {
          const entry = copy.education[target.index];
          if (entry) {
            entry[target.field] = emptyField();
            entry.confidence = 0;
          }
          break;
        }
        case 'experience': {
          const entry = copy.experience[target.index];
          if (entry) {
            entry[target.field] = emptyField();
            entry.confidence = 0;
          }
          break;
        }
        case 'skills':
          copy.skills = copy.skills.filter(skill => skillKey(skill.term) !== skillKey(target.term));
          break;
      }
      return copy;
    }

    it('should bump the version, mark the edited field manual and leave the rest unchanged', () => {
      fc.assert(
        fc.property(fc.array(fc.constantFrom(...edits), { maxLength: 10 }), sequence => {
          let record = baseRecord();

          for (const edit of sequence) {
            const next = applyEdit(record, edit.target, edit.value);

            expect(next.version).toBe(record.version + 1);
            expect(editedField(next, edit.target)).toMatchObject({ confidence: 1, provenance: 'manual' });
            expect(untouched(next, edit.target)).toEqual(untouched(record, edit.target));
            record = next;
          }

          expect(record.version).toBe(1 + sequence.length);
        })
      );
    });
  });
});
