/**
 * Manual Edits
 *
 * Applies a human correction to a profile record. Pure: the input record is
 * never mutated. The touched field becomes `manual` with confidence 1.0, the
 * version is bumped and any conflict note on the same path records the
 * override.
 */

import {
  normalizeDate,
  normalizeEmail,
  normalizeName,
  normalizeOrganization,
  normalizePhone,
  normalizeSkill,
  normalizeUrl,
  skillKey
} from '../extractors/normalize';
import { ProfilerErrorFactory } from '../errors/types';
import { ProfilerLogger } from '../logging/logger';
import type {
  ConflictNote,
  ContactField,
  EditTarget,
  EducationEntry,
  ExperienceEntry,
  ProfileRecord,
  ResolvedField,
  SkillEntry
} from '../types';
import { editTargetValidator } from '../validation/validator';
import { EditValueSchema } from '../validation/schemas';
import { entryConfidence } from './entries';
import { calculateTotalExperience } from './experience';
import { emptyField } from './resolver';
import { needsReview } from './synthesizer';

export const MANUAL_CONFIDENCE = 1.0;

export function manualField(value: string | null): ResolvedField {
  return { value, confidence: MANUAL_CONFIDENCE, provenance: 'manual', sourceSpanIds: [] };
}

/**
 * Field path a target refers to, as used by conflict notes
 */
export function editPath(target: EditTarget): string {
  switch (target.section) {
    case 'contact':
      return `contact.${target.field}`;
    case 'education':
    case 'experience':
      return `${target.section}.${target.index}.${target.field}`;
    case 'skills':
      return `skills.${skillKey(target.term)}`;
  }
}

function requireValue<T>(value: T | null, path: string, reason: string, received: unknown): T {
  if (value === null) {
    throw ProfilerErrorFactory.invalidEdit(path, reason, received);
  }
  return value;
}

/**
 * Normalize a new value the way extractors normalize theirs
 */
export function normalizeEditValue(target: EditTarget, raw: string | null, path: string): string | null {
  const value = raw === null ? null : raw.trim().replace(/\s+/g, ' ');
  if (value === null || value === '') {
    return null;
  }

  switch (target.section) {
    case 'contact':
      return normalizeContact(target.field, value, path);
    case 'skills':
      return normalizeSkill(value);
    case 'education':
    case 'experience':
      if (target.field === 'start' || target.field === 'end') {
        return requireValue(
          normalizeDate(value, target.field),
          path,
          'Dates must be YYYY-MM, a month and year, a year or Present',
          raw
        );
      }
      if (target.field === 'institution' || target.field === 'organization') {
        return normalizeOrganization(value);
      }
      return value;
  }
}

function normalizeContact(field: ContactField, value: string, path: string): string {
  switch (field) {
    case 'email':
      return requireValue(normalizeEmail(value), path, 'Invalid email address', value);
    case 'phone':
      return requireValue(normalizePhone(value), path, 'Phone numbers need 7 to 15 digits', value);
    case 'linkedin':
    case 'website':
      return normalizeUrl(value);
    case 'name':
      return normalizeName(value);
    case 'location':
      return value;
  }
}

function blankEducation(): EducationEntry {
  return {
    institution: emptyField(),
    degree: emptyField(),
    start: emptyField(),
    end: emptyField(),
    coursework: emptyField(),
    confidence: 0
  };
}

function blankExperience(): ExperienceEntry {
  return {
    organization: emptyField(),
    title: emptyField(),
    location: emptyField(),
    start: emptyField(),
    end: emptyField(),
    description: emptyField(),
    confidence: 0
  };
}

function entryAt<E>(entries: readonly E[], index: number, blank: () => E, path: string): E[] {
  if (index > entries.length) {
    throw ProfilerErrorFactory.invalidEdit(path, `Index ${index} is out of range (${entries.length} entries)`, index);
  }
  return index === entries.length ? [...entries, blank()] : [...entries];
}

function editSkills(skills: readonly SkillEntry[], term: string, value: string | null): SkillEntry[] {
  const key = skillKey(term);
  const kept = skills.filter(skill => skillKey(skill.term) !== key && (value === null || skillKey(skill.term) !== skillKey(value)));
  if (value === null) {
    return kept;
  }
  const edited: SkillEntry = { term: value, confidence: MANUAL_CONFIDENCE, provenance: 'manual', sourceSpanIds: [] };
  return [...kept, edited].sort((a, b) => {
    const keyA = skillKey(a.term);
    const keyB = skillKey(b.term);
    return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
  });
}

function overrideNotes(
  notes: readonly ConflictNote[],
  paths: readonly string[],
  value: string | null,
  profileVersion: number
): ConflictNote[] {
  return notes.map(note =>
    paths.includes(note.field)
      ? { ...note, overrides: [...note.overrides, { value, profileVersion }] }
      : note
  );
}

/**
 * Apply one manual edit
 * @throws ProfilerError with code INVALID_EDIT
 */
export function applyEdit(record: ProfileRecord, target: unknown, newValue: unknown): ProfileRecord {
  const parsedTarget = editTargetValidator.validateAndParse(target);
  const path = editPath(parsedTarget);

  const parsedValue = EditValueSchema.safeParse(newValue);
  if (!parsedValue.success) {
    throw ProfilerErrorFactory.invalidEdit(path, 'Value must be a string or null', newValue);
  }

  const value = normalizeEditValue(parsedTarget, parsedValue.data, path);
  const version = record.version + 1;
  const paths = [path];
  let next: ProfileRecord = { ...record, version };

  switch (parsedTarget.section) {
    case 'contact':
      next.contact = { ...record.contact, [parsedTarget.field]: manualField(value) };
      break;

    case 'education': {
      const { index, field } = parsedTarget;
      const entries = entryAt(record.education, index, blankEducation, path);
      const entry: EducationEntry = { ...entries[index], [field]: manualField(value) };
      entry.confidence = entryConfidence([entry.institution, entry.degree, entry.start, entry.end]);
      entries[index] = entry;
      next.education = entries;
      if (field === 'start' || field === 'end') {
        paths.push(`education.${index}.dates`);
      }
      break;
    }

    case 'experience': {
      const { index, field } = parsedTarget;
      const entries = entryAt(record.experience, index, blankExperience, path);
      const entry: ExperienceEntry = { ...entries[index], [field]: manualField(value) };
      entry.confidence = entryConfidence([entry.organization, entry.title, entry.start, entry.end]);
      entries[index] = entry;
      next = {
        ...next,
        experience: entries,
        totalExperience: calculateTotalExperience(entries, record.asOf)
      };
      if (field === 'start' || field === 'end') {
        paths.push(`experience.${index}.dates`);
      }
      break;
    }

    case 'skills':
      next.skills = editSkills(record.skills, parsedTarget.term, value);
      break;
  }

  next.unresolvedConflicts = overrideNotes(record.unresolvedConflicts, paths, value, version);
  next.needsReview = needsReview(next.unresolvedConflicts);

  ProfilerLogger.logEdit(path, version);
  return next;
}
