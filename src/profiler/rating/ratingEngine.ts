/**
 * Rating Engine
 *
 * Scores a profile record against a weighted rubric. The rubric is validated
 * before any scoring; a criterion whose required fields are missing fails
 * closed with a zero score. Deterministic: no clock, randomness or I/O.
 */

import { loggers } from '../../shared/logger';
import { MISSING_REQUIRED_FIELD } from '../types';
import type { ProfileRecord, Rating, RatingExplanation } from '../types';
import type { REQUIRED_FIELD_NAMES } from '../validation/schemas';
import { rubricValidator } from '../validation/validator';
import type { Criterion } from '../validation/validator';
import { scoreCriterion } from './scoringFunctions';

export type RequiredField = typeof REQUIRED_FIELD_NAMES[number];

/**
 * Whether a required field holds a resolved value
 */
export function hasRequiredField(record: ProfileRecord, field: RequiredField): boolean {
  switch (field) {
    case 'contact.name':
      return record.contact.name.value !== null;
    case 'contact.email':
      return record.contact.email.value !== null;
    case 'contact.phone':
      return record.contact.phone.value !== null;
    case 'years_of_experience':
      return record.totalExperience !== null;
    case 'education':
      return record.education.length > 0;
    case 'experience':
      return record.experience.length > 0;
    case 'skills':
      return record.skills.length > 0;
  }
}

export function missingFields(record: ProfileRecord, criterion: Criterion): RequiredField[] {
  return criterion.requiredFields.filter(field => !hasRequiredField(record, field));
}

function explain(record: ProfileRecord, criterion: Criterion): RatingExplanation {
  const missing = missingFields(record, criterion);
  if (missing.length > 0) {
    return {
      criterion: criterion.name,
      contributingField: missing.join(', '),
      weight: criterion.weight,
      score: 0,
      note: MISSING_REQUIRED_FIELD
    };
  }

  const { score, contributingField } = scoreCriterion(record, criterion);
  return { criterion: criterion.name, contributingField, weight: criterion.weight, score };
}

/**
 * Rate a profile record
 * @throws ProfilerError with code INVALID_RUBRIC before any scoring
 */
export function rate(record: ProfileRecord, rubric: unknown): Rating {
  const parsed = rubricValidator.validateAndParse(rubric);

  const explanation = parsed.criteria.map(criterion => explain(record, criterion));
  const subScores: Record<string, number> = {};
  let aggregate = 0;
  for (const entry of explanation) {
    subScores[entry.criterion] = entry.score;
    aggregate += entry.weight * entry.score;
  }

  loggers.rating.debug(
    { rubric: parsed.name, profileVersion: record.version, aggregate },
    'Rating calculated'
  );

  return { profileVersion: record.version, subScores, aggregate, explanation };
}
