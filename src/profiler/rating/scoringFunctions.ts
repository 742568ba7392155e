/**
 * Scoring Functions
 *
 * One rule per `scoring` reference. Each returns a sub-score in [0, 1] and
 * the record field it was computed from.
 */

import { degreeLevel } from '../extractors/lexicon';
import { skillKey } from '../extractors/normalize';
import type { ProfileRecord, ResolvedField } from '../types';
import type { Criterion } from '../validation/validator';

export interface CriterionScore {
  score: number;
  contributingField: string;
}

type CriterionOf<S extends Criterion['scoring']> = Extract<Criterion, { scoring: S }>;

function clamp(score: number): number {
  return Math.min(1, Math.max(0, score));
}

/**
 * Step function: the score of the highest threshold reached
 */
export function scoreYearsOfExperience(
  record: ProfileRecord,
  criterion: CriterionOf<'years_of_experience'>
): CriterionScore {
  const years = (record.totalExperience?.totalMonths ?? 0) / 12;
  const score = criterion.params.thresholds
    .filter(threshold => years >= threshold.years)
    .reduce((best, threshold) => Math.max(best, threshold.score), 0);
  return { score: clamp(score), contributingField: 'years_of_experience' };
}

/**
 * Share of target skills present in the profile
 */
export function scoreSkillCoverage(
  record: ProfileRecord,
  criterion: CriterionOf<'skill_coverage'>
): CriterionScore {
  const targets = new Set(criterion.params.targetSkills.map(skillKey));
  const present = new Set(record.skills.map(skill => skillKey(skill.term)));
  const matched = [...targets].filter(target => present.has(target)).length;
  return { score: clamp(matched / targets.size), contributingField: 'skills' };
}

export function scoreEducationLevel(
  record: ProfileRecord,
  criterion: CriterionOf<'education_level'>
): CriterionScore {
  let score = 0;
  for (const entry of record.education) {
    const level = entry.degree.value === null ? null : degreeLevel(entry.degree.value);
    if (level !== null) {
      score = Math.max(score, criterion.params.levels[level] ?? 0);
    }
  }
  return { score: clamp(score), contributingField: 'education' };
}

export function scoreContactCompleteness(record: ProfileRecord): CriterionScore {
  const fields = [record.contact.name, record.contact.email, record.contact.phone];
  const present = fields.filter(field => field.value !== null).length;
  return { score: present / fields.length, contributingField: 'contact' };
}

/**
 * Mean confidence over every resolved field of the record
 */
export function scoreExtractionConfidence(record: ProfileRecord): CriterionScore {
  const fields: ResolvedField[] = [
    ...Object.values(record.contact),
    ...record.education.flatMap(entry => [entry.institution, entry.degree, entry.start, entry.end]),
    ...record.experience.flatMap(entry => [entry.organization, entry.title, entry.start, entry.end])
  ];
  const confidences = [
    ...fields.filter(field => field.value !== null).map(field => field.confidence),
    ...record.skills.map(skill => skill.confidence)
  ];

  if (confidences.length === 0) {
    return { score: 0, contributingField: 'profile' };
  }
  const mean = confidences.reduce((sum, confidence) => sum + confidence, 0) / confidences.length;
  return { score: clamp(mean), contributingField: 'profile' };
}

export function scoreCriterion(record: ProfileRecord, criterion: Criterion): CriterionScore {
  switch (criterion.scoring) {
    case 'years_of_experience':
      return scoreYearsOfExperience(record, criterion);
    case 'skill_coverage':
      return scoreSkillCoverage(record, criterion);
    case 'education_level':
      return scoreEducationLevel(record, criterion);
    case 'contact_completeness':
      return scoreContactCompleteness(record);
    case 'extraction_confidence':
      return scoreExtractionConfidence(record);
  }
}
