export { rate, hasRequiredField, missingFields } from './ratingEngine';
export type { RequiredField } from './ratingEngine';
export { parseRubric, loadRubricFile, loadDefaultRubric } from './rubric';
export {
  scoreCriterion,
  scoreContactCompleteness,
  scoreEducationLevel,
  scoreExtractionConfidence,
  scoreSkillCoverage,
  scoreYearsOfExperience
} from './scoringFunctions';
export type { CriterionScore } from './scoringFunctions';
