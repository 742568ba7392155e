export { CandidatePool, compareSpans } from './candidatePool';
export { ContactHeuristicExtractor } from './contactHeuristic';
export { ContactPatternExtractor } from './contactPattern';
export { DateRangeExtractor } from './dateRange';
export { OrganizationTitleExtractor } from './organizationTitle';
export { SkillTermExtractor } from './skillTerm';
export { ExtractorRegistry, createDefaultRegistry } from './registry';
export { runExtractors } from './runner';
export type { RunExtractorsOptions } from './runner';
export { SpanBuilder } from './spanBuilder';
export type { Extractor, ExtractorOptions } from './types';
export * from './normalize';
export { degreeLevel, findSkills, lookupSkill, matchOrganization, organizationKey } from './lexicon';
export type { DegreeLevel } from './lexicon';
