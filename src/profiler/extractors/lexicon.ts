/**
 * Lexicons
 *
 * Skill terms, organisation names, job-title keywords and degree keywords,
 * loaded from the JSON files in ../data.
 */

import { z } from 'zod';
import { distance } from 'fastest-levenshtein';
import skillData from '../data/skills.json';
import organizationData from '../data/organizations.json';
import titleData from '../data/titles.json';
import degreeData from '../data/degrees.json';
import { DegreeLevelSchema, DEGREE_LEVELS } from '../validation/schemas';

export type DegreeLevel = z.infer<typeof DegreeLevelSchema>;

const SkillLexiconSchema = z.array(z.object({
  term: z.string().min(1),
  aliases: z.array(z.string().min(1)).min(1)
}));

const OrganizationLexiconSchema = z.object({
  names: z.array(z.string().min(1)),
  legalSuffixes: z.array(z.string().min(1)),
  companyWords: z.array(z.string().min(1)),
  institutionKeywords: z.array(z.string().min(1))
});

const DegreeLexiconSchema = z.array(z.object({
  level: DegreeLevelSchema,
  aliases: z.array(z.string().min(1)).min(1)
}));

const skills = SkillLexiconSchema.parse(skillData);
const organizations = OrganizationLexiconSchema.parse(organizationData);
const titleKeywords = new Set(z.array(z.string().min(1)).parse(titleData));
const degrees = DegreeLexiconSchema.parse(degreeData);

/**
 * Lowercase, de-accent and reduce to space separated words.
 * Dots and apostrophes are dropped so "B.S." and "Master's" read as words.
 */
export function foldText(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[.'\u2019]/g, '')
    .replace(/[^a-z0-9+#]+/g, ' ')
    .trim();
}

function containsPhrase(folded: string, phrase: string): boolean {
  return ` ${folded} `.includes(` ${phrase} `);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

// ============================================================================
// Skills
// ============================================================================

export interface SkillMatch {
  term: string;
  index: number;
  text: string;
}

interface SkillPattern {
  term: string;
  pattern: RegExp;
}

const SKILL_PATTERNS: readonly SkillPattern[] = skills.map(({ term, aliases }) => {
  const alternation = [...aliases]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  return {
    term,
    pattern: new RegExp(`(?<![A-Za-z0-9_.])(?:${alternation})(?![A-Za-z0-9_+#])`, 'i')
  };
});

const SKILL_BY_KEY: ReadonlyMap<string, string> = new Map(
  skills.flatMap(({ term, aliases }) => [term, ...aliases].map(alias => [alias.toLowerCase(), term] as const))
);

/**
 * Every lexicon term mentioned in a line, in order of first mention
 */
export function findSkills(text: string): SkillMatch[] {
  const matches: SkillMatch[] = [];
  for (const { term, pattern } of SKILL_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      matches.push({ term, index: match.index, text: match[0] });
    }
  }
  return matches.sort((a, b) => a.index - b.index || a.term.localeCompare(b.term));
}

/**
 * Canonical lexicon term for an exact alias, or null
 */
export function lookupSkill(text: string): string | null {
  return SKILL_BY_KEY.get(text.trim().replace(/\s+/g, ' ').toLowerCase()) ?? null;
}

// ============================================================================
// Organizations
// ============================================================================

const LEGAL_SUFFIXES = new Set(organizations.legalSuffixes);
const COMPANY_WORDS = new Set(organizations.companyWords);
const INSTITUTION_KEYWORDS = organizations.institutionKeywords.map(foldText);

export function isLegalSuffix(word: string): boolean {
  return LEGAL_SUFFIXES.has(word);
}

export function hasCompanyMarker(text: string): boolean {
  return foldText(text).split(' ').some(word => LEGAL_SUFFIXES.has(word) || COMPANY_WORDS.has(word));
}

export function hasInstitutionKeyword(text: string): boolean {
  const folded = foldText(text);
  return INSTITUTION_KEYWORDS.some(keyword => containsPhrase(folded, keyword));
}

/**
 * Comparison key for organisation names: folded, legal suffixes removed
 */
export function organizationKey(name: string): string {
  return foldText(name)
    .split(' ')
    .filter(word => word && !LEGAL_SUFFIXES.has(word))
    .join(' ');
}

export interface OrganizationMatch {
  name: string;
  /** 1 for an exact key match, edit-distance similarity otherwise */
  similarity: number;
}

const ORGANIZATION_KEYS = organizations.names.map(name => ({ name, key: organizationKey(name) }));

export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - distance(a, b) / longest;
}

/**
 * Closest lexicon organisation, or null when nothing reaches the threshold
 */
export function matchOrganization(text: string, threshold: number): OrganizationMatch | null {
  const key = organizationKey(text);
  if (!key) {
    return null;
  }

  let best: OrganizationMatch | null = null;
  for (const candidate of ORGANIZATION_KEYS) {
    const score = similarity(key, candidate.key);
    if (score >= threshold && (best === null || score > best.similarity)) {
      best = { name: candidate.name, similarity: score };
    }
  }
  return best;
}

// ============================================================================
// Titles and degrees
// ============================================================================

export function hasTitleKeyword(text: string): boolean {
  return foldText(text).split(' ').some(word => titleKeywords.has(word));
}

const DEGREE_ALIASES = degrees.map(({ level, aliases }) => ({ level, aliases: aliases.map(foldText) }));

/**
 * Highest degree level a line mentions, or null
 */
export function degreeLevel(text: string): DegreeLevel | null {
  const folded = foldText(text);
  for (const level of DEGREE_LEVELS) {
    const entry = DEGREE_ALIASES.find(candidate => candidate.level === level);
    if (entry?.aliases.some(alias => containsPhrase(folded, alias))) {
      return level;
    }
  }
  return null;
}
