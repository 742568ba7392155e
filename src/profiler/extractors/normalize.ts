/**
 * Value Normalization
 *
 * Every extractor emits normalized values, and the synthesizer compares
 * candidates through the keys defined here. All functions are idempotent.
 */

import { PRESENT } from '../types';
import type { DateValue, FieldKind } from '../types';
import { foldText, lookupSkill, organizationKey } from './lexicon';

/** Leading bullet glyph of a list line */
export const BULLET = /^\s*[•·▪‣◦●*\-–—]\s+/;

// ============================================================================
// Contact values
// ============================================================================

/**
 * Lowercase, with dots and `+tags` removed from the local part
 */
export function normalizeEmail(raw: string): string | null {
  const email = raw.trim().toLowerCase().replace(/^(?:mailto:)+/, '');
  const at = email.lastIndexOf('@');
  if (at <= 0 || at === email.length - 1) {
    return null;
  }

  const local = email.slice(0, at).replace(/\+.*$/, '').replace(/\./g, '');
  const domain = email.slice(at + 1);
  if (!local || !/^[a-z0-9-]+(\.[a-z0-9-]+)*\.[a-z]{2,}$/.test(domain)) {
    return null;
  }
  return `${local}@${domain}`;
}

const MIN_PHONE_DIGITS = 7;
const MAX_PHONE_DIGITS = 15;

/**
 * Digits only, keeping a leading `+`
 */
export function normalizePhone(raw: string): string | null {
  const trimmed = raw.trim();
  const digits = trimmed.replace(/\D/g, '');
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
    return null;
  }
  return trimmed.startsWith('+') ? `+${digits}` : digits;
}

export function phoneDigitCount(phone: string): number {
  return phone.replace(/\D/g, '').length;
}

/**
 * Collapse whitespace; an all-caps name becomes capitalized
 */
export function normalizeName(raw: string): string {
  const collapsed = raw.trim().replace(/\s+/g, ' ');
  if (collapsed !== collapsed.toUpperCase()) {
    return collapsed;
  }
  return collapsed
    .toLowerCase()
    .replace(/(^|[\s'-])([a-z])/g, (_, lead: string, letter: string) => lead + letter.toUpperCase());
}

export function normalizeUrl(raw: string): string {
  return raw
    .toLowerCase()
    .replace(/^(?:\s|https?:\/\/|www\.)+/, '')
    .replace(/[\s/.,;]+$/, '');
}

// ============================================================================
// Organizations and skills
// ============================================================================

/**
 * Unicode-normalize and de-accent an organisation name
 */
export function normalizeOrganization(raw: string): string {
  return raw
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .normalize('NFC')
    .replace(/\s+/g, ' ')
    .replace(/^[\s,;:|-]+|[\s,;:|-]+$/g, '');
}

/**
 * Canonical lexicon term, or the cleaned text when the term is unknown
 */
export function normalizeSkill(raw: string): string {
  const cleaned = raw.trim().replace(/\s+/g, ' ');
  return lookupSkill(cleaned) ?? cleaned;
}

export function skillKey(term: string): string {
  return normalizeSkill(term).toLowerCase();
}

// ============================================================================
// Dates
// ============================================================================

export type DateRole = 'start' | 'end';

export type DatePrecision = 'month' | 'year' | 'present';

export interface ParsedDate {
  value: DateValue;
  precision: DatePrecision;
}

export const MIN_YEAR = 1950;
export const MAX_YEAR = 2100;

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12
};

const PRESENT_WORDS = new Set(['present', 'current', 'currently', 'now', 'today', 'ongoing', 'date', 'to date']);

/** Matches one date token inside free text */
export const DATE_TOKEN_SOURCE =
  "(?:(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?,?\\s*'?\\d{4}" +
  '|\\d{1,2}\\s*[/.]\\s*\\d{4}' +
  '|\\d{4}\\s*[/-]\\s*(?:0[1-9]|1[0-2])(?!\\d)' +
  '|\\d{4})';

export const PRESENT_TOKEN_SOURCE = '(?:present|current(?:ly)?|now|today|ongoing|to date)';

function formatMonth(year: number, month: number): DateValue | null {
  if (year < MIN_YEAR || year > MAX_YEAR || month < 1 || month > 12) {
    return null;
  }
  return `${year}-${String(month).padStart(2, '0')}`;
}

/**
 * Parse a date token into `YYYY-MM` or `PRESENT`.
 * A bare year is the first month for a start and the last month for an end.
 */
export function parseDate(raw: string, role: DateRole): ParsedDate | null {
  const text = raw.trim().toLowerCase().replace(/[.,]$/, '');
  if (!text) {
    return null;
  }

  if (PRESENT_WORDS.has(text)) {
    return { value: PRESENT, precision: 'present' };
  }

  let match = /^(\d{4})\s*[/-]\s*(\d{1,2})$/.exec(text);
  if (match) {
    const value = formatMonth(Number(match[1]), Number(match[2]));
    return value ? { value, precision: 'month' } : null;
  }

  match = /^([a-z]+)\.?,?\s*'?(\d{4})$/.exec(text);
  if (match) {
    const month = MONTHS[match[1]];
    const value = month ? formatMonth(Number(match[2]), month) : null;
    return value ? { value, precision: 'month' } : null;
  }

  match = /^(\d{1,2})\s*[/.]\s*(\d{4})$/.exec(text);
  if (match) {
    const value = formatMonth(Number(match[2]), Number(match[1]));
    return value ? { value, precision: 'month' } : null;
  }

  match = /^(\d{4})$/.exec(text);
  if (match) {
    const value = formatMonth(Number(match[1]), role === 'start' ? 1 : 12);
    return value ? { value, precision: 'year' } : null;
  }

  return null;
}

export function normalizeDate(raw: string, role: DateRole): DateValue | null {
  return parseDate(raw, role)?.value ?? null;
}

/**
 * Chronological order, with PRESENT after every concrete month
 */
export function compareDates(a: DateValue, b: DateValue): number {
  if (a === b) return 0;
  if (a === PRESENT) return 1;
  if (b === PRESENT) return -1;
  return a < b ? -1 : 1;
}

/**
 * Months since year 0, with PRESENT resolved to `asOf`
 */
export function monthNumber(date: DateValue, asOf: DateValue | null): number | null {
  const resolved = date === PRESENT ? asOf : date;
  if (resolved === null || resolved === PRESENT) {
    return null;
  }
  const match = /^(\d{4})-(\d{2})$/.exec(resolved);
  if (!match) {
    return null;
  }
  return Number(match[1]) * 12 + Number(match[2]) - 1;
}

export function formatMonthNumber(months: number): DateValue {
  const year = Math.floor(months / 12);
  const month = months - year * 12 + 1;
  return `${year}-${String(month).padStart(2, '0')}`;
}

// ============================================================================
// Comparison keys
// ============================================================================

/**
 * Key under which candidate values for a field agree
 */
export function comparisonKey(field: FieldKind, value: string): string {
  switch (field) {
    case 'EMAIL':
      return normalizeEmail(value) ?? value.toLowerCase();
    case 'PHONE':
      return normalizePhone(value) ?? value;
    case 'ORG':
      return organizationKey(value);
    case 'SKILL':
      return skillKey(value);
    case 'LINKEDIN':
    case 'WEBSITE':
      return normalizeUrl(value);
    case 'DATE_START':
    case 'DATE_END':
      return canonicalValue(field, value);
    default:
      return foldText(value);
  }
}

/**
 * Canonical form of a candidate value for its field
 */
export function canonicalValue(field: FieldKind, value: string): string {
  switch (field) {
    case 'EMAIL':
      return normalizeEmail(value) ?? value.trim();
    case 'PHONE':
      return normalizePhone(value) ?? value.trim();
    case 'ORG':
      return normalizeOrganization(value);
    case 'SKILL':
      return normalizeSkill(value);
    case 'LINKEDIN':
    case 'WEBSITE':
      return normalizeUrl(value);
    case 'DATE_START':
      return normalizeDate(value, 'start') ?? value.trim();
    case 'DATE_END':
      return normalizeDate(value, 'end') ?? value.trim();
    case 'NAME':
      return normalizeName(value);
    default:
      return value.trim().replace(/\s+/g, ' ');
  }
}
