/**
 * Date Range Extractor
 *
 * Finds "Jan 2020 - Present", "2018 - 2019", "03/2019 to 06/2021" and lone
 * dates in education and experience sections, normalised to `YYYY-MM` or
 * `PRESENT`.
 */

import { bodyBlocks } from '../segmenter/segmenter';
import type { CandidateSpan, Section } from '../types';
import { BULLET, DATE_TOKEN_SOURCE, PRESENT_TOKEN_SOURCE, parseDate } from './normalize';
import type { DatePrecision } from './normalize';
import { SpanBuilder } from './spanBuilder';
import type { Extractor } from './types';

const RANGE_SEPARATOR = '(?:-|\\u2013|\\u2014|to|until|through|till)';

export const DATE_RANGE_PATTERN = new RegExp(
  `(?<![\\w/])(${DATE_TOKEN_SOURCE})\\s*${RANGE_SEPARATOR}\\s*(${DATE_TOKEN_SOURCE}|${PRESENT_TOKEN_SOURCE})(?![\\w/])`,
  'gi'
);

const SINGLE_DATE_PATTERN = new RegExp(`(?<![\\w/])${DATE_TOKEN_SOURCE}(?![\\w/])`, 'i');

/** Lone dates are only read from short headline lines */
const MAX_HEADLINE_WORDS = 10;

const MONTH_PRECISION_CONFIDENCE = 0.95;
const YEAR_PRECISION_CONFIDENCE = 0.8;
const GRADUATION_DATE_CONFIDENCE = 0.7;
const LONE_START_CONFIDENCE = 0.6;

function rangeConfidence(precision: DatePrecision): number {
  return precision === 'year' ? YEAR_PRECISION_CONFIDENCE : MONTH_PRECISION_CONFIDENCE;
}

/**
 * Blank out every date range so lone dates can be found in what remains
 */
export function stripDateRanges(text: string): string {
  return text.replace(DATE_RANGE_PATTERN, match => ' '.repeat(match.length));
}

export class DateRangeExtractor implements Extractor {
  readonly id = 'date-range';
  readonly kinds = ['EDUCATION', 'EXPERIENCE'] as const;
  readonly fields = ['DATE_START', 'DATE_END'] as const;

  extract(section: Section): CandidateSpan[] {
    const spans = new SpanBuilder(this.id, section);

    for (const block of bodyBlocks(section)) {
      let foundRange = false;

      for (const match of block.text.matchAll(DATE_RANGE_PATTERN)) {
        const start = parseDate(match[1], 'start');
        const end = parseDate(match[2], 'end');
        if (!start || !end) {
          continue;
        }
        foundRange = true;
        spans.add(block, 'DATE_START', start.value, match[0], rangeConfidence(start.precision));
        spans.add(block, 'DATE_END', end.value, match[0], rangeConfidence(end.precision));
      }

      const text = block.text.trim();
      if (foundRange || BULLET.test(text) || text.split(/\s+/).length > MAX_HEADLINE_WORDS) {
        continue;
      }

      const single = SINGLE_DATE_PATTERN.exec(block.text);
      if (!single) {
        continue;
      }
      // A lone date under education is a graduation date; under experience a start
      if (section.kind === 'EDUCATION') {
        const end = parseDate(single[0], 'end');
        if (end) {
          spans.add(block, 'DATE_END', end.value, single[0], GRADUATION_DATE_CONFIDENCE);
        }
      } else {
        const start = parseDate(single[0], 'start');
        if (start) {
          spans.add(block, 'DATE_START', start.value, single[0], LONE_START_CONFIDENCE);
        }
      }
    }

    return spans.build();
  }
}
