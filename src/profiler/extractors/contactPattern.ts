/**
 * Contact Pattern Extractor
 *
 * Strict regular expressions for email addresses, phone numbers, LinkedIn
 * profiles and personal websites.
 */

import { bodyBlocks } from '../segmenter/segmenter';
import type { CandidateSpan, Section } from '../types';
import { normalizeEmail, normalizePhone, normalizeUrl, phoneDigitCount } from './normalize';
import { SpanBuilder } from './spanBuilder';
import type { Extractor } from './types';

export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}/g;

export const PHONE_PATTERN = /(?:\+\d{1,3}[\s.-]?)?(?:\(\d{1,4}\)[\s.-]?)?\d{2,4}(?:[\s.-]?\d{2,5}){1,3}/g;

const LINKEDIN_PATTERN = /(?:https?:\/\/)?(?:[a-z]{2,3}\.)?linkedin\.com\/(?:in|pub)\/([A-Za-z0-9_-]+)\/?/gi;

const WEBSITE_PATTERN = /(?<![@\w.])(?:https?:\/\/)?(?:www\.)?[a-z0-9-]+(?:\.[a-z0-9-]+)*\.(?:com|io|dev|me|net|org|co|app|site|tech|ai|page)(?:\/[^\s,;|]*)?/gi;

/** Two years joined by a dash are a date range, not a phone number */
const YEAR_RANGE = /^\d{4}\s*[-.]\s*\d{4}$/;

const STRICT_EMAIL_CONFIDENCE = 1.0;
const FULL_PHONE_CONFIDENCE = 0.9;
const SHORT_PHONE_CONFIDENCE = 0.7;
const FULL_PHONE_DIGITS = 10;
const LINKEDIN_CONFIDENCE = 1.0;
const WEBSITE_CONFIDENCE = 0.8;

function mask(text: string, pattern: RegExp): string {
  return text.replace(pattern, match => ' '.repeat(match.length));
}

export class ContactPatternExtractor implements Extractor {
  readonly id = 'contact-pattern';
  readonly kinds = ['CONTACT', 'OTHER'] as const;
  readonly fields = ['EMAIL', 'PHONE', 'LINKEDIN', 'WEBSITE'] as const;

  extract(section: Section): CandidateSpan[] {
    const spans = new SpanBuilder(this.id, section);

    for (const block of bodyBlocks(section)) {
      const text = block.text;

      for (const match of text.matchAll(EMAIL_PATTERN)) {
        const email = normalizeEmail(match[0]);
        if (email) {
          spans.add(block, 'EMAIL', email, match[0], STRICT_EMAIL_CONFIDENCE);
        }
      }

      for (const match of text.matchAll(LINKEDIN_PATTERN)) {
        spans.add(block, 'LINKEDIN', `linkedin.com/in/${match[1].toLowerCase()}`, match[0], LINKEDIN_CONFIDENCE);
      }

      const withoutEmails = mask(text, EMAIL_PATTERN);
      const withoutLinks = mask(withoutEmails, LINKEDIN_PATTERN);

      for (const match of withoutLinks.matchAll(WEBSITE_PATTERN)) {
        spans.add(block, 'WEBSITE', normalizeUrl(match[0]), match[0], WEBSITE_CONFIDENCE);
      }

      const withoutUrls = mask(withoutLinks, WEBSITE_PATTERN);
      for (const match of withoutUrls.matchAll(PHONE_PATTERN)) {
        const raw = match[0].trim();
        if (YEAR_RANGE.test(raw)) {
          continue;
        }
        const phone = normalizePhone(raw);
        if (phone) {
          const confidence = phoneDigitCount(phone) >= FULL_PHONE_DIGITS
            ? FULL_PHONE_CONFIDENCE
            : SHORT_PHONE_CONFIDENCE;
          spans.add(block, 'PHONE', phone, raw, confidence);
        }
      }
    }

    return spans.build();
  }
}
