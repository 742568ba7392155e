/**
 * Profiler Core Type Definitions
 *
 * Data models for every pipeline stage: text blocks produced by the loader,
 * sections from the segmenter, candidate spans from the extractors, the
 * synthesized profile record and its rating.
 */

// ============================================================================
// Loader Types
// ============================================================================

export interface BoundingBox {
  /** Distance from the left edge of the page */
  x: number;
  /** Distance from the top edge of the page */
  y: number;
  width: number;
  height: number;
}

export type FontSizeBucket = 'small' | 'body' | 'large' | 'title';

export interface BlockStyle {
  fontSizeBucket: FontSizeBucket;
  isBold: boolean;
  /** Largest font size on the line, in PDF units */
  fontSize: number;
}

/**
 * One line of text in document reading order
 */
export interface TextBlock {
  readonly index: number;
  readonly text: string;
  /** 1-based page number */
  readonly page: number;
  readonly bbox: Readonly<BoundingBox>;
  readonly style: Readonly<BlockStyle>;
}

export interface DocumentMetadata {
  pageCount: number;
  title?: string;
  author?: string;
}

export interface LoadedDocument {
  blocks: TextBlock[];
  metadata: DocumentMetadata;
}

// ============================================================================
// Segmenter Types
// ============================================================================

export const SECTION_KINDS = ['CONTACT', 'SUMMARY', 'EDUCATION', 'EXPERIENCE', 'SKILLS', 'OTHER'] as const;

export type SectionKind = typeof SECTION_KINDS[number];

export interface Section {
  readonly id: string;
  /** Position of the section in document order */
  readonly index: number;
  readonly kind: SectionKind;
  /** Text of the header block that opened the section, if any */
  readonly heading: string | null;
  readonly blocks: readonly TextBlock[];
  /** Block index range, end exclusive */
  readonly span: { readonly start: number; readonly end: number };
}

// ============================================================================
// Extraction Types
// ============================================================================

export const FIELD_KINDS = [
  'NAME',
  'EMAIL',
  'PHONE',
  'LOCATION',
  'LINKEDIN',
  'WEBSITE',
  'ORG',
  'TITLE',
  'DEGREE',
  'DATE_START',
  'DATE_END',
  'DESCRIPTION',
  'COURSEWORK',
  'SKILL'
] as const;

export type FieldKind = typeof FIELD_KINDS[number];

export interface SpanPosition {
  sectionIndex: number;
  blockIndex: number;
}

/**
 * A single extractor's proposal for one structured field
 */
export interface CandidateSpan {
  readonly id: string;
  readonly field: FieldKind;
  /** Normalized value */
  readonly value: string;
  readonly rawText: string;
  /** Match strength in [0, 1] */
  readonly confidence: number;
  readonly extractorId: string;
  readonly sourceSectionId: string;
  readonly sectionKind: SectionKind;
  readonly position: Readonly<SpanPosition>;
}

/** `YYYY-MM` or `PRESENT` */
export type DateValue = string;

export const PRESENT = 'PRESENT';

// ============================================================================
// Profile Types
// ============================================================================

export type Provenance = 'extracted' | 'manual';

export interface ResolvedField<T = string> {
  value: T | null;
  confidence: number;
  provenance: Provenance;
  /** Ids of the candidate spans backing the value, resolvable through the pool */
  sourceSpanIds: string[];
}

export interface ContactInfo {
  name: ResolvedField;
  email: ResolvedField;
  phone: ResolvedField;
  location: ResolvedField;
  linkedin: ResolvedField;
  website: ResolvedField;
}

export type ContactField = keyof ContactInfo;

export interface EducationEntry {
  institution: ResolvedField;
  degree: ResolvedField;
  start: ResolvedField<DateValue>;
  end: ResolvedField<DateValue>;
  /** Coursework bullets and achievements, one per line */
  coursework: ResolvedField;
  confidence: number;
}

export type EducationField = 'institution' | 'degree' | 'start' | 'end' | 'coursework';

export interface ExperienceEntry {
  organization: ResolvedField;
  title: ResolvedField;
  location: ResolvedField;
  start: ResolvedField<DateValue>;
  end: ResolvedField<DateValue>;
  description: ResolvedField;
  confidence: number;
}

export type ExperienceField = 'organization' | 'title' | 'location' | 'start' | 'end' | 'description';

export interface SkillEntry {
  term: string;
  confidence: number;
  provenance: Provenance;
  sourceSpanIds: string[];
}

export type ConflictResolution = 'AUTO_RESOLVED' | 'LEFT_UNRESOLVED';

export type ConflictReason =
  | 'value_disagreement'
  | 'below_threshold'
  | 'date_order_swapped'
  | 'date_order_invalid';

export interface ManualOverride {
  value: string | null;
  profileVersion: number;
}

export interface ConflictNote {
  /** Field path, e.g. `contact.email` or `experience.0.title` */
  field: string;
  candidateIds: string[];
  resolution: ConflictResolution;
  chosenId?: string;
  reason: ConflictReason;
  /** Manual edits that superseded this note, oldest first */
  overrides: ManualOverride[];
}

export interface TotalExperience {
  totalMonths: number;
  years: number;
  remainingMonths: number;
  formatted: string;
}

export interface ProfileRecord {
  /** Starts at 1, incremented by every manual edit */
  version: number;
  contact: ContactInfo;
  education: EducationEntry[];
  experience: ExperienceEntry[];
  skills: SkillEntry[];
  totalExperience: TotalExperience | null;
  /** Month that `PRESENT` resolves to when measuring experience */
  asOf: DateValue | null;
  unresolvedConflicts: ConflictNote[];
  needsReview: boolean;
}

// ============================================================================
// Edit Types
// ============================================================================

export type EditTarget =
  | { section: 'contact'; field: ContactField }
  | { section: 'education'; index: number; field: EducationField }
  | { section: 'experience'; index: number; field: ExperienceField }
  | { section: 'skills'; term: string };

// ============================================================================
// Rating Types
// ============================================================================

export const MISSING_REQUIRED_FIELD = 'missing_required_field';

export interface RatingExplanation {
  criterion: string;
  contributingField: string;
  weight: number;
  score: number;
  note?: string;
}

export interface Rating {
  /** Version of the profile record the rating was computed from */
  profileVersion: number;
  subScores: Record<string, number>;
  aggregate: number;
  explanation: RatingExplanation[];
}
