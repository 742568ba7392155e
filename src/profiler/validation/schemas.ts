/**
 * Profiler Validation Schemas
 *
 * Zod schemas for rubric configuration, configuration overrides, manual edit
 * targets and the text content handed back by the PDF backend.
 */

import { z } from 'zod';

// ============================================================================
// Rubric Schemas
// ============================================================================

export const REQUIRED_FIELD_NAMES = [
  'contact.name',
  'contact.email',
  'contact.phone',
  'years_of_experience',
  'education',
  'experience',
  'skills'
] as const;

export const RequiredFieldSchema = z.enum(REQUIRED_FIELD_NAMES);

export const DEGREE_LEVELS = ['doctorate', 'master', 'bachelor', 'associate', 'diploma', 'secondary'] as const;

export const DegreeLevelSchema = z.enum(DEGREE_LEVELS);

const score = z.number().finite('Score must be a valid number').min(0).max(1, 'Score must be between 0 and 1');

export const DEFAULT_EXPERIENCE_THRESHOLDS = [
  { years: 1, score: 0.25 },
  { years: 3, score: 0.5 },
  { years: 5, score: 0.75 },
  { years: 8, score: 1 }
];

export const DEFAULT_DEGREE_SCORES: Record<z.infer<typeof DegreeLevelSchema>, number> = {
  doctorate: 1,
  master: 0.85,
  bachelor: 0.7,
  associate: 0.5,
  diploma: 0.4,
  secondary: 0.2
};

const criterionBase = {
  name: z.string().trim().min(1, 'Criterion name is required'),
  weight: z.number().finite('Weight must be a valid number').min(0, 'Weight must be non-negative').max(1, 'Weight must not exceed 1'),
  requiredFields: z.array(RequiredFieldSchema).default([])
};

export const YearsOfExperienceCriterionSchema = z.object({
  ...criterionBase,
  scoring: z.literal('years_of_experience'),
  params: z.object({
    thresholds: z.array(z.object({
      years: z.number().finite().min(0, 'Threshold years must be non-negative'),
      score
    })).min(1, 'At least one threshold is required')
  }).default({ thresholds: DEFAULT_EXPERIENCE_THRESHOLDS })
});

export const SkillCoverageCriterionSchema = z.object({
  ...criterionBase,
  scoring: z.literal('skill_coverage'),
  params: z.object({
    targetSkills: z.array(z.string().trim().min(1)).min(1, 'At least one target skill is required')
  })
});

export const EducationLevelCriterionSchema = z.object({
  ...criterionBase,
  scoring: z.literal('education_level'),
  params: z.object({
    levels: z.record(DegreeLevelSchema, score)
  }).default({ levels: DEFAULT_DEGREE_SCORES })
});

export const ContactCompletenessCriterionSchema = z.object({
  ...criterionBase,
  scoring: z.literal('contact_completeness'),
  params: z.object({}).default({})
});

export const ExtractionConfidenceCriterionSchema = z.object({
  ...criterionBase,
  scoring: z.literal('extraction_confidence'),
  params: z.object({}).default({})
});

export const CriterionSchema = z.discriminatedUnion('scoring', [
  YearsOfExperienceCriterionSchema,
  SkillCoverageCriterionSchema,
  EducationLevelCriterionSchema,
  ContactCompletenessCriterionSchema,
  ExtractionConfidenceCriterionSchema
]);

/** Tolerance for floating point weight sums */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

export const RubricSchema = z.object({
  name: z.string().trim().min(1).default('default'),
  criteria: z.array(CriterionSchema).min(1, 'At least one criterion is required')
}).superRefine((rubric, ctx) => {
  const seen = new Set<string>();
  rubric.criteria.forEach((criterion, index) => {
    if (seen.has(criterion.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['criteria', index, 'name'],
        message: `Duplicate criterion name "${criterion.name}"`
      });
    }
    seen.add(criterion.name);
  });

  const weightSum = rubric.criteria.reduce((sum, criterion) => sum + criterion.weight, 0);
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['criteria'],
      message: `Weights must sum to 1.0 (current sum: ${Number(weightSum.toFixed(6))})`
    });
  }
});

// ============================================================================
// Configuration Schemas
// ============================================================================

const unitInterval = z.number().finite().min(0).max(1);

export const ProfilerConfigSchema = z.object({
  synthesis: z.object({
    resolutionThreshold: unitInterval,
    swapPenalty: unitInterval
  }),
  extraction: z.object({
    fuzzyMatchThreshold: unitInterval
  }),
  processing: z.object({
    concurrency: z.number().int().min(1, 'Must be at least 1'),
    rubricPath: z.string().trim().min(1, 'Rubric path is required')
  }),
  logging: z.object({
    enabled: z.boolean(),
    maxLogs: z.number().int().min(1, 'Must be at least 1')
  })
});

// ============================================================================
// Edit Schemas
// ============================================================================

const entryIndex = z.number().int().min(0, 'Index must be non-negative');

export const EditTargetSchema = z.discriminatedUnion('section', [
  z.object({
    section: z.literal('contact'),
    field: z.enum(['name', 'email', 'phone', 'location', 'linkedin', 'website'])
  }),
  z.object({
    section: z.literal('education'),
    index: entryIndex,
    field: z.enum(['institution', 'degree', 'start', 'end', 'coursework'])
  }),
  z.object({
    section: z.literal('experience'),
    index: entryIndex,
    field: z.enum(['organization', 'title', 'location', 'start', 'end', 'description'])
  }),
  z.object({
    section: z.literal('skills'),
    term: z.string().trim().min(1, 'Skill term is required')
  })
]);

export const EditValueSchema = z.string().nullable();

// ============================================================================
// PDF Text Content Schemas
// ============================================================================

/**
 * One entry of a page's text content as reported by pdf.js
 */
export const PdfTextItemSchema = z.object({
  str: z.string(),
  transform: z.array(z.number()).length(6),
  width: z.number(),
  height: z.number(),
  fontName: z.string().default('')
});

export const PdfTextContentSchema = z.object({
  items: z.array(z.unknown()),
  styles: z.record(z.object({ fontFamily: z.string().default('') }).passthrough()).default({})
});

export const PdfPageSchema = z.object({
  pageNumber: z.number().int().positive(),
  view: z.array(z.number()).length(4)
});

export const PdfInfoSchema = z.object({
  Title: z.string().optional(),
  Author: z.string().optional()
}).passthrough();
