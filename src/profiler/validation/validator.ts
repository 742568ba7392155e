/**
 * Profiler Validator Utilities
 *
 * Validation helpers built on the Zod schemas. Each validator returns the
 * shared ValidationResult, and the parse variants throw the matching
 * ProfilerError.
 */

import { z } from 'zod';
import { ValidationResult, ValidationError, validResult } from '../../shared/validation/types';
import { ProfilerErrorFactory } from '../errors/types';
import type { EditTarget } from '../types';
import { RubricSchema, EditTargetSchema } from './schemas';

export type Rubric = z.infer<typeof RubricSchema>;
export type RubricInput = z.input<typeof RubricSchema>;
export type Criterion = Rubric['criteria'][number];

/**
 * Converts Zod issues to validation errors
 */
export function zodErrorToValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));
}

/**
 * Converts Zod validation errors to ValidationResult
 */
export function zodErrorToValidationResult(error: z.ZodError): ValidationResult {
  return {
    isValid: false,
    errors: zodErrorToValidationErrors(error)
  };
}

/**
 * Rubric Validator
 */
export class RubricValidator {
  /**
   * Validates a rubric configuration
   * @returns Validation result with specific errors for each invalid field
   */
  validate(rubric: unknown): ValidationResult {
    const result = RubricSchema.safeParse(rubric);

    if (result.success) {
      return validResult();
    }

    return zodErrorToValidationResult(result.error);
  }

  /**
   * Validates and parses a rubric
   * @throws ProfilerError with code INVALID_RUBRIC
   */
  validateAndParse(rubric: unknown): Rubric {
    const result = RubricSchema.safeParse(rubric);

    if (!result.success) {
      throw ProfilerErrorFactory.invalidRubric(zodErrorToValidationErrors(result.error));
    }

    return result.data;
  }
}

/**
 * Edit Target Validator
 */
export class EditTargetValidator {
  validate(target: unknown): ValidationResult {
    const result = EditTargetSchema.safeParse(target);

    if (result.success) {
      return validResult();
    }

    return zodErrorToValidationResult(result.error);
  }

  /**
   * @throws ProfilerError with code INVALID_EDIT
   */
  validateAndParse(target: unknown): EditTarget {
    const result = EditTargetSchema.safeParse(target);

    if (!result.success) {
      const [first] = zodErrorToValidationErrors(result.error);
      throw ProfilerErrorFactory.invalidEdit(
        first?.field || 'target',
        first?.message || 'Invalid edit target',
        target
      );
    }

    return result.data;
  }
}

export const rubricValidator = new RubricValidator();
export const editTargetValidator = new EditTargetValidator();
