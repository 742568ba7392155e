/**
 * Profiler Validation Module
 *
 * Exports validation utilities and schemas.
 */

export * from './validator';
export * from './schemas';

// Re-export shared validation types for convenience
export type { ValidationResult, ValidationError } from '../../shared/validation/types';
