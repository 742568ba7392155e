/**
 * Errors Module
 *
 * Standardized error types and logging shared by every pipeline stage.
 */

export * from './types';
export * from './logger';
