export { synthesize, needsReview, latestDate, CONTACT_FIELDS } from './synthesizer';
export type { SynthesisOptions } from './synthesizer';
export { applyEdit, editPath, manualField, MANUAL_CONFIDENCE } from './edit';
export { resolveField, emptyField, TIE_EPSILON } from './resolver';
export type { FieldResolution, ResolutionOptions } from './resolver';
export { orderDates, datesCompatible, entryConfidence } from './entries';
export { calculateTotalExperience, formatDuration } from './experience';
