/**
 * Text Normalization Utilities
 *
 * Cleans the raw strings pdf.js hands back before they become text blocks.
 */

const LIGATURES: Record<string, string> = {
  '\uFB00': 'ff',
  '\uFB01': 'fi',
  '\uFB02': 'fl',
  '\uFB03': 'ffi',
  '\uFB04': 'ffl'
};

/**
 * Handles encoding issues by converting to plain, UTF-8 friendly characters.
 * Dashes are kept distinct from hyphens so date ranges stay recognizable.
 */
export function handleEncoding(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/[\uFB00-\uFB04]/g, ch => LIGATURES[ch] ?? ch)
    .replace(/[\u2018\u2019]/g, "'") // Smart quotes to regular quotes
    .replace(/[\u201C\u201D]/g, '"') // Smart double quotes
    .replace(/\u2026/g, '...') // Ellipsis
    .replace(/[\u00A0\u2007\u202F]/g, ' ') // Non-breaking spaces
    .replace(/[\u200B-\u200D\uFEFF]/g, '') // Zero-width characters
    .replace(/[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g, ''); // Remove control characters
}

/**
 * Collapses runs of whitespace inside a single line
 */
export function cleanLine(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .replace(/\t/g, ' ')
    .replace(/ +/g, ' ')
    .trim();
}

/**
 * Prepares one text item for layout grouping
 */
export function normalizeItemText(text: string): string {
  return handleEncoding(text).replace(/[\r\n]+/g, ' ');
}
