export { segment, bodyBlocks } from './segmenter';
export { classifyHeader, headerKind, looksLikeHeader, normalizeHeader } from './headers';
