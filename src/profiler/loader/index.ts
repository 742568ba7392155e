export { DocumentLoader, hasPdfSignature, load } from './documentLoader';
export { buildTextBlocks, bucketFontSize, isBoldFont, COLUMN_SEPARATOR } from './layout';
export { PdfParseReader, toRawPage } from './pdfReader';
export type { PdfReader, RawDocument, RawPage, RawTextItem } from './pdfReader';
export { handleEncoding } from './textNormalizer';
