/**
 * Document Loader
 *
 * Converts a PDF byte stream into ordered text blocks. Fails with
 * UNREADABLE_DOCUMENT when the bytes are not a PDF or no page yields text;
 * image-only pages simply contribute no blocks.
 */

import { loggers, serializeError } from '../../shared/logger';
import { isProfilerError, ProfilerErrorFactory } from '../errors/types';
import type { LoadedDocument, TextBlock } from '../types';
import { buildTextBlocks } from './layout';
import { PdfParseReader } from './pdfReader';
import type { PdfReader, RawDocument } from './pdfReader';

const PDF_SIGNATURE = '%PDF-';

/** The signature may be preceded by junk bytes within the first kilobyte */
const SIGNATURE_WINDOW = 1024;

export function hasPdfSignature(bytes: Uint8Array): boolean {
  const head = Buffer.from(bytes.subarray(0, SIGNATURE_WINDOW)).toString('latin1');
  return head.includes(PDF_SIGNATURE);
}

export class DocumentLoader {
  constructor(private readonly reader: PdfReader = new PdfParseReader()) {}

  /**
   * Load blocks together with document metadata
   */
  async loadDocument(bytes: Uint8Array): Promise<LoadedDocument> {
    if (bytes.length === 0) {
      throw ProfilerErrorFactory.unreadableDocument('empty byte stream');
    }
    if (!hasPdfSignature(bytes)) {
      throw ProfilerErrorFactory.unreadableDocument('not a PDF (missing %PDF- header)', {
        byteLength: bytes.length
      });
    }

    let raw: RawDocument;
    try {
      raw = await this.reader.read(Buffer.from(bytes));
    } catch (error) {
      if (isProfilerError(error)) {
        throw error;
      }
      loggers.loader.warn({ err: serializeError(error) }, 'PDF backend rejected document');
      const reason = error instanceof Error ? error.message : String(error);
      throw ProfilerErrorFactory.unreadableDocument(`invalid PDF: ${reason}`, {
        byteLength: bytes.length
      });
    }

    const blocks = buildTextBlocks(raw.pages);
    if (blocks.length === 0) {
      throw ProfilerErrorFactory.unreadableDocument('no extractable text', {
        pageCount: raw.metadata.pageCount
      });
    }

    loggers.loader.debug(
      { blockCount: blocks.length, pageCount: raw.metadata.pageCount },
      'Document loaded'
    );

    return { blocks, metadata: raw.metadata };
  }

  async load(bytes: Uint8Array): Promise<TextBlock[]> {
    const { blocks } = await this.loadDocument(bytes);
    return blocks;
  }
}

/**
 * Load a document with the default pdf-parse reader
 */
export function load(bytes: Uint8Array): Promise<TextBlock[]> {
  return new DocumentLoader().load(bytes);
}
