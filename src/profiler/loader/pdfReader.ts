/**
 * PDF Reader
 *
 * Reads a PDF into positioned text items per page. The layout step works on
 * this raw form, so any backend able to report text positions can stand in
 * for pdf-parse.
 */

import { PdfInfoSchema, PdfPageSchema, PdfTextContentSchema, PdfTextItemSchema } from '../validation/schemas';

export interface RawTextItem {
  text: string;
  /** Left edge in page units */
  x: number;
  /** Top edge, measured from the top of the page */
  top: number;
  width: number;
  height: number;
  fontSize: number;
  /** Font name and family, used for bold detection */
  fontName: string;
}

export interface RawPage {
  /** 1-based */
  pageNumber: number;
  width: number;
  height: number;
  items: RawTextItem[];
}

export interface RawDocument {
  pages: RawPage[];
  metadata: {
    pageCount: number;
    title?: string;
    author?: string;
  };
}

export interface PdfReader {
  read(bytes: Buffer): Promise<RawDocument>;
}

/**
 * Convert one page's text content into raw items.
 * Returns null when the page does not have the expected shape.
 */
export function toRawPage(page: unknown, content: unknown): RawPage | null {
  const pageResult = PdfPageSchema.safeParse(page);
  const contentResult = PdfTextContentSchema.safeParse(content);
  if (!pageResult.success || !contentResult.success) {
    return null;
  }

  const [x0, y0, x1, y1] = pageResult.data.view;
  const pageHeight = y1 - y0;
  const styles = contentResult.data.styles;
  const items: RawTextItem[] = [];

  for (const candidate of contentResult.data.items) {
    const parsed = PdfTextItemSchema.safeParse(candidate);
    // Marked-content entries carry no text
    if (!parsed.success || parsed.data.str.trim() === '') {
      continue;
    }

    const { str, transform, width, height, fontName } = parsed.data;
    const fontSize = Math.hypot(transform[2], transform[3]) || height || 1;
    const baseline = pageHeight - (transform[5] - y0);
    const family = styles[fontName]?.fontFamily ?? '';

    items.push({
      text: str,
      x: transform[4] - x0,
      top: baseline - fontSize,
      width,
      height: height || fontSize,
      fontSize,
      fontName: family ? `${fontName} ${family}` : fontName
    });
  }

  return {
    pageNumber: pageResult.data.pageNumber,
    width: x1 - x0,
    height: pageHeight,
    items
  };
}

/**
 * Default reader backed by pdf-parse (pdf.js).
 *
 * pdf-parse's entry module runs a self-test against a bundled sample file
 * whenever `module.parent` is unset, as happens under loaders that bypass
 * CommonJS `require`. It is loaded on first use so that importing this module
 * never evaluates that entry.
 */
export class PdfParseReader implements PdfReader {
  async read(bytes: Buffer): Promise<RawDocument> {
    const { default: pdfParse } = await import('pdf-parse');
    const pages: RawPage[] = [];

    const result = await pdfParse(bytes, {
      pagerender: pageData =>
        pageData.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: true })
          .then((content: unknown) => {
            const page = toRawPage(pageData, content);
            if (page) {
              pages.push(page);
            }
            return '';
          })
    });

    const info = PdfInfoSchema.safeParse(result.info);
    const title = info.success ? info.data.Title?.trim() : undefined;
    const author = info.success ? info.data.Author?.trim() : undefined;

    return {
      pages: pages.sort((a, b) => a.pageNumber - b.pageNumber),
      metadata: {
        pageCount: result.numpages,
        ...(title ? { title } : {}),
        ...(author ? { author } : {})
      }
    };
  }
}
