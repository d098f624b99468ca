import type { Logger } from '../obs/logger';
import { describeError } from '../obs/logger';

export type TextExtractor = (content: Uint8Array) => Promise<string>;

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

let pdfJsPromise: Promise<PdfJs> | null = null;

const loadPdfJs = async (): Promise<PdfJs> => {
  if (pdfJsPromise == null) {
    pdfJsPromise = import('pdfjs-dist/legacy/build/pdf.mjs');
  }
  return pdfJsPromise;
};

interface TextLike {
  str: string;
  hasEOL?: boolean;
}

const isTextLike = (value: unknown): value is TextLike =>
  value != null && typeof value === 'object' && 'str' in value && typeof value.str === 'string';

const buildPageText = (items: readonly unknown[]): string => {
  const parts: string[] = [];
  for (const item of items) {
    if (!isTextLike(item)) continue;
    parts.push(item.str.replace(/\0/g, ''));
    if (item.hasEOL === true) parts.push('\n');
  }
  return parts.join('');
};

/**
 * Page-ordered text of a PDF. A document that cannot be parsed yields ''.
 */
export const createPdfTextExtractor = (logger: Logger): TextExtractor => async (content) => {
  try {
    const pdfJs = await loadPdfJs();
    // pdf.js may transfer the buffer it is given, so hand it a copy
    const pdf = await pdfJs.getDocument({ data: new Uint8Array(content), isEvalSupported: false }).promise;
    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const textContent = await page.getTextContent();
        pages.push(buildPageText(textContent.items));
      }
      return pages.join('\n');
    } finally {
      await pdf.destroy();
    }
  } catch (error) {
    logger.warn('PDF text extraction failed', { error: describeError(error), bytes: content.byteLength });
    return '';
  }
};
