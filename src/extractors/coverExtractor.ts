import * as fs from 'fs';
import { EncryptedPDFError, PDFDocument } from 'pdf-lib';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, describeError } from '../renamer/errors.js';
import type { CoverContent } from '../renamer/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface CoverExtractor {
  extract(pdfPath: string): Promise<CoverContent>;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Reads the first page of a PDF: its text layer via PDF.js, and a
 * one-page copy via pdf-lib for covers that are mostly graphics.
 */
export class PdfCoverExtractor implements CoverExtractor {
  constructor(private readonly logger: Logger = silentLogger) {}

  async extract(pdfPath: string): Promise<CoverContent> {
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(pdfPath);
    } catch (error) {
      throw new ExtractionError('EXTRACTION_UNREADABLE', `Cannot read ${pdfPath}: ${describeError(error)}`, { cause: error });
    }

    let pdfDoc: PDFDocument;
    try {
      pdfDoc = await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
      if (error instanceof EncryptedPDFError) {
        throw new ExtractionError('EXTRACTION_ENCRYPTED', 'PDF is encrypted', { cause: error });
      }
      throw new ExtractionError('EXTRACTION_CORRUPT', `Not a readable PDF: ${describeError(error)}`, { cause: error });
    }

    const pageCount = pdfDoc.getPageCount();
    if (pageCount < 1) {
      throw new ExtractionError('EXTRACTION_NO_PAGES', 'PDF has no pages');
    }

    let coverPdf: Uint8Array;
    try {
      const coverDoc = await PDFDocument.create();
      const [coverPage] = await coverDoc.copyPages(pdfDoc, [0]);
      coverDoc.addPage(coverPage);
      coverPdf = await coverDoc.save();
    } catch (error) {
      throw new ExtractionError('EXTRACTION_CORRUPT', `Cover page could not be copied: ${describeError(error)}`, { cause: error });
    }

    const text = await this.readCoverText(bytes);
    this.logger.debug({ pageCount, textLength: text.length }, 'cover extracted');

    return { text, pageCount, coverPdf };
  }

  private async readCoverText(bytes: Buffer): Promise<string> {
    // PDF.js takes ownership of the array it is given, so hand it a copy
    const data = new Uint8Array(bytes);
    const loadingTask = pdfjsLib.getDocument({
      data,
      isEvalSupported: false,
      disableFontFace: true,
      verbosity: 0,
    });
    try {
      const doc = await loadingTask.promise;
      const page = await doc.getPage(1);
      const textContent = await page.getTextContent();
      const text = textContent.items
        .map(item => ('str' in item ? item.str : ''))
        .join(' ');
      return collapseWhitespace(text);
    } catch (error) {
      this.logger.warn({ err: error }, 'cover text layer unreadable, falling back to the page itself');
      return '';
    } finally {
      await loadingTask.destroy();
    }
  }
}
