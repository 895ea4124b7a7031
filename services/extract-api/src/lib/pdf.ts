/**
 * PDF Text Extraction
 *
 * Extracts text from PDF files using pdfjs-dist.
 */

import fs from 'fs';
import path from 'path';
import { errorMessage, logger } from '@finsheet/shared';

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  combinedText: string;
}

/**
 * Positioned text run on a page (pdf.js user-space coordinates).
 */
export interface PdfTextItem {
  x: number;
  y: number;
  str: string;
}

/**
 * Page-by-page access to an opened document.
 */
export interface PdfPageSource {
  readonly numPages: number;
  getPageItems(pageNumber: number): Promise<PdfTextItem[]>;
  close(): Promise<void>;
}

async function loadPdfjs() {
  const pdfjsLib = await import('pdfjs-dist/legacy/build/pdf');

  // Configure worker for Node.js environment
  pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
    path.dirname(require.resolve('pdfjs-dist/package.json')),
    'legacy/build/pdf.worker.js'
  );

  return pdfjsLib;
}

/**
 * Open a PDF file with pdf.js.
 */
export async function openPdf(filePath: string): Promise<PdfPageSource> {
  const pdfjsLib = await loadPdfjs();
  const data = new Uint8Array(fs.readFileSync(filePath));
  const pdf = await pdfjsLib.getDocument({ data, verbosity: 0 }).promise;

  return {
    numPages: pdf.numPages,
    async getPageItems(pageNumber: number): Promise<PdfTextItem[]> {
      const page = await pdf.getPage(pageNumber);
      const textContent = await page.getTextContent();
      const items: PdfTextItem[] = [];

      for (const item of textContent.items) {
        if (!('str' in item)) continue;
        items.push({
          x: Math.round(item.transform[4]),
          y: Math.round(item.transform[5]),
          str: item.str,
        });
      }

      return items;
    },
    async close(): Promise<void> {
      await pdf.destroy();
    },
  };
}

/**
 * Rebuild page text from positioned runs, preserving line structure.
 *
 * Items sharing a (rounded) Y position form one line; lines run top to
 * bottom, items within a line left to right.
 */
export function layoutPageText(items: readonly PdfTextItem[]): string {
  const itemsByY = new Map<number, PdfTextItem[]>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    const line = itemsByY.get(item.y);
    if (line) {
      line.push(item);
    } else {
      itemsByY.set(item.y, [item]);
    }
  }

  // Sort Y positions descending (top to bottom on page)
  const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);

  const lines: string[] = [];
  for (const y of sortedYPositions) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}

/**
 * Read every page in order. A page that fails to parse contributes an empty
 * string rather than aborting the document.
 */
export async function readPdfPages(source: PdfPageSource): Promise<PdfTextResult> {
  const pages: PageText[] = [];

  for (let pageNumber = 1; pageNumber <= source.numPages; pageNumber++) {
    let text = '';
    try {
      text = layoutPageText(await source.getPageItems(pageNumber));
    } catch (error) {
      logger.warn('PDF page text extraction failed, using empty text', {
        page_number: pageNumber,
        error: errorMessage(error),
      });
    }
    pages.push({ pageNumber, text });
  }

  return {
    pages,
    totalPages: source.numPages,
    combinedText: pages.map((page) => page.text).join(''),
  };
}

export async function extractTextFromPdf(filePath: string): Promise<PdfTextResult> {
  logger.info('Extracting text from PDF', { filePath });

  const source = await openPdf(filePath);
  try {
    const result = await readPdfPages(source);

    logger.info('PDF text extraction complete', {
      filePath,
      totalPages: result.totalPages,
      totalChars: result.combinedText.length,
    });

    return result;
  } finally {
    await source.close();
  }
}
