/**
 * PDF Text Extraction
 *
 * Extracts the native text layer from PDF bytes using pdfjs-dist.
 */

import * as pdfjsLib from 'pdfjs-dist';
import { logger } from '@statement-parser/shared';

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  combinedText: string;
}

function loadPdf(data: Uint8Array) {
  // pdfjs transfers the buffer it is given, so hand it a copy
  return pdfjsLib.getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;
}

/**
 * Extract text from PDF bytes, preserving line structure.
 *
 * Groups text items by Y position so that a label and its value printed on
 * the same visual line stay on one text line.
 */
export async function extractTextFromPdf(data: Uint8Array): Promise<PdfTextResult> {
  const pdf = await loadPdf(data);

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Group text items by Y position to preserve line structure
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        // Round Y position to group items on the same line
        // (text on the same visual line may have slight Y variations)
        const y = Math.round(Number(item.transform[5]));
        const x = Math.round(Number(item.transform[4]));

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
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

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
      page.cleanup();
    }

    const combinedText = pages.map((page) => page.text).join('\n');

    logger.info('PDF text extraction complete', {
      totalPages: pdf.numPages,
      totalChars: combinedText.length,
    });

    return { pages, totalPages: pdf.numPages, combinedText };
  } finally {
    await pdf.destroy();
  }
}

/**
 * Page count, used to bound rasterization for OCR.
 */
export async function countPdfPages(data: Uint8Array): Promise<number> {
  const pdf = await loadPdf(data);
  try {
    return pdf.numPages;
  } finally {
    await pdf.destroy();
  }
}
