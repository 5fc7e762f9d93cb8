/**
 * OCR Fallback
 *
 * Rasterizes the first pages of a PDF with pdf2pic (GraphicsMagick),
 * preprocesses each page with sharp and recognizes it with tesseract.
 * A page that fails yields '' and the remaining pages continue. Missing OCR
 * tooling on the first page yields '' for the whole document; on a later
 * page, the pages recognized so far are kept.
 */

/// <reference path="../../../../types/node-tesseract-ocr.d.ts" />

import { fromBuffer } from 'pdf2pic';
import { recognize } from 'node-tesseract-ocr';
import { logger, ocrPagesCounter, type OcrConfig } from '@statement-parser/shared';
import { countPdfPages } from './pdf';
import { preprocessForOcr, type PreprocessResult } from './preprocess';

export type PageRasterizer = (pageNumber: number) => Promise<Buffer | undefined>;
export type ImageRecognizer = (image: Buffer, ocr: OcrConfig) => Promise<string>;
export type ImagePreprocessor = (image: Buffer) => Promise<PreprocessResult>;

export interface OcrPipeline {
  rasterize: PageRasterizer;
  recognize: ImageRecognizer;
  preprocess?: ImagePreprocessor;
}

const MISSING_TOOLING_PATTERN =
  /spawn \S+ ENOENT|command not found|is not recognized|binaries can't be found|Could not execute GraphicsMagick/i;

export class OcrUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OcrUnavailableError';
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingTooling(error: unknown): boolean {
  return MISSING_TOOLING_PATTERN.test(describe(error));
}

/**
 * Recognize pages 1..pageCount, isolating failures per page.
 */
export async function recognizePages(
  pageCount: number,
  pipeline: OcrPipeline,
  ocr: OcrConfig
): Promise<string> {
  const preprocess = pipeline.preprocess ?? preprocessForOcr;
  const texts: string[] = [];

  for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
    try {
      const image = await pipeline.rasterize(pageNumber);
      if (!image || image.length === 0) {
        logger.warn('Page rasterization produced no image', { page: pageNumber });
        ocrPagesCounter.inc({ status: 'empty' });
        texts.push('');
        continue;
      }

      const processed = await preprocess(image);
      const text = await pipeline.recognize(processed.image, ocr);
      ocrPagesCounter.inc({ status: 'success' });
      texts.push(text);
    } catch (error) {
      if (isMissingTooling(error)) {
        if (pageNumber === 1) {
          throw new OcrUnavailableError(`OCR tooling unavailable: ${describe(error)}`, { cause: error });
        }
        logger.warn('OCR tooling became unavailable, keeping recognized pages', {
          page: pageNumber,
          error: describe(error),
        });
        break;
      }
      logger.warn('OCR failed for page', { page: pageNumber, error: describe(error) });
      ocrPagesCounter.inc({ status: 'failed' });
      texts.push('');
    }
  }

  return texts.join('\n');
}

export function tesseractRecognizer(image: Buffer, ocr: OcrConfig): Promise<string> {
  return recognize(image, {
    lang: ocr.language,
    psm: ocr.pageSegMode,
    ...(ocr.binaryPath ? { binary: ocr.binaryPath } : {}),
  });
}

export function pdf2picRasterizer(document: Uint8Array, density: number): PageRasterizer {
  const convert = fromBuffer(Buffer.from(document), {
    density,
    format: 'png',
    preserveAspectRatio: true,
  });

  return async (pageNumber: number) => {
    const page: unknown = await convert(pageNumber, { responseType: 'buffer' });
    if (typeof page === 'object' && page !== null && 'buffer' in page && Buffer.isBuffer(page.buffer)) {
      return page.buffer;
    }
    return undefined;
  };
}

/**
 * OCR the first `ocr.maxPages` pages of a PDF.
 */
export async function ocrDocument(
  document: Uint8Array,
  ocr: OcrConfig,
  pipeline?: OcrPipeline
): Promise<string> {
  try {
    const totalPages = await countPdfPages(document);
    const pageCount = Math.min(totalPages, ocr.maxPages);

    logger.info('Running OCR', { total_pages: totalPages, pages: pageCount, language: ocr.language });

    return await recognizePages(
      pageCount,
      pipeline ?? {
        rasterize: pdf2picRasterizer(document, ocr.density),
        recognize: tesseractRecognizer,
      },
      ocr
    );
  } catch (error) {
    if (error instanceof OcrUnavailableError) {
      logger.warn('OCR capability missing, returning empty text', { error: error.message });
    } else {
      logger.error('OCR failed', error);
    }
    return '';
  }
}
