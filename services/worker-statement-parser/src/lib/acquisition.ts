/**
 * PDF Text Acquisition
 *
 * Native text layer via pdfjs-dist, OCR via pdf2pic + sharp + tesseract.
 */

import type { OcrConfig, TextAcquisition } from '@statement-parser/shared';
import { ocrDocument, type OcrPipeline } from './ocr';
import { extractTextFromPdf } from './pdf';

export class PdfTextAcquisition implements TextAcquisition {
  constructor(private readonly ocrPipeline?: OcrPipeline) {}

  async extractNativeText(document: Uint8Array): Promise<string> {
    const result = await extractTextFromPdf(document);
    return result.combinedText;
  }

  recognizeText(document: Uint8Array, ocr: OcrConfig): Promise<string> {
    return ocrDocument(document, ocr, this.ocrPipeline);
  }
}
