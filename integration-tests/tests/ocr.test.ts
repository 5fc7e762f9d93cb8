/**
 * OCR Fallback Tests
 *
 * Page isolation, the page limit and missing-tooling handling, with
 * stand-ins for the rasterizer and the recognizer.
 */

/// <reference path="../../types/node-tesseract-ocr.d.ts" />

import { recognize as tesseractRecognize } from 'node-tesseract-ocr';
import { DEFAULT_ENGINE_CONFIG } from '@statement-parser/shared';
import {
  ocrDocument,
  OcrUnavailableError,
  recognizePages,
  tesseractRecognizer,
  type OcrPipeline,
} from '../../services/worker-statement-parser/src/lib/ocr';
import type { PreprocessResult } from '../../services/worker-statement-parser/src/lib/preprocess';
import { buildPdf } from './helpers';

jest.mock('node-tesseract-ocr', () => ({
  recognize: jest.fn(async () => 'recognized'),
}));

const ocr = DEFAULT_ENGINE_CONFIG.ocr;

async function passThrough(image: Buffer): Promise<PreprocessResult> {
  return { image, width: 1, height: 1, upscaled: false, meanIntensity: 0, threshold: 0 };
}

function pipeline(overrides: Partial<OcrPipeline> = {}): OcrPipeline {
  return {
    rasterize: async (pageNumber) => Buffer.from(`page-${pageNumber}`),
    recognize: async (image) => `text:${image.toString()}`,
    preprocess: passThrough,
    ...overrides,
  };
}

describe('recognizePages', () => {
  it('joins page texts with newlines', async () => {
    await expect(recognizePages(2, pipeline(), ocr)).resolves.toBe('text:page-1\ntext:page-2');
  });

  it('yields an empty page when rasterization produces nothing', async () => {
    const text = await recognizePages(
      3,
      pipeline({
        rasterize: async (pageNumber) => (pageNumber === 2 ? undefined : Buffer.from(`page-${pageNumber}`)),
      }),
      ocr
    );

    expect(text).toBe('text:page-1\n\ntext:page-3');
  });

  it('keeps going after a page fails', async () => {
    const text = await recognizePages(
      2,
      pipeline({
        rasterize: async (pageNumber) => {
          if (pageNumber === 1) throw new Error('corrupt page');
          return Buffer.from(`page-${pageNumber}`);
        },
      }),
      ocr
    );

    expect(text).toBe('\ntext:page-2');
  });

  it('passes the OCR settings to the recognizer', async () => {
    const recognize = jest.fn(async () => 'ok');

    await recognizePages(1, pipeline({ recognize }), ocr);

    expect(recognize).toHaveBeenCalledWith(Buffer.from('page-1'), ocr);
  });

  it('stops when the OCR binary is missing', async () => {
    const missing = pipeline({
      recognize: async () => {
        throw new Error('spawn tesseract ENOENT');
      },
    });

    await expect(recognizePages(2, missing, ocr)).rejects.toBeInstanceOf(OcrUnavailableError);
  });

  it('keeps recognized pages when the tooling disappears mid-document', async () => {
    const text = await recognizePages(
      3,
      pipeline({
        recognize: async (image) => {
          if (image.toString() === 'page-2') throw new Error('spawn tesseract ENOENT');
          return `text:${image.toString()}`;
        },
      }),
      ocr
    );

    expect(text).toBe('text:page-1');
  });

  it('treats a missing page file as a page failure', async () => {
    const text = await recognizePages(
      2,
      pipeline({
        rasterize: async (pageNumber) => {
          if (pageNumber === 1) throw new Error("ENOENT: no such file or directory, open '/tmp/page.1.png'");
          return Buffer.from(`page-${pageNumber}`);
        },
      }),
      ocr
    );

    expect(text).toBe('\ntext:page-2');
  });
});

describe('tesseractRecognizer', () => {
  const recognizeMock = jest.mocked(tesseractRecognize);

  beforeEach(() => {
    recognizeMock.mockClear();
  });

  it('passes language and page segmentation mode through', async () => {
    const image = Buffer.from('image');

    await expect(tesseractRecognizer(image, { ...ocr, language: 'eng+spa', pageSegMode: '4' })).resolves.toBe(
      'recognized'
    );

    expect(recognizeMock).toHaveBeenCalledWith(image, { lang: 'eng+spa', psm: '4' });
  });

  it('passes a custom binary path', async () => {
    const image = Buffer.from('image');

    await tesseractRecognizer(image, { ...ocr, binaryPath: '/opt/tesseract/bin/tesseract' });

    expect(recognizeMock).toHaveBeenCalledWith(image, {
      lang: 'eng',
      psm: '6',
      binary: '/opt/tesseract/bin/tesseract',
    });
  });
});

describe('ocrDocument', () => {
  it('returns empty text for bytes that are not a PDF', async () => {
    const recognize = jest.fn(async () => 'should not run');

    await expect(ocrDocument(Buffer.from('not a pdf'), ocr, pipeline({ recognize }))).resolves.toBe('');
    expect(recognize).not.toHaveBeenCalled();
  });

  it('rasterizes no more pages than the page limit', async () => {
    const pdf = buildPdf([1, 2, 3, 4, 5].map((page) => [`Page ${page}`]));
    const rasterize = jest.fn(async (pageNumber: number) => Buffer.from(`page-${pageNumber}`));

    const text = await ocrDocument(pdf, { ...ocr, maxPages: 3 }, pipeline({ rasterize }));

    expect(rasterize.mock.calls.map(([pageNumber]) => pageNumber)).toEqual([1, 2, 3]);
    expect(text).toBe('text:page-1\ntext:page-2\ntext:page-3');
  });

  it('stops at the last page of short documents', async () => {
    const pdf = buildPdf([['Only page']]);
    const rasterize = jest.fn(async (pageNumber: number) => Buffer.from(`page-${pageNumber}`));

    await expect(ocrDocument(pdf, ocr, pipeline({ rasterize }))).resolves.toBe('text:page-1');
    expect(rasterize).toHaveBeenCalledTimes(1);
  });
});
