/**
 * OCR Image Preprocessing
 *
 * Enhances a rasterized page before recognition: grayscale, upscale of
 * low-resolution scans, contrast stretch, 3×3 median denoise, unsharp mask,
 * then a global binarization at 85% of the mean intensity.
 */

import sharp, { type Sharp } from 'sharp';
import { logger } from '@statement-parser/shared';

export const UPSCALE_BELOW_WIDTH = 1200;
export const UPSCALE_FACTOR = 1.6;
export const THRESHOLD_RATIO = 0.85;

export interface PreprocessResult {
  image: Buffer;
  width: number;
  height: number;
  upscaled: boolean;
  meanIntensity: number;
  /** Pixels strictly above this value became white */
  threshold: number;
}

export function binarizationThreshold(meanIntensity: number): number {
  return Math.floor(meanIntensity * THRESHOLD_RATIO);
}

export type SharpenStep = (pipeline: Sharp) => Sharp;

export const unsharpMask: SharpenStep = (pipeline) => pipeline.sharpen({ sigma: 1, m1: 1, m2: 2 });
const plainSharpen: SharpenStep = (pipeline) => pipeline.sharpen();

async function enhance(image: Buffer, resizeTo: number | undefined, sharpen: SharpenStep): Promise<Buffer> {
  let pipeline = sharp(image).grayscale();
  if (resizeTo !== undefined) {
    pipeline = pipeline.resize({ width: resizeTo, kernel: 'lanczos3' });
  }
  pipeline = pipeline.normalise({ lower: 0, upper: 100 }).median(3);
  return sharpen(pipeline).png().toBuffer();
}

export interface PreprocessOptions {
  sharpen?: SharpenStep;
}

export async function preprocessForOcr(
  image: Buffer,
  options: PreprocessOptions = {}
): Promise<PreprocessResult> {
  const { width } = await sharp(image).metadata();

  const upscaled = width !== undefined && width < UPSCALE_BELOW_WIDTH;
  const resizeTo = upscaled ? Math.round(width * UPSCALE_FACTOR) : undefined;

  let enhanced: Buffer;
  try {
    enhanced = await enhance(image, resizeTo, options.sharpen ?? unsharpMask);
  } catch (err) {
    logger.warn('Unsharp mask rejected, using plain sharpen', {
      error: err instanceof Error ? err.message : String(err),
    });
    enhanced = await enhance(image, resizeTo, plainSharpen);
  }

  const stats = await sharp(enhanced).stats();
  const meanIntensity = stats.channels[0]?.mean ?? 0;
  const threshold = binarizationThreshold(meanIntensity);

  // sharp whitens pixels >= its threshold, so shift by one for a strict comparison
  const { data, info } = await sharp(enhanced)
    .threshold(Math.min(255, threshold + 1))
    .png()
    .toBuffer({ resolveWithObject: true });

  logger.debug('Page preprocessed', {
    width: info.width,
    height: info.height,
    upscaled,
    mean_intensity: meanIntensity,
    threshold,
  });

  return {
    image: data,
    width: info.width,
    height: info.height,
    upscaled,
    meanIntensity,
    threshold,
  };
}
