/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * The parsing engine never reads this object directly: workers derive an
 * EngineConfig with toEngineConfig() and pass it in at construction.
 */

import type { EngineConfig } from './parsing/types';

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // Backpressure Controls
  maxQueueDepthWarning: number;
  maxQueueDepthReject: number;

  // HTTP
  apiPort: number;
  metricsPort: number;
  apiPrefix: string;
  maxUploadSizeMb: number;

  // Security
  masterApiKey: string;
  apiKeyHeaderName: string;
  rateLimitPerMinute: number;

  // OCR
  ocrEnabled: boolean;
  tesseractPath: string | undefined;
  ocrLanguage: string;
  ocrPageSegMode: string;
  ocrMaxPages: number;
  ocrDensity: number;

  // Extraction
  proximityWindow: number;
  classifierWindow: number;
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.MAX_JOB_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // Backpressure Controls
  maxQueueDepthWarning: parseInt(process.env.MAX_QUEUE_DEPTH_WARNING || '500', 10),
  maxQueueDepthReject: parseInt(process.env.MAX_QUEUE_DEPTH_REJECT || '1000', 10),

  // HTTP
  apiPort: parseInt(process.env.PORT || '8000', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),
  apiPrefix: process.env.API_PREFIX || '/api/v1',
  maxUploadSizeMb: parseInt(process.env.MAX_UPLOAD_SIZE_MB || '10', 10),

  // Security
  masterApiKey: process.env.MASTER_API_KEY || '',
  apiKeyHeaderName: process.env.API_KEY_HEADER_NAME || 'X-API-Key',
  rateLimitPerMinute: parseInt(process.env.RATE_LIMIT_PER_MINUTE || '60', 10),

  // OCR
  ocrEnabled: process.env.TESSERACT_OCR_ENABLED !== 'false',
  tesseractPath: process.env.TESSERACT_PATH || undefined,
  ocrLanguage: process.env.OCR_LANGUAGE || 'eng',
  ocrPageSegMode: process.env.OCR_PAGE_SEG_MODE || '6',
  ocrMaxPages: parseInt(process.env.OCR_MAX_PAGES || '3', 10),
  ocrDensity: parseInt(process.env.OCR_DENSITY || '300', 10),

  // Extraction
  proximityWindow: parseInt(process.env.PROXIMITY_WINDOW || '150', 10),
  classifierWindow: parseInt(process.env.CLASSIFIER_WINDOW || '3000', 10),
};

/**
 * Derive the engine's configuration value object from process configuration.
 */
export function toEngineConfig(source: Config = config): EngineConfig {
  return {
    ocr: {
      enabled: source.ocrEnabled,
      binaryPath: source.tesseractPath,
      language: source.ocrLanguage,
      pageSegMode: source.ocrPageSegMode,
      maxPages: source.ocrMaxPages,
      density: source.ocrDensity,
    },
    proximityWindow: source.proximityWindow,
    classifierWindow: source.classifierWindow,
  };
}
