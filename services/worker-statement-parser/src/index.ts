/**
 * Statement Parser Worker
 *
 * Consumes parse_statement jobs: extracts text from the uploaded PDF (with
 * OCR fallback), identifies the issuer, extracts statement fields and
 * returns a TaskResult, which BullMQ stores as the job's return value.
 */

import {
  logger,
  config,
  toEngineConfig,
  createWorker,
  serveMetrics,
  StatementParsingEngine,
  QUEUE_NAMES,
  type ParseStatementJob,
  type TaskResult,
} from '@statement-parser/shared';
import { PdfTextAcquisition } from './lib/acquisition';
import { createStatementProcessor } from './lib/processor';

const engineConfig = toEngineConfig(config);

const engine = new StatementParsingEngine({
  config: engineConfig,
  acquisition: new PdfTextAcquisition(),
});

// Create and start the worker
const worker = createWorker<ParseStatementJob, TaskResult>(
  QUEUE_NAMES.PARSE_STATEMENT,
  createStatementProcessor(engine)
);

const metricsServer = serveMetrics(config.metricsPort);

logger.info('Statement parser worker started', {
  ocr_enabled: engineConfig.ocr.enabled,
  ocr_language: engineConfig.ocr.language,
  ocr_max_pages: engineConfig.ocr.maxPages,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
