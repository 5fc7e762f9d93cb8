/**
 * Parser API entry point
 */

import {
  logger,
  config,
  createQueue,
  QUEUE_NAMES,
  type ParseStatementJob,
  type TaskResult,
} from '@statement-parser/shared';
import { createApp } from './app';

const parseStatementQueue = createQueue<ParseStatementJob, TaskResult>(QUEUE_NAMES.PARSE_STATEMENT);

if (!config.masterApiKey) {
  logger.warn('MASTER_API_KEY is not set; every API request will be rejected');
}

const app = createApp({ queue: parseStatementQueue });

const server = app.listen(config.apiPort, () => {
  logger.info('Parser API started', {
    port: config.apiPort,
    prefix: config.apiPrefix,
    max_upload_mb: config.maxUploadSizeMb,
  });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await parseStatementQueue.close();
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
