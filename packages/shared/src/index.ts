/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  setContextProvider,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, toEngineConfig, type Config } from './config';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ParseStatementJob,
  type QueueCounts,
  type CountableQueue,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  statementsParsedCounter,
  fieldExtractionsCounter,
  parseDurationHistogram,
  ocrPagesCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  rateLimitRejectionsCounter,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateTaskResult, type ValidationResult } from './schemas';

// Task results
export {
  buildTaskResult,
  failedTaskResult,
  pendingTaskResult,
  shouldRetry,
  maxRetriesMessage,
  type TaskTiming,
} from './task-result';

// Statement parsing engine
export * from './parsing';
