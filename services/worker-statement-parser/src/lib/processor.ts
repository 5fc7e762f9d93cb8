/**
 * parse_statement Job Processor
 *
 * Decodes the uploaded document, runs the parsing engine and wraps the
 * outcome in a TaskResult. Unexpected failures are thrown back to BullMQ so
 * the job is retried; on the last attempt they become a FAILED result.
 */

import type { Job } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  buildTaskResult,
  failedTaskResult,
  maxRetriesMessage,
  shouldRetry,
  validateTaskResult,
  jobsProcessedCounter,
  jobDurationHistogram,
  QUEUE_NAMES,
  type ParseStatementJob,
  type StatementParsingEngine,
  type TaskResult,
} from '@statement-parser/shared';

export type StatementJob = Pick<
  Job<ParseStatementJob, TaskResult>,
  'id' | 'data' | 'attemptsMade' | 'opts'
>;

export class RetryableParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RetryableParseError';
  }
}

export function createStatementProcessor(engine: StatementParsingEngine) {
  return async function processParseStatement(job: StatementJob): Promise<TaskResult> {
    const { task_id, document_base64, filename, created_at } = job.data;

    return runWithContextAsync({ correlationId: task_id, taskId: task_id }, async () => {
      const startedAt = new Date();
      const attempt = job.attemptsMade + 1;
      const maxAttempts = job.opts.attempts ?? 1;

      logger.info('Processing parse_statement', {
        jobId: job.id,
        filename,
        attempt,
        max_attempts: maxAttempts,
      });

      const document = Buffer.from(document_base64, 'base64');
      const outcome = await engine.parseDocument(document, { correlationId: task_id });
      const completedAt = new Date();
      const timing = { createdAt: created_at, startedAt, completedAt };

      let result: TaskResult;
      if (!outcome.ok && shouldRetry(outcome)) {
        if (attempt < maxAttempts) {
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PARSE_STATEMENT, status: 'retry' });
          throw new RetryableParseError(outcome.message);
        }
        result = failedTaskResult(
          task_id,
          maxRetriesMessage(outcome.message),
          'UnexpectedError',
          timing
        );
      } else {
        result = buildTaskResult(task_id, outcome, timing);
      }

      const validation = validateTaskResult(result);
      if (!validation.valid) {
        logger.warn('TaskResult does not match contract', { errors: validation.errors });
      }

      const status = result.status === 'SUCCESS' ? 'success' : 'failed';
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PARSE_STATEMENT, status });
      jobDurationHistogram.observe(
        { queue: QUEUE_NAMES.PARSE_STATEMENT, status },
        (completedAt.getTime() - startedAt.getTime()) / 1000
      );

      logger.info('Task finished', {
        status: result.status,
        provider: result.provider_identified,
        error_kind: result.error_kind,
        processing_time_ms: result.processing_time_ms,
      });

      return result;
    });
  };
}
