/**
 * Task Result Envelope
 *
 * Wraps an engine outcome with the task identifier and timing the engine
 * itself does not know about.
 */

import type { ParseOutcome } from './parsing/orchestrator';
import type { ParseErrorKind } from './parsing/errors';
import type { TaskResult } from './types';

export interface TaskTiming {
  createdAt: string;
  startedAt: Date;
  completedAt: Date;
}

function timingFields(timing: TaskTiming) {
  return {
    created_at: timing.createdAt,
    started_at: timing.startedAt.toISOString(),
    completed_at: timing.completedAt.toISOString(),
    processing_time_ms: Math.max(0, timing.completedAt.getTime() - timing.startedAt.getTime()),
  };
}

export function buildTaskResult(taskId: string, outcome: ParseOutcome, timing: TaskTiming): TaskResult {
  if (outcome.ok) {
    return {
      task_id: taskId,
      status: 'SUCCESS',
      provider_identified: outcome.data.metadata.provider,
      data: outcome.data,
      error: null,
      error_kind: null,
      ...timingFields(timing),
    };
  }

  return failedTaskResult(taskId, outcome.message, outcome.errorKind, timing);
}

export function failedTaskResult(
  taskId: string,
  message: string,
  errorKind: ParseErrorKind | null,
  timing: TaskTiming
): TaskResult {
  return {
    task_id: taskId,
    status: 'FAILED',
    provider_identified: null,
    data: null,
    error: message,
    error_kind: errorKind,
    ...timingFields(timing),
  };
}

export function pendingTaskResult(
  taskId: string,
  status: 'PENDING' | 'PROCESSING',
  createdAt: string,
  startedAt: string | null = null
): TaskResult {
  return {
    task_id: taskId,
    status,
    provider_identified: null,
    data: null,
    error: null,
    error_kind: null,
    created_at: createdAt,
    started_at: startedAt,
    completed_at: null,
    processing_time_ms: null,
  };
}

/**
 * Only unexpected failures are worth another attempt; every other failure
 * kind is a property of the document and would fail again.
 */
export function shouldRetry(outcome: ParseOutcome): boolean {
  return !outcome.ok && outcome.errorKind === 'UnexpectedError';
}

export function maxRetriesMessage(lastError: string): string {
  return `Max retries exceeded. Last error: ${lastError}`;
}
