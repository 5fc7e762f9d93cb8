/**
 * Task Status
 *
 * Maps a BullMQ job onto the TaskResult the API returns. Completed jobs
 * carry the worker's TaskResult as their return value.
 */

import {
  failedTaskResult,
  pendingTaskResult,
  type ParseStatementJob,
  type TaskResult,
} from '@statement-parser/shared';

/**
 * The parts of a BullMQ job the API reads.
 */
export interface TaskJob {
  id?: string;
  data: ParseStatementJob;
  returnvalue: TaskResult | null;
  failedReason?: string;
  timestamp: number;
  processedOn?: number;
  finishedOn?: number;
  getState(): Promise<string>;
}

function isoOrNull(epochMs: number | undefined): string | null {
  return epochMs === undefined ? null : new Date(epochMs).toISOString();
}

/**
 * Returns null when the job no longer exists in the queue.
 */
export async function taskResultFromJob(taskId: string, job: TaskJob): Promise<TaskResult | null> {
  const state = await job.getState();
  const createdAt = job.data.created_at;

  switch (state) {
    case 'completed':
      if (job.returnvalue) return job.returnvalue;
      return failedTaskResult(taskId, 'Task completed without a result', null, {
        createdAt,
        startedAt: new Date(job.processedOn ?? job.timestamp),
        completedAt: new Date(job.finishedOn ?? job.timestamp),
      });

    case 'failed':
      return failedTaskResult(taskId, job.failedReason || 'Task failed', null, {
        createdAt,
        startedAt: new Date(job.processedOn ?? job.timestamp),
        completedAt: new Date(job.finishedOn ?? job.processedOn ?? job.timestamp),
      });

    case 'active':
      return pendingTaskResult(taskId, 'PROCESSING', createdAt, isoOrNull(job.processedOn));

    // Retries wait out their backoff as delayed jobs
    case 'delayed':
    case 'waiting':
    case 'prioritized':
    case 'waiting-children':
      return pendingTaskResult(taskId, 'PENDING', createdAt);

    default:
      return null;
  }
}
