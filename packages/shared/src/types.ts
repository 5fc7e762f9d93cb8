/**
 * Shared TypeScript Types
 *
 * Wire types for the statement parsing service, matching JSON schemas in docs/contracts/
 */

import type { FieldName, NormalizedFields, ParseWarning } from './parsing/types';
import type { ParseErrorKind } from './parsing/errors';

// ============================================================================
// Structured Statement Data
// ============================================================================

export const EXTRACTION_METHOD = 'hybrid_multi_strategy';

export interface StatementMetadata {
  provider: string;
  confidence_scores: Record<FieldName, number>;
  extraction_method: typeof EXTRACTION_METHOD;
  warnings: ParseWarning[];
}

export interface StructuredStatementData extends NormalizedFields {
  metadata: StatementMetadata;
}

// ============================================================================
// Task Results
// ============================================================================

export type TaskStatus = 'PENDING' | 'PROCESSING' | 'SUCCESS' | 'FAILED';

export interface TaskResult {
  task_id: string;
  status: TaskStatus;
  provider_identified: string | null;
  data: StructuredStatementData | null;
  error: string | null;
  error_kind: ParseErrorKind | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  processing_time_ms: number | null;
}

// ============================================================================
// API
// ============================================================================

export interface UploadAccepted {
  task_id: string;
  status: 'PENDING';
  detail: string;
  estimated_time_seconds: number;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
