/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for task results returned by the worker.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Compiled lazily on first use
let taskResultValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (typeof parsed === 'object' && parsed !== null) {
        return parsed;
      }
      logger.warn(`Schema file is not a JSON object: ${schemaPath}`);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getTaskResultValidator(): ValidateFunction {
  if (!taskResultValidator) {
    taskResultValidator = ajv.compile(loadSchema('task_result.schema.json'));
  }
  return taskResultValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a TaskResult against task_result.schema.json
 */
export function validateTaskResult(data: unknown): ValidationResult {
  const validate = getTaskResultValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('TaskResult validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
