/**
 * Cross-Field Validation
 *
 * Plausibility checks over normalized fields. Failures become warnings and
 * never change the values.
 */

import { logger } from '../logger';
import type { NormalizedFields, ParseWarning } from './types';

const CARD_DIGITS_PATTERN = /^\d{4}$/;

export function validateFields(fields: NormalizedFields): ParseWarning[] {
  const warnings: ParseWarning[] = [];

  // ISO dates compare lexically
  if (
    fields.statement_end_date &&
    fields.payment_due_date &&
    fields.payment_due_date <= fields.statement_end_date
  ) {
    warnings.push({
      kind: 'ValidationWarning',
      field: 'payment_due_date',
      message: `Payment due date ${fields.payment_due_date} is not after statement end date ${fields.statement_end_date}`,
    });
  }

  if (
    fields.min_payment_due !== null &&
    fields.total_balance !== null &&
    fields.min_payment_due > fields.total_balance
  ) {
    warnings.push({
      kind: 'ValidationWarning',
      field: 'min_payment_due',
      message: `Minimum payment ${fields.min_payment_due} exceeds total balance ${fields.total_balance}`,
    });
  }

  if (fields.card_last_4_digits !== null && !CARD_DIGITS_PATTERN.test(fields.card_last_4_digits)) {
    warnings.push({
      kind: 'ValidationWarning',
      field: 'card_last_4_digits',
      message: `Card digits "${fields.card_last_4_digits}" are not exactly 4 numeric characters`,
    });
  }

  for (const warning of warnings) {
    logger.warn('Validation warning', { field: warning.field, detail: warning.message });
  }

  return warnings;
}
