/**
 * Shared Field Patterns
 *
 * Value patterns used by every provider profile, plus helpers for building
 * label-anchored direct patterns. Direct patterns are compiled with the
 * `is` flags (case-insensitive, dot matches newline).
 *
 * Every value pattern exposes exactly one capture group holding the raw value.
 */

import type { FieldKind } from './types';

const MONTH = String.raw`(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*`;

/**
 * Currency amount: optional `$`, digit groups with optional commas, two decimals.
 * Examples: $1,234.56, 1234.56, $ 50.00
 */
export const AMOUNT_VALUE = String.raw`\$?\s*([\d,]*\d\.\d{2})`;

/**
 * Date: M/D/YY(YY), Month D, YYYY (optional period/comma), YYYY-MM-DD, D-M-YYYY
 */
export const DATE_VALUE =
  String.raw`(\d{1,2}/\d{1,2}/\d{2,4}|` +
  MONTH +
  String.raw`\.?\s+\d{1,2},?\s+\d{4}|\d{4}-\d{1,2}-\d{1,2}|\d{1,2}-\d{1,2}-\d{4})`;

/**
 * Masked card tail: 4+ mask characters, optional separator, four digits.
 * Examples: **** **** **** 9876, XXXX-1234, ....4321
 */
export const MASKED_CARD_VALUE = String.raw`[*xX.]{4,}[\s-]?(\d{4})\b`;

/**
 * Digits right after a card keyword ("ending in 1001", "ending: 7-71006").
 */
export const LEADING_CARD_VALUE = String.raw`^[\s:#-]*(?:in\s+)?(?:\d-)?(\d{4,5})\b`;

/**
 * Build a direct pattern: a label, optional colon/whitespace, then a value pattern.
 */
export function labelled(label: string, value: string): RegExp {
  return new RegExp(`${label}[\\s:]*${value}`, 'is');
}

/**
 * Build a direct pattern from a complete source string.
 */
export function direct(source: string): RegExp {
  return new RegExp(source, 'is');
}

/**
 * Patterns searched inside a proximity window, by field kind, in order.
 */
export const PROXIMITY_PATTERNS: Record<FieldKind, RegExp[]> = {
  date: [new RegExp(DATE_VALUE, 'i')],
  amount: [new RegExp(AMOUNT_VALUE, 'i')],
  card: [new RegExp(MASKED_CARD_VALUE), new RegExp(LEADING_CARD_VALUE, 'i')],
};

/**
 * Return the first non-empty capture group of a match, trimmed.
 */
export function firstCapture(match: RegExpMatchArray | null): string | undefined {
  if (!match) return undefined;

  for (let i = 1; i < match.length; i++) {
    const group = match[i];
    if (group !== undefined && group.trim() !== '') {
      return group.trim();
    }
  }

  return undefined;
}
