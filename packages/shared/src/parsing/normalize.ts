/**
 * Value Normalization
 *
 * Converts raw matched strings into typed values. Unparseable input yields
 * undefined, never an error.
 */

import type { FieldExtraction, FieldName, NormalizedFields } from './types';

// ============================================================================
// Dates
// ============================================================================

const MONTH_ABBREVIATIONS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

interface DateParts {
  year: number;
  month: number;
  day: number;
}

interface DateFormat {
  name: string;
  pattern: RegExp;
  parts: (match: RegExpMatchArray) => DateParts | undefined;
}

/**
 * Two-digit years pivot like POSIX strptime: 00-68 → 20xx, 69-99 → 19xx.
 */
function expandYear(twoDigits: string): number {
  const year = parseInt(twoDigits, 10);
  return year <= 68 ? 2000 + year : 1900 + year;
}

function monthFromName(name: string, names: string[]): number | undefined {
  const index = names.indexOf(name.toLowerCase());
  if (index !== -1) return index + 1;
  // "Sept" is common enough on statements to accept as an abbreviation
  if (names === MONTH_ABBREVIATIONS && name.toLowerCase() === 'sept') return 9;
  return undefined;
}

function textual(names: string[]) {
  return (m: RegExpMatchArray): DateParts | undefined => {
    const month = monthFromName(m[1], names);
    if (month === undefined) return undefined;
    return { year: parseInt(m[3], 10), month, day: parseInt(m[2], 10) };
  };
}

const SLASHED_SHORT = /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/;
const SLASHED_LONG = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const TEXTUAL = /^([A-Za-z]+)\s+(\d{1,2})\s+(\d{4})$/;

/**
 * Tried in order; the first format that yields a valid calendar date wins.
 * Month-first (US) orderings precede day-first ones.
 */
export const DATE_FORMATS: readonly DateFormat[] = [
  {
    name: 'M/D/YY',
    pattern: SLASHED_SHORT,
    parts: (m) => ({ month: parseInt(m[1], 10), day: parseInt(m[2], 10), year: expandYear(m[3]) }),
  },
  {
    name: 'M/D/YYYY',
    pattern: SLASHED_LONG,
    parts: (m) => ({ month: parseInt(m[1], 10), day: parseInt(m[2], 10), year: parseInt(m[3], 10) }),
  },
  {
    name: 'D/M/YY',
    pattern: SLASHED_SHORT,
    parts: (m) => ({ day: parseInt(m[1], 10), month: parseInt(m[2], 10), year: expandYear(m[3]) }),
  },
  {
    name: 'D/M/YYYY',
    pattern: SLASHED_LONG,
    parts: (m) => ({ day: parseInt(m[1], 10), month: parseInt(m[2], 10), year: parseInt(m[3], 10) }),
  },
  { name: 'Mon D YYYY', pattern: TEXTUAL, parts: textual(MONTH_ABBREVIATIONS) },
  { name: 'Month D YYYY', pattern: TEXTUAL, parts: textual(MONTH_NAMES) },
  {
    name: 'YYYY-M-D',
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    parts: (m) => ({ year: parseInt(m[1], 10), month: parseInt(m[2], 10), day: parseInt(m[3], 10) }),
  },
  {
    name: 'D-M-YYYY',
    pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/,
    parts: (m) => ({ day: parseInt(m[1], 10), month: parseInt(m[2], 10), year: parseInt(m[3], 10) }),
  },
];

function isCalendarDate({ year, month, day }: DateParts): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function toIsoDate({ year, month, day }: DateParts): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parse a raw date string into ISO YYYY-MM-DD.
 */
export function normalizeDate(raw: string | undefined): string | undefined {
  if (!raw) return undefined;

  const cleaned = raw.replace(/[.,]/g, '').replace(/\s+/g, ' ').trim();

  for (const format of DATE_FORMATS) {
    const match = cleaned.match(format.pattern);
    if (!match) continue;

    const parts = format.parts(match);
    if (parts && isCalendarDate(parts)) {
      return toIsoDate(parts);
    }
  }

  return undefined;
}

// ============================================================================
// Amounts
// ============================================================================

const NUMERIC = /^-?(?:\d+\.?\d*|\.\d+)$/;

/**
 * Strip `$`, commas and whitespace, then round to cents.
 */
export function normalizeAmount(raw: string | undefined): number | undefined {
  if (!raw) return undefined;

  const cleaned = raw.replace(/[$,\s]/g, '');
  if (!NUMERIC.test(cleaned)) return undefined;

  return Math.round(parseFloat(cleaned) * 100) / 100;
}

// ============================================================================
// Card Digits
// ============================================================================

/**
 * Keep the last four digits. Fewer than four are returned as-is and left for
 * validation to flag.
 */
export function normalizeCardDigits(raw: string | undefined): string | undefined {
  if (!raw) return undefined;

  const digits = raw.replace(/\D/g, '');
  if (!digits) return undefined;

  return digits.slice(-4);
}

// ============================================================================
// All Fields
// ============================================================================

export function normalizeFields(fields: Record<FieldName, FieldExtraction>): NormalizedFields {
  return {
    statement_end_date: normalizeDate(fields.statement_end_date.raw) ?? null,
    payment_due_date: normalizeDate(fields.payment_due_date.raw) ?? null,
    total_balance: normalizeAmount(fields.total_balance.raw) ?? null,
    min_payment_due: normalizeAmount(fields.min_payment_due.raw) ?? null,
    card_last_4_digits: normalizeCardDigits(fields.card_last_4_digits.raw) ?? null,
  };
}
