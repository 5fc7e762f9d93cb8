/**
 * Parsing Engine Types
 *
 * Provider profiles, field specifications, extraction results and the
 * engine configuration value object.
 */

// ============================================================================
// Providers & Fields
// ============================================================================

export type ProviderId =
  | 'american_express'
  | 'chase'
  | 'citi'
  | 'capital_one'
  | 'bank_of_america';

export type FieldName =
  | 'statement_end_date'
  | 'payment_due_date'
  | 'total_balance'
  | 'min_payment_due'
  | 'card_last_4_digits';

export const FIELD_NAMES: readonly FieldName[] = [
  'statement_end_date',
  'payment_due_date',
  'total_balance',
  'min_payment_due',
  'card_last_4_digits',
];

/** Value kind of a field; selects the proximity pattern and the normalizer. */
export type FieldKind = 'date' | 'amount' | 'card';

export const FIELD_KINDS: Record<FieldName, FieldKind> = {
  statement_end_date: 'date',
  payment_due_date: 'date',
  total_balance: 'amount',
  min_payment_due: 'amount',
  card_last_4_digits: 'card',
};

export type ProximityDirection = 'forward' | 'backward';

/**
 * Per (provider, field) configuration: ordered tactics data for the cascade.
 */
export interface FieldSpec {
  /** Applied with flags `is`; the first non-empty capture group wins */
  patterns: RegExp[];
  keywords: string[];
  tableKeys: string[];
  /** Side of the keyword the proximity window is taken from. Defaults to forward. */
  proximityDirection?: ProximityDirection;
}

export interface ProviderProfile {
  id: ProviderId;
  displayName: string;
  fields: Record<FieldName, FieldSpec>;
}

// ============================================================================
// Extraction Results
// ============================================================================

export type ExtractionTier = 'direct' | 'proximity' | 'table' | 'none';

export const CONFIDENCE: Record<ExtractionTier, number> = {
  direct: 0.95,
  proximity: 0.85,
  table: 0.75,
  none: 0,
};

export interface FieldExtraction {
  field: FieldName;
  raw: string | undefined;
  tier: ExtractionTier;
  confidence: number;
}

export type WarningKind = 'FieldExtractionWarning' | 'ValidationWarning';

export interface ParseWarning {
  kind: WarningKind;
  field?: FieldName;
  message: string;
}

/**
 * Typed statement values after normalization. Dates are ISO YYYY-MM-DD.
 */
export interface NormalizedFields {
  statement_end_date: string | null;
  payment_due_date: string | null;
  total_balance: number | null;
  min_payment_due: number | null;
  card_last_4_digits: string | null;
}

// ============================================================================
// Engine Configuration
// ============================================================================

export interface OcrConfig {
  enabled: boolean;
  /** Custom tesseract binary; the library default is used when absent */
  binaryPath: string | undefined;
  language: string;
  pageSegMode: string;
  maxPages: number;
  /** Rasterization DPI */
  density: number;
}

export interface EngineConfig {
  ocr: OcrConfig;
  proximityWindow: number;
  classifierWindow: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  ocr: {
    enabled: true,
    binaryPath: undefined,
    language: 'eng',
    pageSegMode: '6',
    maxPages: 3,
    density: 300,
  },
  proximityWindow: 150,
  classifierWindow: 3000,
};
