/**
 * Statement Parsing Engine - Exports
 */

// Types
export * from './types';

// Errors
export {
  StatementParseError,
  TextExtractionError,
  NoExtractableTextError,
  ProviderNotIdentifiedError,
  StrategyMissingError,
  UnexpectedError,
  type ParseErrorKind,
} from './errors';

// Patterns
export {
  AMOUNT_VALUE,
  DATE_VALUE,
  MASKED_CARD_VALUE,
  LEADING_CARD_VALUE,
  PROXIMITY_PATTERNS,
  labelled,
  direct,
  firstCapture,
} from './patterns';

// Providers
export {
  PROFILES,
  PROVIDER_KEYWORDS,
  supportedProviderNames,
  AMERICAN_EXPRESS_PROFILE,
  BANK_OF_AMERICA_PROFILE,
  CAPITAL_ONE_PROFILE,
  CHASE_PROFILE,
  CITI_PROFILE,
} from './providers';

// Classifier
export { classifyProvider, DEFAULT_CLASSIFIER_WINDOW } from './classifier';

// Pseudo-table
export { buildPseudoTable, normalizeTableKey, type PseudoTable } from './pseudo-table';

// Strategy
export {
  ExtractionSession,
  FieldExtractionStrategy,
  type StrategyOptions,
  type StrategyResult,
} from './field-extractor';

// Registry
export { StrategyRegistry, createDefaultRegistry } from './registry';

// Normalization & validation
export {
  DATE_FORMATS,
  normalizeDate,
  normalizeAmount,
  normalizeCardDigits,
  normalizeFields,
} from './normalize';
export { validateFields } from './validate';

// Engine
export {
  StatementParsingEngine,
  type TextAcquisition,
  type ParseOutcome,
  type ParseSuccess,
  type ParseFailure,
  type ParseState,
  type FailureState,
  type SuccessState,
  type TextSource,
  type ParseOptions,
  type EngineOptions,
} from './orchestrator';
