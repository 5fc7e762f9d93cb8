/**
 * Statement Parsing Engine
 *
 * Sequences text acquisition → provider classification → field extraction →
 * normalization and validation. Every run ends in a tagged outcome; the
 * engine is the single catch boundary and never throws to its caller.
 *
 * States:
 *   Created → TextExtracted → ProviderIdentified → Parsed
 * Failure states:
 *   TextExtractionFailed | NoExtractableText | ProviderUnidentified |
 *   StrategyMissing | UnexpectedError
 */

import { ulid } from 'ulid';
import { getContext, runWithContext, runWithContextAsync, setContextProvider } from '../context';
import { logger } from '../logger';
import { parseDurationHistogram, statementsParsedCounter } from '../metrics';
import { EXTRACTION_METHOD, type StructuredStatementData } from '../types';
import { classifyProvider } from './classifier';
import {
  NoExtractableTextError,
  StatementParseError,
  TextExtractionError,
  UnexpectedError,
  type ParseErrorKind,
} from './errors';
import { normalizeFields } from './normalize';
import { createDefaultRegistry, type StrategyRegistry } from './registry';
import {
  DEFAULT_ENGINE_CONFIG,
  FIELD_NAMES,
  type EngineConfig,
  type FieldName,
  type OcrConfig,
  type ParseWarning,
  type ProviderId,
} from './types';
import { validateFields } from './validate';

// ============================================================================
// Contracts
// ============================================================================

/**
 * Document-to-text adapters. Implementations live with the worker, where the
 * PDF and OCR libraries are installed.
 */
export interface TextAcquisition {
  /** Native text layer of every page, joined with newlines. Throws on unreadable input. */
  extractNativeText(document: Uint8Array): Promise<string>;
  /** Best-effort OCR text. Returns '' when OCR tooling is unavailable. */
  recognizeText(document: Uint8Array, ocr: OcrConfig): Promise<string>;
}

export type SuccessState = 'Parsed';

export type FailureState =
  | 'TextExtractionFailed'
  | 'NoExtractableText'
  | 'ProviderUnidentified'
  | 'StrategyMissing'
  | 'UnexpectedError';

export type ParseState = 'Created' | 'TextExtracted' | 'ProviderIdentified' | SuccessState | FailureState;

export type TextSource = 'native' | 'ocr' | 'provided';

export interface ParseSuccess {
  ok: true;
  state: SuccessState;
  provider: ProviderId;
  data: StructuredStatementData;
  textSource: TextSource;
  trace: ParseState[];
}

export interface ParseFailure {
  ok: false;
  state: FailureState;
  errorKind: ParseErrorKind;
  message: string;
  provider: ProviderId | null;
  trace: ParseState[];
}

export type ParseOutcome = ParseSuccess | ParseFailure;

export interface ParseOptions {
  /** Opaque identifier included in log lines; has no effect on parsing. */
  correlationId?: string;
}

export interface EngineOptions {
  acquisition: TextAcquisition;
  config?: EngineConfig;
  registry?: StrategyRegistry;
}

const FAILURE_STATES: Record<ParseErrorKind, FailureState> = {
  TextExtractionError: 'TextExtractionFailed',
  NoExtractableTextError: 'NoExtractableText',
  ProviderNotIdentifiedError: 'ProviderUnidentified',
  StrategyMissingError: 'StrategyMissing',
  UnexpectedError: 'UnexpectedError',
};

// ============================================================================
// Parse Run
// ============================================================================

/**
 * State of one parse invocation. Discarded when the invocation ends.
 */
class ParseRun {
  readonly trace: ParseState[] = ['Created'];
  provider: ProviderId | null = null;

  transition(state: ParseState): void {
    logger.debug('Parse state transition', { from: this.trace[this.trace.length - 1], to: state });
    this.trace.push(state);
  }

  fail(error: unknown): ParseFailure {
    const parseError =
      error instanceof StatementParseError
        ? error
        : new UnexpectedError(`Unexpected parsing error: ${describe(error)}`, { cause: error });
    const state = FAILURE_STATES[parseError.kind];
    this.transition(state);

    if (parseError.kind === 'UnexpectedError') {
      logger.error('Statement parsing failed unexpectedly', error, { state });
    } else {
      logger.warn('Statement parsing failed', { state, error_kind: parseError.kind, detail: parseError.message });
    }

    return {
      ok: false,
      state,
      errorKind: parseError.kind,
      message: parseError.message,
      provider: this.provider,
      trace: this.trace,
    };
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Engine
// ============================================================================

export class StatementParsingEngine {
  readonly config: EngineConfig;
  private readonly acquisition: TextAcquisition;
  private readonly registry: StrategyRegistry;

  constructor(options: EngineOptions) {
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.acquisition = options.acquisition;
    this.registry =
      options.registry ?? createDefaultRegistry({ proximityWindow: this.config.proximityWindow });
  }

  /**
   * Full pipeline from document bytes.
   */
  async parseDocument(document: Uint8Array, options: ParseOptions = {}): Promise<ParseOutcome> {
    return runWithContextAsync(this.contextFor(options), async () => {
      const startTime = Date.now();
      const run = new ParseRun();

      let outcome: ParseOutcome;
      try {
        const { text, source } = await this.acquireText(document);
        run.transition('TextExtracted');
        outcome = this.parseExtractedText(run, text, source);
      } catch (error) {
        outcome = run.fail(error);
      }

      this.record(outcome, startTime);
      return outcome;
    });
  }

  /**
   * Text-only pipeline for callers that already hold the document text.
   */
  parseText(text: string, options: ParseOptions = {}): ParseOutcome {
    return runWithContext(this.contextFor(options), () => {
      const startTime = Date.now();
      const run = new ParseRun();

      let outcome: ParseOutcome;
      try {
        if (text.trim() === '') {
          throw new NoExtractableTextError('Document text is empty');
        }
        run.transition('TextExtracted');
        outcome = this.parseExtractedText(run, text, 'provided');
      } catch (error) {
        outcome = run.fail(error);
      }

      this.record(outcome, startTime);
      return outcome;
    });
  }

  private contextFor(options: ParseOptions) {
    const correlationId = options.correlationId ?? getContext()?.correlationId ?? ulid();
    return { correlationId, taskId: options.correlationId };
  }

  private async acquireText(document: Uint8Array): Promise<{ text: string; source: TextSource }> {
    let nativeText: string;
    try {
      nativeText = await this.acquisition.extractNativeText(document);
    } catch (error) {
      if (error instanceof StatementParseError) throw error;
      throw new TextExtractionError(`Failed to extract text from PDF: ${describe(error)}`, {
        cause: error,
      });
    }

    if (nativeText.trim() !== '') {
      logger.info('Native text extracted', { chars: nativeText.length });
      return { text: nativeText, source: 'native' };
    }

    if (!this.config.ocr.enabled) {
      throw new NoExtractableTextError('No text layer found and OCR is disabled');
    }

    logger.info('No text layer found, falling back to OCR', { max_pages: this.config.ocr.maxPages });
    const ocrText = await this.acquisition.recognizeText(document, this.config.ocr);

    if (ocrText.trim() === '') {
      throw new NoExtractableTextError('No text could be extracted from the document, including via OCR');
    }

    logger.info('OCR text extracted', { chars: ocrText.length });
    return { text: ocrText, source: 'ocr' };
  }

  private parseExtractedText(run: ParseRun, text: string, source: TextSource): ParseSuccess {
    const provider = classifyProvider(text, this.config.classifierWindow);
    run.provider = provider;
    setContextProvider(provider);
    run.transition('ProviderIdentified');

    const strategy = this.registry.getOrThrow(provider);
    const extraction = strategy.extract(text);
    const normalized = normalizeFields(extraction.fields);

    const warnings: ParseWarning[] = [...extraction.warnings];

    // A raw value that fails normalization is reported as absent
    const confidenceFor = (field: FieldName): number => {
      const { raw, confidence } = extraction.fields[field];
      if (raw !== undefined && normalized[field] === null) {
        const message = `Extracted ${field} value "${raw}" could not be normalized`;
        warnings.push({ kind: 'FieldExtractionWarning', field, message });
        logger.warn(message, { field });
        return 0;
      }
      return confidence;
    };

    const confidenceScores: Record<FieldName, number> = {
      statement_end_date: confidenceFor('statement_end_date'),
      payment_due_date: confidenceFor('payment_due_date'),
      total_balance: confidenceFor('total_balance'),
      min_payment_due: confidenceFor('min_payment_due'),
      card_last_4_digits: confidenceFor('card_last_4_digits'),
    };

    warnings.push(...validateFields(normalized));

    const data: StructuredStatementData = {
      ...normalized,
      metadata: {
        provider: strategy.profile.displayName,
        confidence_scores: confidenceScores,
        extraction_method: EXTRACTION_METHOD,
        warnings,
      },
    };

    run.transition('Parsed');
    logger.info('Statement parsed', {
      fields_found: FIELD_NAMES.filter((field) => normalized[field] !== null).length,
      warnings: warnings.length,
      text_source: source,
    });

    return { ok: true, state: 'Parsed', provider, data, textSource: source, trace: run.trace };
  }

  private record(outcome: ParseOutcome, startTime: number): void {
    const duration = (Date.now() - startTime) / 1000;
    const status = outcome.ok ? 'success' : outcome.state;
    statementsParsedCounter.inc({ provider: outcome.provider ?? 'unknown', status });
    parseDurationHistogram.observe({ status }, duration);
  }
}
