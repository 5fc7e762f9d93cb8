/**
 * Parse Error Taxonomy
 *
 * Fatal error kinds raised inside the pipeline. The engine catches every one
 * of them at its boundary and turns it into a failure outcome.
 */

export type ParseErrorKind =
  | 'TextExtractionError'
  | 'NoExtractableTextError'
  | 'ProviderNotIdentifiedError'
  | 'StrategyMissingError'
  | 'UnexpectedError';

export abstract class StatementParseError extends Error {
  abstract readonly kind: ParseErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TextExtractionError extends StatementParseError {
  readonly kind = 'TextExtractionError';
}

export class NoExtractableTextError extends StatementParseError {
  readonly kind = 'NoExtractableTextError';
}

export class ProviderNotIdentifiedError extends StatementParseError {
  readonly kind = 'ProviderNotIdentifiedError';

  constructor(readonly supportedProviders: string[]) {
    super(
      `Could not identify credit card provider. Supported providers: ${supportedProviders.join(', ')}`
    );
  }
}

export class StrategyMissingError extends StatementParseError {
  readonly kind = 'StrategyMissingError';
}

export class UnexpectedError extends StatementParseError {
  readonly kind = 'UnexpectedError';
}
