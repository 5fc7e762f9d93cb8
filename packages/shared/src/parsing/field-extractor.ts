/**
 * Field-Extraction Strategy
 *
 * One strategy type, parameterized by a provider profile. Each field runs the
 * cascade direct pattern → keyword proximity → pseudo-table, and the first
 * tactic that yields a value decides the field's confidence tier.
 */

import { logger } from '../logger';
import { fieldExtractionsCounter } from '../metrics';
import { PROXIMITY_PATTERNS, firstCapture } from './patterns';
import { buildPseudoTable, normalizeTableKey, type PseudoTable } from './pseudo-table';
import {
  CONFIDENCE,
  FIELD_KINDS,
  FIELD_NAMES,
  type ExtractionTier,
  type FieldExtraction,
  type FieldKind,
  type FieldName,
  type FieldSpec,
  type ParseWarning,
  type ProviderProfile,
} from './types';

export interface StrategyOptions {
  proximityWindow: number;
}

export interface StrategyResult {
  fields: Record<FieldName, FieldExtraction>;
  warnings: ParseWarning[];
}

// ============================================================================
// Extraction Session
// ============================================================================

/**
 * Tactics over one document's text. A session lives for a single parse and
 * owns that parse's memoized pseudo-table.
 */
export class ExtractionSession {
  private table: PseudoTable | undefined;

  constructor(
    readonly text: string,
    private readonly proximityWindow: number
  ) {}

  directMatch(spec: FieldSpec): string | undefined {
    for (const pattern of spec.patterns) {
      const value = firstCapture(this.text.match(pattern));
      if (value) return value;
    }
    return undefined;
  }

  proximityMatch(spec: FieldSpec, kind: FieldKind): string | undefined {
    const haystack = this.text.toLowerCase();
    const backward = spec.proximityDirection === 'backward';

    for (const keyword of spec.keywords) {
      const index = haystack.indexOf(keyword.toLowerCase());
      if (index === -1) continue;

      const window = backward
        ? this.text.slice(Math.max(0, index - this.proximityWindow), index)
        : this.text.slice(index + keyword.length, index + keyword.length + this.proximityWindow);

      const value = searchWindow(window, kind, backward);
      if (value) return value;
    }
    return undefined;
  }

  tableLookup(spec: FieldSpec): string | undefined {
    const table = this.pseudoTable();

    for (const alias of spec.tableKeys) {
      const value = table.get(normalizeTableKey(alias));
      if (value) return value;
    }
    return undefined;
  }

  /**
   * Built on first use, then shared by every field of this session.
   */
  pseudoTable(): PseudoTable {
    if (!this.table) {
      this.table = buildPseudoTable(this.text);
      logger.debug('Pseudo-table built', { entries: this.table.size });
    }
    return this.table;
  }
}

/**
 * Search a window with the field kind's patterns. Backward windows take the
 * match closest to the keyword, i.e. the last one.
 */
function searchWindow(window: string, kind: FieldKind, lastMatch: boolean): string | undefined {
  for (const pattern of PROXIMITY_PATTERNS[kind]) {
    if (lastMatch) {
      const global = new RegExp(pattern.source, `${pattern.flags}g`);
      let found: string | undefined;
      for (const match of window.matchAll(global)) {
        found = firstCapture(match) ?? found;
      }
      if (found) return found;
    } else {
      const value = firstCapture(window.match(pattern));
      if (value) return value;
    }
  }
  return undefined;
}

// ============================================================================
// Strategy
// ============================================================================

export class FieldExtractionStrategy {
  constructor(
    readonly profile: ProviderProfile,
    private readonly options: StrategyOptions
  ) {}

  get providerId(): ProviderProfile['id'] {
    return this.profile.id;
  }

  /**
   * Run the cascade for every field against one document's text.
   */
  extract(text: string): StrategyResult {
    const session = new ExtractionSession(text, this.options.proximityWindow);
    const warnings: ParseWarning[] = [];
    const fields: Record<FieldName, FieldExtraction> = {
      statement_end_date: this.extractField(session, 'statement_end_date'),
      payment_due_date: this.extractField(session, 'payment_due_date'),
      total_balance: this.extractField(session, 'total_balance'),
      min_payment_due: this.extractField(session, 'min_payment_due'),
      card_last_4_digits: this.extractField(session, 'card_last_4_digits'),
    };

    for (const field of FIELD_NAMES) {
      const extraction = fields[field];

      fieldExtractionsCounter.inc({ provider: this.profile.id, field, tier: extraction.tier });

      if (extraction.tier === 'none') {
        const message = `Could not extract ${field} for ${this.profile.displayName}`;
        warnings.push({ kind: 'FieldExtractionWarning', field, message });
        logger.warn(message, { field, provider: this.profile.id });
      }
    }

    return { fields, warnings };
  }

  extractField(session: ExtractionSession, field: FieldName): FieldExtraction {
    const spec = this.profile.fields[field];
    const kind = FIELD_KINDS[field];

    const directValue = session.directMatch(spec);
    if (directValue) return result(field, directValue, 'direct');

    const proximityValue = session.proximityMatch(spec, kind);
    if (proximityValue) return result(field, proximityValue, 'proximity');

    const tableValue = session.tableLookup(spec);
    if (tableValue) return result(field, tableValue, 'table');

    return result(field, undefined, 'none');
  }
}

function result(field: FieldName, raw: string | undefined, tier: ExtractionTier): FieldExtraction {
  logger.debug('Field extracted', { field, tier, raw });
  return { field, raw, tier, confidence: CONFIDENCE[tier] };
}
