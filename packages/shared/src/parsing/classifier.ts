/**
 * Provider Classifier
 *
 * Issuer branding and summary labels sit near the top of page one, so only
 * a bounded prefix of the text is scanned.
 */

import { logger } from '../logger';
import { ProviderNotIdentifiedError } from './errors';
import { PROVIDER_KEYWORDS, supportedProviderNames } from './providers';
import type { ProviderId } from './types';

export const DEFAULT_CLASSIFIER_WINDOW = 3000;

export function classifyProvider(
  text: string,
  window: number = DEFAULT_CLASSIFIER_WINDOW
): ProviderId {
  const prefix = text.slice(0, window).toLowerCase();

  for (const [keyword, provider] of PROVIDER_KEYWORDS) {
    if (prefix.includes(keyword)) {
      logger.info('Provider identified', { provider, keyword });
      return provider;
    }
  }

  throw new ProviderNotIdentifiedError(supportedProviderNames());
}
