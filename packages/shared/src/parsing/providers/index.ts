/**
 * Provider Profiles
 *
 * Adding an issuer is a data change: write a profile, add it to PROFILES,
 * and give it classifier keywords below.
 */

import type { ProviderId, ProviderProfile } from '../types';
import { AMERICAN_EXPRESS_PROFILE } from './american-express.profile';
import { BANK_OF_AMERICA_PROFILE } from './bank-of-america.profile';
import { CAPITAL_ONE_PROFILE } from './capital-one.profile';
import { CHASE_PROFILE } from './chase.profile';
import { CITI_PROFILE } from './citi.profile';

export const PROFILES: Record<ProviderId, ProviderProfile> = {
  american_express: AMERICAN_EXPRESS_PROFILE,
  chase: CHASE_PROFILE,
  citi: CITI_PROFILE,
  capital_one: CAPITAL_ONE_PROFILE,
  bank_of_america: BANK_OF_AMERICA_PROFILE,
};

/**
 * Classifier keywords, matched as lower-case substrings in this order.
 * The first hit wins, so a keyword contained in another issuer's branding
 * must come after that issuer's own keywords.
 */
export const PROVIDER_KEYWORDS: ReadonlyArray<readonly [keyword: string, provider: ProviderId]> = [
  ['american express', 'american_express'],
  ['amex', 'american_express'],
  ['chase', 'chase'],
  ['citi', 'citi'],
  ['citibank', 'citi'],
  ['capital one', 'capital_one'],
  ['bank of america', 'bank_of_america'],
  ['bofa', 'bank_of_america'],
];

export function supportedProviderNames(): string[] {
  return Object.values(PROFILES).map((profile) => profile.displayName);
}

export {
  AMERICAN_EXPRESS_PROFILE,
  BANK_OF_AMERICA_PROFILE,
  CAPITAL_ONE_PROFILE,
  CHASE_PROFILE,
  CITI_PROFILE,
};
