/**
 * Strategy Registry
 *
 * Registry pattern for field-extraction strategies, keyed by provider.
 * Each engine owns its registry, so tests can register a subset.
 */

import { logger } from '../logger';
import { StrategyMissingError } from './errors';
import { FieldExtractionStrategy, type StrategyOptions } from './field-extractor';
import { PROFILES } from './providers';
import { DEFAULT_ENGINE_CONFIG, type ProviderId } from './types';

export class StrategyRegistry {
  private readonly strategies = new Map<ProviderId, FieldExtractionStrategy>();

  /**
   * Register a strategy for its provider.
   * Overwrites any existing strategy for that provider.
   */
  register(strategy: FieldExtractionStrategy): void {
    this.strategies.set(strategy.providerId, strategy);

    logger.debug('Registered strategy', {
      provider: strategy.providerId,
      display_name: strategy.profile.displayName,
    });
  }

  get(provider: ProviderId): FieldExtractionStrategy | undefined {
    return this.strategies.get(provider);
  }

  /**
   * @throws StrategyMissingError if no strategy is registered for the provider
   */
  getOrThrow(provider: ProviderId): FieldExtractionStrategy {
    const strategy = this.strategies.get(provider);
    if (!strategy) {
      throw new StrategyMissingError(`No extraction strategy registered for provider: ${provider}`);
    }
    return strategy;
  }

  has(provider: ProviderId): boolean {
    return this.strategies.has(provider);
  }

  getRegisteredProviders(): ProviderId[] {
    return Array.from(this.strategies.keys());
  }

  clear(): void {
    this.strategies.clear();
  }
}

/**
 * Registry with one strategy per known provider profile.
 */
export function createDefaultRegistry(
  options: StrategyOptions = { proximityWindow: DEFAULT_ENGINE_CONFIG.proximityWindow }
): StrategyRegistry {
  const registry = new StrategyRegistry();
  for (const profile of Object.values(PROFILES)) {
    registry.register(new FieldExtractionStrategy(profile, options));
  }
  return registry;
}
