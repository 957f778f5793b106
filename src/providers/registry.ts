/**
 * Provider registry — factory that creates the correct provider from config.
 *
 * New providers are added by:
 * 1. Create the adapter file in src/providers/
 * 2. Register it in the PROVIDER_FACTORIES map below
 * 3. Add the name to LLMProviderName type in types.ts
 *
 * Dependency direction: registry.ts → types.ts, upstage.ts, openai.ts, errors.ts
 * Used by: agent system wiring, CLI doctor command
 */

import type { LLMProvider, LLMProviderName } from './types.js';
import { OpenAIProvider } from './openai.js';
import { UpstageProvider } from './upstage.js';
import type { ProviderConfig } from '../core/config/types.js';
import { ProviderError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Factory functions for each provider.
 * A missing section means the credential was never supplied.
 */
const PROVIDER_FACTORIES: Record<LLMProviderName, (config: ProviderConfig) => LLMProvider> = {
  upstage: (config: ProviderConfig) => {
    if (!config.upstage) {
      throw new ProviderError(
        'Upstage provider is not configured. Set UPSTAGE_API_KEY.',
        { provider: 'upstage' },
      );
    }
    return new UpstageProvider(config.upstage);
  },

  openai: (config: ProviderConfig) => {
    if (!config.openai) {
      throw new ProviderError(
        'OpenAI provider is not configured. Set OPENAI_API_KEY.',
        { provider: 'openai' },
      );
    }
    return new OpenAIProvider(config.openai);
  },
};

/** Cache of created provider instances (one per provider name). */
const providerCache = new Map<LLMProviderName, LLMProvider>();

function isProviderName(name: string): name is LLMProviderName {
  return Object.hasOwn(PROVIDER_FACTORIES, name);
}

/**
 * Create (or return cached) a provider instance by name.
 *
 * @throws {ProviderError} if the provider name is unknown or its credential is missing
 */
export function createProvider(name: string, config: ProviderConfig): LLMProvider {
  if (!isProviderName(name)) {
    throw new ProviderError(
      `Unknown provider: "${name}". Available: ${getSupportedProviders().join(', ')}`,
      { provider: name, available: getSupportedProviders() },
    );
  }

  const cached = providerCache.get(name);
  if (cached) return cached;

  logger.debug(`Creating provider: ${name}`);
  const provider = PROVIDER_FACTORIES[name](config);
  providerCache.set(name, provider);
  return provider;
}

/**
 * Clear the provider cache (useful for testing or config changes).
 */
export function clearProviderCache(): void {
  providerCache.clear();
}

/**
 * Get all supported provider names.
 */
export function getSupportedProviders(): LLMProviderName[] {
  return Object.keys(PROVIDER_FACTORIES).filter(isProviderName);
}

/**
 * Validate all configured providers can connect.
 * Providers without a credential are reported as `null` (skipped).
 */
export async function validateAllProviders(
  config: ProviderConfig,
): Promise<Record<LLMProviderName, boolean | null>> {
  const results: Record<LLMProviderName, boolean | null> = { upstage: null, openai: null };

  for (const name of getSupportedProviders()) {
    if (!config[name]) continue;
    try {
      results[name] = await createProvider(name, config).validateConnection();
    } catch (err) {
      logger.debug(`Provider ${name} failed validation: ${err instanceof Error ? err.message : String(err)}`);
      results[name] = false;
    }
  }

  return results;
}
