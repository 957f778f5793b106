/**
 * Upstage Solar provider adapter.
 *
 * The Solar API speaks the OpenAI chat-completions protocol, so this is
 * the OpenAI adapter pointed at Upstage with Solar as the default model.
 *
 * Dependency direction: upstage.ts → providers/openai.ts
 * Used by: providers/registry.ts
 */

import { OpenAIProvider } from './openai.js';
import { DEFAULT_BASE_URLS, DEFAULT_MODELS } from '../core/config/defaults.js';

/** Configuration required to create an Upstage provider. */
export interface UpstageProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
}

export class UpstageProvider extends OpenAIProvider {
  constructor(config: UpstageProviderConfig) {
    super(
      { apiKey: config.apiKey, baseUrl: config.baseUrl },
      {
        name: 'upstage',
        label: 'Upstage',
        baseUrl: DEFAULT_BASE_URLS.upstage,
        model: DEFAULT_MODELS.upstage,
      },
    );
  }
}
