/**
 * OpenAI chat-completions adapter.
 *
 * Uses the Chat Completions API directly via fetch() — no SDK dependency.
 * Other OpenAI-compatible APIs (see upstage.ts) reuse this class with
 * their own name, base URL and default model.
 *
 * Dependency direction: openai.ts → providers/types.ts, core/errors.ts, zod
 * Used by: providers/registry.ts, providers/upstage.ts
 */

import { z } from 'zod';
import { ProviderError, describeError } from '../core/errors.js';
import { DEFAULT_BASE_URLS, DEFAULT_MODELS } from '../core/config/defaults.js';
import type {
  LLMProvider,
  LLMProviderName,
  ChatMessage,
  ChatOptions,
  ChatResponse,
  Correlation,
} from './types.js';
import { logger } from '../utils/logger.js';

/** Configuration required to create an OpenAI provider. */
export interface OpenAIProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
  readonly organization?: string;
}

/** Identity and defaults of an OpenAI-compatible endpoint. */
export interface CompletionEndpoint {
  readonly name: LLMProviderName;
  readonly label: string;
  readonly baseUrl: string;
  readonly model: string;
}

const OPENAI_ENDPOINT: CompletionEndpoint = {
  name: 'openai',
  label: 'OpenAI',
  baseUrl: DEFAULT_BASE_URLS.openai,
  model: DEFAULT_MODELS.openai,
};

const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';
const DEFAULT_MAX_TOKENS = 2048;

/** The subset of the completion payload this adapter reads. */
const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

type Completion = z.infer<typeof completionSchema>;

/**
 * OpenAI provider implementation.
 */
export class OpenAIProvider implements LLMProvider {
  public readonly name: LLMProviderName;
  protected readonly label: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultModel: string;
  private readonly organization?: string;

  constructor(config: OpenAIProviderConfig, endpoint: CompletionEndpoint = OPENAI_ENDPOINT) {
    if (!config.apiKey) {
      throw new ProviderError(`${endpoint.label} API key is required`, { provider: endpoint.name });
    }
    this.name = endpoint.name;
    this.label = endpoint.label;
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? endpoint.baseUrl).replace(/\/+$/, '');
    this.defaultModel = endpoint.model;
    this.organization = config.organization;
  }

  /**
   * Send a non-streaming chat completion request.
   */
  async chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? this.defaultModel;

    const body: Record<string, unknown> = {
      model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
    };

    if (options?.temperature !== undefined) {
      body.temperature = options.temperature;
    }
    if (options?.stopSequences?.length) {
      body.stop = options.stopSequences;
    }

    logger.debug(`${this.label} chat request: model=${model}, messages=${messages.length}`);

    const completion = await this.request(body, options?.correlation);
    const first = completion.choices[0];
    const promptTokens = completion.usage?.prompt_tokens ?? 0;
    const completionTokens = completion.usage?.completion_tokens ?? 0;

    return {
      content: first?.message?.content ?? '',
      model: completion.model ?? model,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
      finishReason: first?.finish_reason ?? 'unknown',
    };
  }

  /**
   * Validate that the API connection is working with a one-token request.
   */
  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}${CHAT_COMPLETIONS_PATH}`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify({
          model: this.defaultModel,
          messages: [{ role: 'user', content: 'ping' }],
          max_tokens: 1,
        }),
      });
      return response.ok;
    } catch (err) {
      logger.debug(`${this.label} connection check failed: ${describeError(err)}`);
      return false;
    }
  }

  // ── Private helpers ──

  private getHeaders(correlation?: Correlation): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
    };

    if (this.organization) {
      headers['OpenAI-Organization'] = this.organization;
    }
    if (correlation) {
      headers['X-Request-Id'] = correlation.requestId;
    }

    return headers;
  }

  private async request(body: Record<string, unknown>, correlation?: Correlation): Promise<Completion> {
    let response: Response;

    try {
      response = await fetch(`${this.baseUrl}${CHAT_COMPLETIONS_PATH}`, {
        method: 'POST',
        headers: this.getHeaders(correlation),
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ProviderError(`Failed to connect to ${this.label} API: ${describeError(err)}`, {
        provider: this.name,
        baseUrl: this.baseUrl,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(`${this.label} API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: errorBody,
        provider: this.name,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new ProviderError(`${this.label} returned invalid JSON: ${describeError(err)}`, {
        provider: this.name,
      });
    }

    const parsed = completionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(`${this.label} returned an unexpected response shape`, {
        provider: this.name,
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }
}
