/**
 * LLM Provider interface contract.
 *
 * Every provider adapter MUST implement the LLMProvider interface so that
 * agents never depend on provider-specific details.
 *
 * Dependency direction: providers/types.ts → nothing (leaf module)
 * Used by: provider implementations, registry, agents, tracing
 */

/** Supported LLM provider names. Add new providers here. */
export type LLMProviderName = 'upstage' | 'openai';

/** Role in a chat conversation. */
export type ChatRole = 'system' | 'user' | 'assistant';

/** A single message in a chat conversation. */
export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/**
 * Correlation bundle sent with every call of one request.
 * Providers may echo it to the upstream API for log grouping.
 */
export interface Correlation {
  readonly requestId: string;
  readonly threadId: string;
  readonly userId: string | null;
}

/** Options for a chat completion request. */
export interface ChatOptions {
  /** Model to use (overrides the provider default). */
  readonly model?: string;
  /** Sampling temperature (0.0 - 2.0). */
  readonly temperature?: number;
  /** Maximum tokens in the response. */
  readonly maxTokens?: number;
  /** Stop sequences to halt generation. */
  readonly stopSequences?: readonly string[];
  /** Request correlation identity. */
  readonly correlation?: Correlation;
}

/** Token usage statistics for a request. */
export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/** Response from a chat completion. */
export interface ChatResponse {
  /** The generated text content. */
  readonly content: string;
  /** The model that was used. */
  readonly model: string;
  /** Token usage statistics. */
  readonly usage: TokenUsage;
  /** Provider-specific finish reason. */
  readonly finishReason: string;
}

/**
 * The contract that every LLM provider adapter MUST implement.
 *
 * Adding a new provider means:
 * 1. Create `src/providers/<name>.ts` implementing this interface
 * 2. Register it in `src/providers/registry.ts`
 * 3. Add the name to LLMProviderName above and to the config schema
 */
export interface LLMProvider {
  /** The provider's unique identifier. */
  readonly name: LLMProviderName;

  /**
   * Send a chat completion request and get the full response.
   * @throws {ProviderError} on API failure, network error, or invalid response.
   */
  chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;

  /**
   * Validate that the provider connection is working (API key valid, server reachable).
   * Should NOT throw.
   */
  validateConnection(): Promise<boolean>;
}
