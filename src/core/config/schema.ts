/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 * Every section defaults, so `appConfigSchema.parse({})` is a complete config.
 *
 * Dependency direction: schema.ts → zod, defaults.ts
 * Used by: manager.ts, types.ts
 */

import { z } from 'zod';
import {
    DEFAULT_APP_ENV,
    DEFAULT_BASE_URLS,
    DEFAULT_GIT_SHA,
    DEFAULT_OTLP_ENDPOINT,
    DEFAULT_SERVICE_NAME,
} from './defaults.js';

/** Supported provider names. Must match LLMProviderName in providers/types.ts. */
export const providerNameSchema = z.enum(['upstage', 'openai']);

/**
 * Schema for the model used by every node of the graph.
 */
export const llmConfigSchema = z.object({
    /** Which provider serves the model. */
    provider: providerNameSchema.default('upstage'),
    /** Model identifier; falls back to the provider's default model. */
    model: z.string().min(1).optional(),
    /** Sampling temperature; each node has its own default when unset. */
    temperature: z.number().min(0).max(2).optional(),
    /** Maximum tokens the model can generate in a response. */
    maxTokens: z.number().int().min(1).max(200000).default(2048),
});

/**
 * Schema for Upstage (Solar) provider settings.
 */
export const upstageProviderSchema = z.object({
    apiKey: z.string().min(1, 'Upstage API key is required'),
    baseUrl: z.string().url().default(DEFAULT_BASE_URLS.upstage),
});

/**
 * Schema for OpenAI provider settings.
 */
export const openaiProviderSchema = z.object({
    apiKey: z.string().min(1, 'OpenAI API key is required'),
    baseUrl: z.string().url().default(DEFAULT_BASE_URLS.openai),
    organization: z.string().optional(),
});

/**
 * Schema for provider configuration. A section is present only when its credential is.
 */
export const providerConfigSchema = z.object({
    upstage: upstageProviderSchema.optional(),
    openai: openaiProviderSchema.optional(),
});

/**
 * Schema for deployment identity, stamped onto every request.
 */
export const appInfoSchema = z.object({
    /** Environment tag (dev, stg, prod). */
    env: z.string().min(1).default(DEFAULT_APP_ENV),
    /** Build/version tag. */
    gitSha: z.string().min(1).default(DEFAULT_GIT_SHA),
});

/**
 * Schema for tracing and sampling settings.
 */
export const tracingConfigSchema = z.object({
    /** Whether a tracer is constructed at all. */
    enabled: z.boolean().default(false),
    /** Service/project name attached to exported spans. */
    project: z.string().min(1).default(DEFAULT_SERVICE_NAME),
    /** OTLP/HTTP traces endpoint. */
    endpoint: z.string().url().default(DEFAULT_OTLP_ENDPOINT),
    /** Optional collector API key. */
    apiKey: z.string().min(1).optional(),
    /** Sample-rate override; clamped to [0, 1] when applied. */
    sampleRate: z.number().finite().optional(),
    /** Keep tracing requests that carry a personalization summary. */
    allowPii: z.boolean().default(false),
});

/**
 * The complete application configuration schema.
 */
export const appConfigSchema = z.object({
    app: appInfoSchema.default({}),
    llm: llmConfigSchema.default({}),
    providers: providerConfigSchema.default({}),
    tracing: tracingConfigSchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});
