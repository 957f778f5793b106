/**
 * Configuration manager — reads the environment once into a validated AppConfig.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, dotenv, errors.ts
 * Used by: CLI commands, agent system wiring
 */

import * as dotenv from 'dotenv';
import { appConfigSchema } from './schema.js';
import { DEFAULT_MODELS, TRUTHY_FLAGS } from './defaults.js';
import type { AppConfig, AppConfigInput } from './types.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

type Env = Readonly<Record<string, string | undefined>>;

let cachedConfig: AppConfig | null = null;

/**
 * Load variables from a `.env` file into `process.env`.
 * Variables already set in the environment win.
 */
export function loadDotEnv(path?: string): void {
    const result = dotenv.config(path ? { path } : undefined);
    if (result.error) {
        logger.debug(`No .env file loaded: ${result.error.message}`);
    }
}

/** Return the first non-empty value among `keys`. */
export function getEnvFirst(env: Env, ...keys: string[]): string | undefined {
    for (const key of keys) {
        const value = env[key];
        if (value) return value;
    }
    return undefined;
}

/** Whether a raw flag value means "on". */
export function parseFlag(raw: string | undefined): boolean {
    return raw !== undefined && TRUTHY_FLAGS.has(raw.trim().toLowerCase());
}

/**
 * Parse a numeric variable. Non-numeric text is passed through unchanged
 * so schema validation reports it.
 */
function parseNumeric(raw: string | undefined): number | string | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    return Number.isFinite(value) ? value : raw;
}

/** The sample-rate override; non-numeric values are ignored. */
function parseSampleRate(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        logger.warn(`Ignoring non-numeric TRACE_SAMPLE_RATE "${raw}"`);
        return undefined;
    }
    return value;
}

/** Translate environment variables into the (unvalidated) config input shape. */
export function configInputFromEnv(env: Env): Record<string, unknown> {
    const upstageKey = env.UPSTAGE_API_KEY;
    const openaiKey = env.OPENAI_API_KEY;

    return {
        app: {
            env: env.APP_ENV || undefined,
            gitSha: env.GIT_SHA || undefined,
        },
        llm: {
            provider: env.LLM_PROVIDER || undefined,
            model: env.LLM_MODEL || undefined,
            temperature: parseNumeric(env.LLM_TEMPERATURE),
            maxTokens: parseNumeric(env.LLM_MAX_TOKENS),
        },
        providers: {
            upstage: upstageKey
                ? { apiKey: upstageKey, baseUrl: env.UPSTAGE_BASE_URL || undefined }
                : undefined,
            openai: openaiKey
                ? {
                      apiKey: openaiKey,
                      baseUrl: env.OPENAI_BASE_URL || undefined,
                      organization: env.OPENAI_ORGANIZATION || undefined,
                  }
                : undefined,
        },
        tracing: {
            enabled: parseFlag(getEnvFirst(env, 'TRACING_ENABLED', 'OTEL_TRACING_ENABLED')),
            project: getEnvFirst(env, 'TRACE_PROJECT', 'OTEL_SERVICE_NAME'),
            endpoint: env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT || undefined,
            apiKey: env.TRACE_API_KEY || undefined,
            sampleRate: parseSampleRate(env.TRACE_SAMPLE_RATE),
            allowPii: parseFlag(env.TRACE_ALLOW_PII),
        },
        logLevel: env.LOG_LEVEL ? env.LOG_LEVEL.toLowerCase() : undefined,
    };
}

/**
 * Build and validate the configuration from environment variables.
 *
 * @throws {ConfigError} if any variable fails validation
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const result = appConfigSchema.safeParse(configInputFromEnv(env));

    if (!result.success) {
        const issues = result.error.issues.map(
            (i) => `  - ${i.path.join('.')}: ${i.message}`,
        ).join('\n');

        throw new ConfigError(
            `Invalid configuration:\n${issues}`,
            { issues: result.error.issues },
        );
    }

    logger.debug('Config loaded and validated successfully');
    return result.data;
}

/**
 * Return the process-wide configuration, reading `process.env` on first use.
 * There is no live reload.
 */
export function getConfig(): AppConfig {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

/** Forget the cached configuration (useful for testing). */
export function clearConfigCache(): void {
    cachedConfig = null;
}

/**
 * Get the default configuration with optional partial overrides applied.
 *
 * @throws {ConfigError} if the overrides are invalid
 */
export function getDefaultConfig(overrides: AppConfigInput = {}): AppConfig {
    const result = appConfigSchema.safeParse(overrides);
    if (!result.success) {
        throw new ConfigError('Invalid configuration overrides', { issues: result.error.issues });
    }
    return result.data;
}

/** The model id in effect for the configured provider. */
export function resolveModel(config: AppConfig): string {
    return config.llm.model ?? DEFAULT_MODELS[config.llm.provider];
}
