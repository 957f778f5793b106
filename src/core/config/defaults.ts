/**
 * Default configuration values.
 *
 * Dependency direction: defaults.ts → nothing (leaf module)
 * Used by: schema.ts, manager.ts, providers, tracing
 */

/** Default model per provider. */
export const DEFAULT_MODELS = {
    upstage: 'solar-pro2',
    openai: 'gpt-4o-mini',
} as const;

/** Default API base URL per provider. */
export const DEFAULT_BASE_URLS = {
    upstage: 'https://api.upstage.ai',
    openai: 'https://api.openai.com',
} as const;

export const DEFAULT_APP_ENV = 'dev';
export const DEFAULT_GIT_SHA = 'unknown';

/** Environment tag that switches sampling to the production rate. */
export const PRODUCTION_ENV = 'prod';

/** Sample rate used in production when no override is configured. */
export const PRODUCTION_SAMPLE_RATE = 0.2;

/** Sample rate used everywhere else when no override is configured. */
export const DEFAULT_SAMPLE_RATE = 1.0;

export const DEFAULT_SERVICE_NAME = 'mission-coach';
export const DEFAULT_OTLP_ENDPOINT = 'http://localhost:4318/v1/traces';

/** Values accepted as "on" for boolean environment flags. */
export const TRUTHY_FLAGS: ReadonlySet<string> = new Set(['true', '1', 'yes']);
