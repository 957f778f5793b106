/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually — they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import { z } from 'zod';
import {
    appConfigSchema,
    appInfoSchema,
    llmConfigSchema,
    providerConfigSchema,
    tracingConfigSchema,
} from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** Configuration as written by a caller, before defaults apply. */
export type AppConfigInput = z.input<typeof appConfigSchema>;

/** Deployment identity. */
export type AppInfo = z.infer<typeof appInfoSchema>;

/** Model selection and sampling parameters. */
export type LLMConfig = z.infer<typeof llmConfigSchema>;

/** LLM provider connection settings. */
export type ProviderConfig = z.infer<typeof providerConfigSchema>;

/** Tracing and sampling settings. */
export type TracingConfig = z.infer<typeof tracingConfigSchema>;
