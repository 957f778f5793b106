/**
 * Per-request tracing decision.
 *
 * Taken once per request and stored on the RequestContext, so the classifier
 * and the role agent of one request are either both traced or both not.
 *
 * Dependency direction: sampling.ts → config/defaults
 * Used by: agent system runner
 */

import {
    DEFAULT_SAMPLE_RATE,
    PRODUCTION_ENV,
    PRODUCTION_SAMPLE_RATE,
} from '../config/defaults.js';

export interface SamplingInput {
    /** Environment tag of the running deployment. */
    appEnv: string;
    /** Rendered personalization summary; non-empty means personal data is in the prompt. */
    userContextSummary: string;
    /** Configured override, if any. */
    sampleRate?: number;
    /** Trace requests that carry personal data. */
    allowPii: boolean;
}

/** The effective sample rate: the override clamped to [0, 1], else the environment default. */
export function resolveSampleRate(appEnv: string, override?: number): number {
    if (override !== undefined && Number.isFinite(override)) {
        return Math.min(1, Math.max(0, override));
    }
    return appEnv === PRODUCTION_ENV ? PRODUCTION_SAMPLE_RATE : DEFAULT_SAMPLE_RATE;
}

/**
 * Decide whether this request's model calls are traced.
 * Personal data without the PII flag always turns tracing off.
 */
export function shouldTraceRequest(
    input: SamplingInput,
    random: () => number = Math.random,
): boolean {
    if (input.userContextSummary && !input.allowPii) {
        return false;
    }
    return random() < resolveSampleRate(input.appEnv, input.sampleRate);
}
