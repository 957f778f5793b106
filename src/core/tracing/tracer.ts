/**
 * Process-wide OpenTelemetry tracer.
 *
 * Built lazily on first use and exported over OTLP/HTTP. When tracing is
 * disabled, or the SDK cannot be constructed, callers get `null` and run
 * without spans.
 *
 * Dependency direction: tracer.ts → @opentelemetry/*, config types, logger
 * Used by: agent system wiring
 */

import type { Tracer } from '@opentelemetry/api';
import {
    BasicTracerProvider,
    BatchSpanProcessor,
    type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import type { AppConfig, AppInfo, TracingConfig } from '../config/types.js';
import { describeError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** Instrumentation scope name for every span this package emits. */
export const TRACER_NAME = 'mission-coach';

let cachedProvider: BasicTracerProvider | null = null;
let cachedTracer: Tracer | null = null;

/**
 * Build a tracer provider. Without explicit processors, spans are batched
 * to the configured OTLP endpoint.
 */
export function createTracerProvider(
    tracing: TracingConfig,
    app: AppInfo,
    spanProcessors?: SpanProcessor[],
): BasicTracerProvider {
    const processors = spanProcessors ?? [
        new BatchSpanProcessor(
            new OTLPTraceExporter({
                url: tracing.endpoint,
                headers: tracing.apiKey ? { 'x-api-key': tracing.apiKey } : {},
            }),
        ),
    ];

    return new BasicTracerProvider({
        resource: resourceFromAttributes({
            [ATTR_SERVICE_NAME]: tracing.project,
            [ATTR_SERVICE_VERSION]: app.gitSha,
            'deployment.environment': app.env,
        }),
        spanProcessors: processors,
    });
}

/**
 * Return the shared tracer, creating it on first call.
 * Returns null when tracing is disabled or construction fails.
 */
export function getTracer(config: AppConfig): Tracer | null {
    if (cachedTracer) return cachedTracer;
    if (!config.tracing.enabled) return null;

    try {
        const provider = createTracerProvider(config.tracing, config.app);
        cachedProvider = provider;
        cachedTracer = provider.getTracer(TRACER_NAME);
        logger.debug(`Tracing enabled: project=${config.tracing.project}, endpoint=${config.tracing.endpoint}`);
    } catch (err) {
        logger.warn(`Tracing unavailable, continuing without it: ${describeError(err)}`);
        return null;
    }
    return cachedTracer;
}

/** Flush pending spans and drop the shared tracer. */
export async function shutdownTracer(): Promise<void> {
    const provider = cachedProvider;
    cachedProvider = null;
    cachedTracer = null;
    if (provider) {
        await provider.shutdown();
    }
}
