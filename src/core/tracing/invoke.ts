/**
 * Instrumented model invocation.
 *
 * Every model call of a request goes through `invokeModel`, which carries the
 * request's correlation identity to the provider and, when the request is
 * sampled, wraps the call in a span under the request span. Failures come back
 * as an `err` result instead of an exception.
 *
 * Dependency direction: invoke.ts → @opentelemetry/api, providers/types, core/result
 * Used by: agents/base, agent system runner
 */

import {
    context as otelContext,
    trace,
    SpanStatusCode,
    type Attributes,
    type Context,
    type Span,
    type Tracer,
} from '@opentelemetry/api';
import type { AgentNode } from '../../agents/types.js';
import type { ChatMessage, ChatResponse, Correlation, LLMProvider } from '../../providers/types.js';
import type { RequestContext } from '../workflow/context.js';
import { ProviderError, describeError } from '../errors.js';
import { err, ok, type Result } from '../result.js';

/** Model parameters shared by every node. */
export interface ModelOptions {
    readonly model: string;
    readonly temperature?: number;
    readonly maxTokens?: number;
}

/** Filterable metadata attached to a model call. */
export interface InvocationMetadata {
    readonly requestId: string;
    readonly threadId: string;
    readonly userId: string | null;
    readonly gitSha: string;
    readonly node: string;
}

/** Everything a single model call needs besides the messages. */
export interface InvocationConfig {
    readonly node: AgentNode;
    readonly tags: readonly string[];
    readonly metadata: InvocationMetadata;
    readonly correlation: Correlation;
    /** Null when the request is not sampled. */
    readonly tracer: Tracer | null;
    /** Context holding the request span. */
    readonly parent?: Context;
}

/** The request-level span and the context that parents node spans under it. */
export interface TraceScope {
    readonly span: Span;
    readonly context: Context;
}

export const REQUEST_SPAN_NAME = 'agent_orchestration';

export function buildInvocationConfig(
    request: RequestContext,
    node: AgentNode,
    tracer: Tracer | null,
    parent?: Context,
): InvocationConfig {
    return {
        node,
        tags: [request.appEnv, `node:${node}`],
        metadata: {
            requestId: request.requestId,
            threadId: request.threadId,
            userId: request.userId,
            gitSha: request.gitSha,
            node,
        },
        correlation: {
            requestId: request.requestId,
            threadId: request.threadId,
            userId: request.userId,
        },
        tracer: request.traceEnabled ? tracer : null,
        parent,
    };
}

function correlationAttributes(request: RequestContext): Attributes {
    return {
        'request.id': request.requestId,
        'thread.id': request.threadId,
        'user.id': request.userId ?? undefined,
        'git.sha': request.gitSha,
        'deployment.environment': request.appEnv,
    };
}

/**
 * Open the request span when the request is sampled and a tracer exists.
 */
export function startRequestSpan(tracer: Tracer | null, request: RequestContext): TraceScope | null {
    if (!tracer || !request.traceEnabled) return null;

    const span = tracer.startSpan(REQUEST_SPAN_NAME, {
        attributes: {
            ...correlationAttributes(request),
            tags: [request.appEnv, 'graph:agent_orchestration'],
        },
    });
    return { span, context: trace.setSpan(otelContext.active(), span) };
}

/**
 * Call the model once. Never throws: failures are returned as `err`.
 */
export async function invokeModel(
    provider: LLMProvider,
    messages: readonly ChatMessage[],
    options: ModelOptions,
    invocation: InvocationConfig,
): Promise<Result<ChatResponse, ProviderError>> {
    const { metadata } = invocation;
    const span = invocation.tracer?.startSpan(
        `llm.${invocation.node}`,
        {
            attributes: {
                'request.id': metadata.requestId,
                'thread.id': metadata.threadId,
                'user.id': metadata.userId ?? undefined,
                'git.sha': metadata.gitSha,
                node: metadata.node,
                tags: [...invocation.tags],
                'llm.provider': provider.name,
                'llm.request.model': options.model,
                'llm.request.messages': messages.length,
            },
        },
        invocation.parent ?? otelContext.active(),
    );

    try {
        const response = await provider.chat(messages, {
            ...options,
            correlation: invocation.correlation,
        });
        span?.setAttributes({
            'llm.response.model': response.model,
            'llm.usage.total_tokens': response.usage.totalTokens,
        });
        span?.setStatus({ code: SpanStatusCode.OK });
        return ok(response);
    } catch (caught) {
        const error = caught instanceof ProviderError
            ? caught
            : new ProviderError(describeError(caught), { node: invocation.node });
        span?.recordException(error);
        span?.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        return err(error);
    } finally {
        span?.end();
    }
}
