/**
 * Agent system runner: the single entry point for one request.
 *
 * 1. Validates the request; a blank one returns an incomplete result with
 *    no model call.
 * 2. Resolves the compiled graph (and with it the provider; a missing
 *    credential is fatal here).
 * 3. Updates and summarizes the user's personalization record.
 * 4. Builds the request context and takes the sampling decision.
 * 5. Runs the graph, under the request span when the request is traced.
 *
 * Dependency direction: runner.ts → engine, agents/factory, personalization, tracing, config
 * Used by: services, CLI
 */

import { randomUUID } from 'node:crypto';
import { SpanStatusCode, type Tracer } from '@opentelemetry/api';
import type { AgentKind } from '../../agents/types.js';
import { createAgentGraph } from '../../agents/factory.js';
import type { ChatMessage, LLMProvider } from '../../providers/types.js';
import { createProvider } from '../../providers/registry.js';
import { VALIDATION_MESSAGE } from '../../prompts/library.js';
import { InMemoryPersonalizationStore } from '../personalization/store.js';
import type { PersonalizationPayload, PersonalizationStore } from '../personalization/types.js';
import { shouldTraceRequest } from '../tracing/sampling.js';
import { getTracer } from '../tracing/tracer.js';
import { startRequestSpan } from '../tracing/invoke.js';
import { getConfig, resolveModel } from '../config/manager.js';
import type { AppConfig, AppInfo } from '../config/types.js';
import { describeError } from '../errors.js';
import { logger } from '../../utils/logger.js';
import { createRequestContext, type RequestContext } from './context.js';
import { runGraph, type AgentGraph } from './engine.js';
import { createInitialState } from './state.js';

export interface AgentSystemInput {
    userRequest: string;
    userId?: string | null;
    userPayload?: PersonalizationPayload;
}

export interface AgentSystemResult {
    messages: readonly ChatMessage[];
    userRequest: string;
    selectedAgent: AgentKind | null;
    agentResponse: string;
    taskCompleted: boolean;
    /** Absent when the request was rejected before any node ran. */
    context?: RequestContext;
}

/** Sampling parameters read from configuration. */
export interface SamplingSettings {
    sampleRate?: number;
    allowPii: boolean;
}

export interface AgentSystemDeps {
    app: AppInfo;
    sampling: SamplingSettings;
    store: PersonalizationStore;
    /** Returns the compiled graph; throws when the provider cannot be built. */
    getGraph: () => AgentGraph;
    tracer: Tracer | null;
    random?: () => number;
    generateId?: () => string;
}

/** The validation message for a blank request, or null when it is usable. */
export function validateUserRequest(userRequest: string): string | null {
    if (!userRequest.trim()) {
        return VALIDATION_MESSAGE;
    }
    return null;
}

/**
 * Route one request through the agent graph.
 *
 * @throws {ProviderError} when the provider has no credentials
 */
export async function runAgentSystem(
    input: AgentSystemInput,
    deps: AgentSystemDeps,
): Promise<AgentSystemResult> {
    const { userRequest } = input;
    const userId = input.userId || null;

    const validationError = validateUserRequest(userRequest);
    if (validationError) {
        logger.debug('Rejected blank request');
        return {
            messages: [],
            userRequest,
            selectedAgent: null,
            agentResponse: validationError,
            taskCompleted: false,
        };
    }

    const graph = deps.getGraph();

    if (userId) {
        await deps.store.update(userId, input.userPayload);
    }

    const userContextSummary = await deps.store.summarize(userId);
    const traceEnabled = shouldTraceRequest(
        {
            appEnv: deps.app.env,
            userContextSummary,
            sampleRate: deps.sampling.sampleRate,
            allowPii: deps.sampling.allowPii,
        },
        deps.random,
    );

    const context = createRequestContext(
        { userId, appEnv: deps.app.env, gitSha: deps.app.gitSha, traceEnabled },
        deps.generateId ?? randomUUID,
    );
    const log = logger.forRequest(context.requestId);
    log.debug(`Request started (thread ${context.threadId}, traced: ${traceEnabled})`);

    const scope = startRequestSpan(deps.tracer, context);
    try {
        const final = await runGraph(
            graph,
            createInitialState(userRequest, userContextSummary, context),
            scope?.context,
        );
        scope?.span.setAttribute('agent.selected', final.selectedAgent ?? '');
        scope?.span.setStatus({ code: SpanStatusCode.OK });
        log.debug(`Request finished by ${final.selectedAgent ?? 'no agent'}`);

        return {
            messages: final.messages,
            userRequest: final.userRequest,
            selectedAgent: final.selectedAgent,
            agentResponse: final.agentResponse,
            taskCompleted: final.taskCompleted,
            context,
        };
    } catch (error) {
        scope?.span.setStatus({ code: SpanStatusCode.ERROR, message: describeError(error) });
        throw error;
    } finally {
        scope?.span.end();
    }
}

/** A configured agent system bound to its store, tracer and graph. */
export interface AgentSystem {
    readonly store: PersonalizationStore;
    run(input: AgentSystemInput): Promise<AgentSystemResult>;
}

export interface AgentSystemOverrides {
    store?: PersonalizationStore;
    /** Pass null to disable tracing regardless of configuration. */
    tracer?: Tracer | null;
    provider?: LLMProvider;
}

/**
 * Wire an agent system from configuration. The provider and graph are built
 * on the first valid request.
 */
export function createAgentSystem(config: AppConfig, overrides: AgentSystemOverrides = {}): AgentSystem {
    const store = overrides.store ?? new InMemoryPersonalizationStore();
    const tracer = overrides.tracer !== undefined ? overrides.tracer : getTracer(config);
    let graph: AgentGraph | null = null;

    const getGraph = (): AgentGraph => {
        if (!graph) {
            const provider = overrides.provider ?? createProvider(config.llm.provider, config.providers);
            graph = createAgentGraph({
                provider,
                tracer,
                model: {
                    model: resolveModel(config),
                    temperature: config.llm.temperature,
                    maxTokens: config.llm.maxTokens,
                },
            });
            logger.debug(`Agent graph compiled (${provider.name}, ${resolveModel(config)})`);
        }
        return graph;
    };

    return {
        store,
        run: (input) =>
            runAgentSystem(input, {
                app: config.app,
                sampling: {
                    sampleRate: config.tracing.sampleRate,
                    allowPii: config.tracing.allowPii,
                },
                store,
                getGraph,
                tracer,
            }),
    };
}

let sharedSystem: AgentSystem | null = null;

/** The process-wide agent system, configured from the environment on first use. */
export function getAgentSystem(): AgentSystem {
    if (!sharedSystem) {
        sharedSystem = createAgentSystem(getConfig());
    }
    return sharedSystem;
}

/** Drop the process-wide agent system (useful for testing). */
export function resetAgentSystem(): void {
    sharedSystem = null;
}
