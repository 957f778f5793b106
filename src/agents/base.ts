/**
 * Agent base classes — the shared shape of every graph node that calls the model.
 *
 * A node receives the conversation state, calls the model at most once through
 * the instrumented invoker, and returns a new state. Model failures arrive as
 * an `err` result; each node decides its own fallback.
 *
 * Dependency direction: agents/base.ts → tracing/invoke, prompts, workflow/state
 * Used by: classifier, role agents, factory
 */

import type { Context, Tracer } from '@opentelemetry/api';
import type { ChatMessage, ChatResponse, LLMProvider } from '../providers/types.js';
import type { ConversationState } from '../core/workflow/state.js';
import { appendAssistantMessage, resolveUserRequest } from '../core/workflow/state.js';
import type { ProviderError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import { buildInvocationConfig, invokeModel, type ModelOptions } from '../core/tracing/invoke.js';
import { buildMessages, composeRolePrompt, ERROR_RESPONSE } from '../prompts/library.js';
import { logger, type ScopedLogger } from '../utils/logger.js';
import { AGENT_NODE_LABELS, type AgentKind, type AgentNode } from './types.js';

/** Handles every agent shares: the model client, the tracer and model parameters. */
export interface AgentRuntime {
    readonly provider: LLMProvider;
    readonly tracer: Tracer | null;
    readonly model: ModelOptions;
}

export abstract class BaseAgent {
    public readonly node: AgentNode;
    protected readonly runtime: AgentRuntime;

    constructor(node: AgentNode, runtime: AgentRuntime) {
        this.node = node;
        this.runtime = runtime;
    }

    /**
     * Run this node.
     *
     * @param parent - Trace context of the request span, when the request is sampled
     */
    abstract run(state: ConversationState, parent?: Context): Promise<ConversationState>;

    /** Build the system prompt that defines this node's behavior. */
    protected abstract buildSystemPrompt(): string;

    protected invoke(
        messages: readonly ChatMessage[],
        state: ConversationState,
        parent?: Context,
    ): Promise<Result<ChatResponse, ProviderError>> {
        const invocation = buildInvocationConfig(state.context, this.node, this.runtime.tracer, parent);
        return invokeModel(this.runtime.provider, messages, this.runtime.model, invocation);
    }

    protected logFor(state: ConversationState): ScopedLogger {
        return logger.forRequest(state.context.requestId);
    }

    protected get label(): string {
        return AGENT_NODE_LABELS[this.node];
    }
}

/**
 * A role agent answers the request with its own system prompt.
 *
 * On a failed model call the answer is a fixed apology; the task is marked
 * complete either way.
 */
export abstract class RoleAgent extends BaseAgent {
    public readonly kind: AgentKind;

    constructor(kind: AgentKind, runtime: AgentRuntime) {
        super(kind, runtime);
        this.kind = kind;
    }

    async run(state: ConversationState, parent?: Context): Promise<ConversationState> {
        const log = this.logFor(state);
        const userRequest = resolveUserRequest(state);
        log.debug(`${this.label} starting (request length ${userRequest.length})`);

        const messages = buildMessages(this.buildSystemPrompt(), state.userContextSummary, userRequest);
        const result = await this.invoke(messages, state, parent);

        let agentResponse: string;
        if (result.ok) {
            agentResponse = result.value.content;
            log.debug(`${this.label} complete (${result.value.usage.totalTokens} tokens)`);
        } else {
            agentResponse = ERROR_RESPONSE;
            log.warn(`${this.label} failed, answering with fallback: ${result.error.message}`);
        }

        return {
            ...state,
            agentResponse,
            taskCompleted: true,
            messages: appendAssistantMessage(state, `[${this.kind.toUpperCase()}]\n${agentResponse}`),
        };
    }

    protected buildSystemPrompt(): string {
        return composeRolePrompt(this.kind);
    }
}
