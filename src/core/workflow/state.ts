/**
 * Conversation state threaded through the orchestration graph.
 *
 * Nodes never mutate a state: each returns a new one with its own fields
 * updated and, at most, messages appended.
 *
 * Dependency direction: state.ts → providers/types, agents/types, workflow/context
 * Used by: agents, engine, runner
 */

import type { AgentKind } from '../../agents/types.js';
import type { ChatMessage } from '../../providers/types.js';
import type { RequestContext } from './context.js';

export interface ConversationState {
    /** Transcript; append-only. */
    readonly messages: readonly ChatMessage[];
    /** The original request text. */
    readonly userRequest: string;
    /** Personalization summary injected into prompts, or ''. */
    readonly userContextSummary: string;
    /** Null until the classifier has run. */
    readonly selectedAgent: AgentKind | null;
    readonly agentResponse: string;
    readonly taskCompleted: boolean;
    readonly context: RequestContext;
}

export function createInitialState(
    userRequest: string,
    userContextSummary: string,
    context: RequestContext,
): ConversationState {
    return {
        messages: [{ role: 'user', content: userRequest }],
        userRequest,
        userContextSummary,
        selectedAgent: null,
        agentResponse: '',
        taskCompleted: false,
        context,
    };
}

/** The request text, or the most recent user message when the field is blank. */
export function resolveUserRequest(state: ConversationState): string {
    if (state.userRequest.trim()) return state.userRequest;

    for (let i = state.messages.length - 1; i >= 0; i--) {
        const message = state.messages[i];
        if (message?.role === 'user') return message.content;
    }
    return '';
}

/** A new transcript with an assistant message appended. */
export function appendAssistantMessage(
    state: ConversationState,
    content: string,
): readonly ChatMessage[] {
    return [...state.messages, { role: 'assistant', content }];
}
