/**
 * Conversation state and runtime builders for agent tests.
 */

import type { Tracer } from '@opentelemetry/api';
import type { AgentRuntime } from '../../src/agents/base.js';
import type { LLMProvider } from '../../src/providers/types.js';
import { createRequestContext } from '../../src/core/workflow/context.js';
import { createInitialState, type ConversationState } from '../../src/core/workflow/state.js';

export function testRuntime(provider: LLMProvider, tracer: Tracer | null = null): AgentRuntime {
    return { provider, tracer, model: { model: 'solar-pro2', maxTokens: 512 } };
}

export function testState(userRequest: string, summary = '', traceEnabled = false): ConversationState {
    const context = createRequestContext(
        { userId: 'user-1', appEnv: 'dev', gitSha: 'abc1234', traceEnabled },
        () => 'req-0001',
    );
    return createInitialState(userRequest, summary, context);
}
