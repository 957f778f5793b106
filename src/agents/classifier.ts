/**
 * Classifier agent — picks the role agent for a request.
 *
 * The model is asked for exactly one label. Its reply is matched by substring
 * in priority order planner > coach > analysis; when nothing matches, or the
 * call fails, keyword heuristics over the request decide. Classification
 * always yields a label.
 *
 * Dependency direction: classifier.ts → agents/base, prompts/library
 * Used by: agents/factory
 */

import type { Context } from '@opentelemetry/api';
import { BaseAgent, type AgentRuntime } from './base.js';
import { ALL_AGENT_KINDS, DEFAULT_AGENT, type AgentKind } from './types.js';
import { appendAssistantMessage, resolveUserRequest, type ConversationState } from '../core/workflow/state.js';
import {
    buildMessages,
    formatClassifierRequest,
    ORCHESTRATOR_SYSTEM_PROMPT,
} from '../prompts/library.js';

export const PLANNER_KEYWORDS: readonly string[] = ['계획', '전략', '로드맵', 'plan', 'strategy', 'roadmap'];
export const COACH_KEYWORDS: readonly string[] = ['코칭', '가이드', '조언', 'coach', 'guide', 'advice'];

/** First label found in the model's reply, by priority, or null. */
export function parseAgentChoice(raw: string): AgentKind | null {
    const normalized = raw.trim().toLowerCase();
    return ALL_AGENT_KINDS.find((kind) => normalized.includes(kind)) ?? null;
}

/** Keyword routing used when the model gives no usable label. */
export function fallbackAgentChoice(userRequest: string): AgentKind {
    const text = userRequest.toLowerCase();
    if (PLANNER_KEYWORDS.some((k) => text.includes(k))) return 'planner';
    if (COACH_KEYWORDS.some((k) => text.includes(k))) return 'coach';
    return DEFAULT_AGENT;
}

export class ClassifierAgent extends BaseAgent {
    constructor(runtime: AgentRuntime) {
        super('classifier', {
            ...runtime,
            model: { ...runtime.model, temperature: runtime.model.temperature ?? 0 },
        });
    }

    async run(state: ConversationState, parent?: Context): Promise<ConversationState> {
        const log = this.logFor(state);
        const userRequest = resolveUserRequest(state);
        log.debug(`${this.label} starting (request length ${userRequest.length})`);

        const messages = buildMessages(
            this.buildSystemPrompt(),
            state.userContextSummary,
            formatClassifierRequest(userRequest),
        );
        const result = await this.invoke(messages, state, parent);

        let selected: AgentKind;
        if (result.ok) {
            const parsed = parseAgentChoice(result.value.content);
            if (!parsed) {
                log.debug(`${this.label} reply had no label, using keyword routing`);
            }
            selected = parsed ?? fallbackAgentChoice(userRequest);
        } else {
            log.warn(`${this.label} call failed, using keyword routing: ${result.error.message}`);
            selected = fallbackAgentChoice(userRequest);
        }

        log.debug(`${this.label} selected ${selected}`);

        return {
            ...state,
            userRequest,
            selectedAgent: selected,
            messages: appendAssistantMessage(state, `[Orchestrator] 선택된 에이전트: ${selected}`),
        };
    }

    protected buildSystemPrompt(): string {
        return ORCHESTRATOR_SYSTEM_PROMPT;
    }
}
