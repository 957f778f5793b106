/**
 * Tests for the agent system runner.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    createAgentSystem,
    runAgentSystem,
    validateUserRequest,
    type AgentSystemDeps,
} from '../../../src/core/workflow/runner.js';
import { createAgentGraph } from '../../../src/agents/factory.js';
import { InMemoryPersonalizationStore } from '../../../src/core/personalization/store.js';
import { getDefaultConfig } from '../../../src/core/config/manager.js';
import { clearProviderCache } from '../../../src/providers/registry.js';
import { ProviderError } from '../../../src/core/errors.js';
import { VALIDATION_MESSAGE } from '../../../src/prompts/library.js';
import { FakeProvider, type FakeReply } from '../../helpers/fake-provider.js';
import { createTestTracing } from '../../helpers/tracing.js';
import { testRuntime } from '../../helpers/state.js';

function depsFor(replies: FakeReply[], overrides: Partial<AgentSystemDeps> = {}) {
    const provider = new FakeProvider(replies);
    let n = 0;
    const deps: AgentSystemDeps = {
        app: { env: 'dev', gitSha: 'abc1234' },
        sampling: { allowPii: false },
        store: new InMemoryPersonalizationStore(),
        getGraph: () => createAgentGraph(testRuntime(provider, overrides.tracer ?? null)),
        tracer: null,
        random: () => 0,
        generateId: () => `gen-${++n}`,
        ...overrides,
    };
    return { provider, deps };
}

beforeEach(() => {
    clearProviderCache();
});

describe('validateUserRequest', () => {
    it('rejects blank requests', () => {
        expect(validateUserRequest('')).toBe(VALIDATION_MESSAGE);
        expect(validateUserRequest(' \n\t')).toBe(VALIDATION_MESSAGE);
    });

    it('accepts anything with content', () => {
        expect(validateUserRequest('hi')).toBeNull();
    });
});

describe('runAgentSystem', () => {
    it('returns an incomplete result for a blank request without touching the model', async () => {
        const { provider, deps } = depsFor(['planner']);
        const getGraph = vi.fn(deps.getGraph);

        const result = await runAgentSystem({ userRequest: '   ' }, { ...deps, getGraph });

        expect(result).toEqual({
            messages: [],
            userRequest: '   ',
            selectedAgent: null,
            agentResponse: VALIDATION_MESSAGE,
            taskCompleted: false,
        });
        expect(getGraph).not.toHaveBeenCalled();
        expect(provider.calls).toHaveLength(0);
    });

    it('routes a roadmap request to the planner', async () => {
        const { provider, deps } = depsFor(['planner', '1개월차: 주 3회 걷기']);

        const result = await runAgentSystem({ userRequest: 'make me a 6-month roadmap' }, deps);

        expect(result.selectedAgent).toBe('planner');
        expect(result.agentResponse).toBe('1개월차: 주 3회 걷기');
        expect(result.taskCompleted).toBe(true);
        expect(result.messages.map((m) => m.content)).toEqual([
            'make me a 6-month roadmap',
            '[Orchestrator] 선택된 에이전트: planner',
            '[PLANNER]\n1개월차: 주 3회 걷기',
        ]);
        expect(provider.calls).toHaveLength(2);
    });

    it('gives an anonymous request a generated thread id', async () => {
        const { deps } = depsFor(['coach', 'ok']);
        const result = await runAgentSystem({ userRequest: '조언해줘' }, deps);

        expect(result.context).toEqual({
            requestId: 'gen-1',
            threadId: 'gen-2',
            userId: null,
            appEnv: 'dev',
            gitSha: 'abc1234',
            traceEnabled: true,
        });
    });

    it('records the payload and injects the summary into both calls', async () => {
        const { provider, deps } = depsFor(['coach', 'ok']);

        const result = await runAgentSystem(
            {
                userRequest: '오늘 뭐 하지',
                userId: 'user-7',
                userPayload: {
                    preferences: { 운동_선호: '걷기' },
                    event: { mission: '스트레칭', mission_result: 'success' },
                },
            },
            deps,
        );

        const expectedSummary = [
            '유저 컨텍스트 요약:',
            '- 선호/기본값: 운동_선호:걷기',
            '- 최근 기록(최대 3건): 미션:스트레칭 / 결과:success',
            '- 누적 통계: 성공 1회 / 실패 0회',
            '이 정보를 고려해 개인화된 답변을 제공하세요.',
        ].join('\n');

        expect(provider.calls[0]?.messages[1]).toEqual({ role: 'system', content: expectedSummary });
        expect(provider.calls[1]?.messages[1]).toEqual({ role: 'system', content: expectedSummary });
        expect(result.context?.threadId).toBe('user-7');
        expect(result.context?.traceEnabled).toBe(false);
    });

    it('passes the same correlation to every call of a request', async () => {
        const { provider, deps } = depsFor(['analysis', 'ok']);
        await runAgentSystem({ userRequest: '분석해줘', userId: 'user-7' }, deps);

        const expected = { requestId: 'gen-1', threadId: 'user-7', userId: 'user-7' };
        expect(provider.calls[0]?.options?.correlation).toEqual(expected);
        expect(provider.calls[1]?.options?.correlation).toEqual(expected);
    });

    it('traces both calls under one request span when sampled', async () => {
        const { tracer, exporter } = createTestTracing();
        const { deps } = depsFor(['coach', 'ok'], { tracer });

        await runAgentSystem({ userRequest: '가이드 부탁해' }, deps);

        const spans = exporter.getFinishedSpans();
        expect(spans.map((s) => s.name).sort()).toEqual(['agent_orchestration', 'llm.classifier', 'llm.coach']);

        const root = spans.find((s) => s.name === 'agent_orchestration');
        for (const span of spans.filter((s) => s.name.startsWith('llm.'))) {
            expect(span.parentSpanContext?.spanId).toBe(root?.spanContext().spanId);
            expect(span.attributes['request.id']).toBe('gen-1');
        }
        expect(root?.attributes['agent.selected']).toBe('coach');
    });

    it('emits no spans when the draw misses', async () => {
        const { tracer, exporter } = createTestTracing();
        const { deps } = depsFor(['coach', 'ok'], {
            tracer,
            app: { env: 'prod', gitSha: 'abc1234' },
            random: () => 0.5,
        });

        const result = await runAgentSystem({ userRequest: '가이드 부탁해' }, deps);

        expect(result.context?.traceEnabled).toBe(false);
        expect(exporter.getFinishedSpans()).toHaveLength(0);
    });
});

describe('createAgentSystem', () => {
    it('fails fast when the provider has no credential', async () => {
        const system = createAgentSystem(getDefaultConfig(), { tracer: null });

        await expect(system.run({ userRequest: '계획 세워줘' })).rejects.toThrow(
            new ProviderError('Upstage provider is not configured. Set UPSTAGE_API_KEY.'),
        );
    });

    it('still answers blank requests without a credential', async () => {
        const system = createAgentSystem(getDefaultConfig(), { tracer: null });
        const result = await system.run({ userRequest: '' });
        expect(result.taskCompleted).toBe(false);
    });

    it('uses the configured model and shares one store across requests', async () => {
        const provider = new FakeProvider(['coach', 'first', 'coach', 'second']);
        const config = getDefaultConfig({ llm: { model: 'solar-mini', maxTokens: 256 } });
        const system = createAgentSystem(config, { provider, tracer: null });

        await system.run({ userRequest: '조언', userId: 'u1', userPayload: { event: { mission_result: 'fail' } } });
        await system.run({ userRequest: '조언', userId: 'u1' });

        expect(provider.calls[0]?.options?.model).toBe('solar-mini');
        expect(provider.calls[0]?.options?.maxTokens).toBe(256);
        expect(await system.store.summarize('u1')).toContain('- 누적 통계: 성공 0회 / 실패 1회');
    });
});
