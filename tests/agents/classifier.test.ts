/**
 * Tests for request classification.
 */

import { describe, it, expect } from 'vitest';
import { ClassifierAgent, fallbackAgentChoice, parseAgentChoice } from '../../src/agents/classifier.js';
import { ORCHESTRATOR_SYSTEM_PROMPT } from '../../src/prompts/library.js';
import { ProviderError } from '../../src/core/errors.js';
import { FakeProvider } from '../helpers/fake-provider.js';
import { testRuntime, testState } from '../helpers/state.js';

describe('parseAgentChoice', () => {
    it('matches labels case-insensitively inside longer replies', () => {
        expect(parseAgentChoice('Planner')).toBe('planner');
        expect(parseAgentChoice('  "COACH"\n')).toBe('coach');
        expect(parseAgentChoice('I choose analysis.')).toBe('analysis');
    });

    it('prefers planner over coach over analysis', () => {
        expect(parseAgentChoice('coach or planner')).toBe('planner');
        expect(parseAgentChoice('analysis, maybe coach')).toBe('coach');
    });

    it('returns null when no label is present', () => {
        expect(parseAgentChoice('모르겠어요')).toBeNull();
        expect(parseAgentChoice('')).toBeNull();
    });
});

describe('fallbackAgentChoice', () => {
    it('routes planning words to planner', () => {
        expect(fallbackAgentChoice('다음 달 운동 계획 세워줘')).toBe('planner');
        expect(fallbackAgentChoice('Make me a 6-month ROADMAP')).toBe('planner');
    });

    it('routes coaching words to coach', () => {
        expect(fallbackAgentChoice('스쿼트 자세 조언 부탁해')).toBe('coach');
        expect(fallbackAgentChoice('Any advice for running?')).toBe('coach');
    });

    it('checks planner keywords before coach keywords', () => {
        expect(fallbackAgentChoice('코칭 전략이 필요해')).toBe('planner');
    });

    it('defaults to analysis', () => {
        expect(fallbackAgentChoice('어제 왜 실패했을까')).toBe('analysis');
    });
});

describe('ClassifierAgent', () => {
    it('selects the label the model returns', async () => {
        const provider = new FakeProvider(['coach']);
        const state = await new ClassifierAgent(testRuntime(provider)).run(testState('계획 세워줘'));

        expect(state.selectedAgent).toBe('coach');
        expect(state.messages.at(-1)).toEqual({
            role: 'assistant',
            content: '[Orchestrator] 선택된 에이전트: coach',
        });
    });

    it('sends the orchestrator prompt, the summary and the wrapped request', async () => {
        const provider = new FakeProvider(['planner']);
        await new ClassifierAgent(testRuntime(provider)).run(testState('로드맵', 'SUMMARY'));

        expect(provider.calls[0]?.messages).toEqual([
            { role: 'system', content: ORCHESTRATOR_SYSTEM_PROMPT },
            { role: 'system', content: 'SUMMARY' },
            {
                role: 'user',
                content: '사용자 요청: 로드맵\n\n이 요청에 가장 적절한 에이전트를 선택하세요 (planner/coach/analysis 중 하나만):',
            },
        ]);
        expect(provider.calls[0]?.options?.temperature).toBe(0);
    });

    it('falls back to keywords when the reply has no label', async () => {
        const provider = new FakeProvider(['잘 모르겠습니다']);
        const state = await new ClassifierAgent(testRuntime(provider)).run(testState('6개월 로드맵'));
        expect(state.selectedAgent).toBe('planner');
    });

    it('falls back to keywords when the call fails', async () => {
        const provider = new FakeProvider([new ProviderError('Upstage API error: 503 Service Unavailable')]);
        const state = await new ClassifierAgent(testRuntime(provider)).run(testState('운동 가이드 알려줘'));
        expect(state.selectedAgent).toBe('coach');
    });

    it('resolves a blank request from the last user message', async () => {
        const provider = new FakeProvider([new ProviderError('down')]);
        const base = testState('전략 짜줘');
        const state = await new ClassifierAgent(testRuntime(provider)).run({ ...base, userRequest: '  ' });

        expect(state.userRequest).toBe('전략 짜줘');
        expect(state.selectedAgent).toBe('planner');
    });

    it('does not mutate the incoming state', async () => {
        const provider = new FakeProvider(['analysis']);
        const before = testState('분석해줘');
        await new ClassifierAgent(testRuntime(provider)).run(before);

        expect(before.selectedAgent).toBeNull();
        expect(before.messages).toHaveLength(1);
    });
});
