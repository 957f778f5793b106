/**
 * Tests for the coaching service.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CoachingService, missionOutcomeEvent, onboardingPreferences } from '../../src/services/coaching.js';
import { createAgentSystem, type AgentSystem } from '../../src/core/workflow/runner.js';
import { getDefaultConfig } from '../../src/core/config/manager.js';
import { InMemoryPersonalizationStore } from '../../src/core/personalization/store.js';
import { ContractError, ValidationError } from '../../src/core/errors.js';
import type { DailyFeedbackRequest, DailyMissionRequest } from '../../src/services/schemas.js';
import { FakeProvider } from '../helpers/fake-provider.js';

const MISSION_REQUEST: DailyMissionRequest = {
    userId: 42,
    onboarding: {
        appGoal: '체중 감량',
        workTimeType: 'FIXED',
        availableStartTime: '19:00',
        availableEndTime: '21:30',
        minExerciseMinutes: 10,
        preferredExercises: ['걷기', '요가'],
        lifestyleType: 'IRREGULAR_OVERTIME',
    },
    recentMissionHistory: [
        { date: '2026-10-01', missionType: 'EXERCISE', difficulty: 2, result: 'FAILURE', failureReason: '야근' },
    ],
    weeklyFailureReasons: ['야근'],
};

const FEEDBACK_REQUEST: DailyFeedbackRequest = {
    userId: 42,
    targetDate: '2026-10-02',
    todayMission: { missionType: 'EXERCISE', difficulty: 2, result: 'FAILURE', failureReason: '피곤함' },
    recentSummary: { successDays: 3, failureDays: 2 },
};

function fenced(body: unknown): string {
    return `결과입니다.\n\`\`\`json\n${JSON.stringify(body)}\n\`\`\``;
}

let provider: FakeProvider;
let store: InMemoryPersonalizationStore;
let system: AgentSystem;

function serviceWith(replies: string[]): CoachingService {
    provider = new FakeProvider(replies);
    store = new InMemoryPersonalizationStore();
    system = createAgentSystem(getDefaultConfig(), { provider, store, tracer: null });
    return new CoachingService(system);
}

beforeEach(() => {
    serviceWith([]);
});

describe('onboardingPreferences', () => {
    it('flattens onboarding data into string preferences', () => {
        expect(onboardingPreferences(MISSION_REQUEST)).toEqual({
            appGoal: '체중 감량',
            workTimeType: 'FIXED',
            availableTime: '19:00-21:30',
            minExerciseMinutes: '10',
            preferredExercises: '걷기, 요가',
            lifestyleType: 'IRREGULAR_OVERTIME',
        });
    });
});

describe('missionOutcomeEvent', () => {
    it('maps the mission result onto the store markers', () => {
        expect(missionOutcomeEvent(FEEDBACK_REQUEST)).toEqual({
            mission: 'EXERCISE (난이도 2)',
            mission_result: 'fail',
            fail_reason: '피곤함',
            schedule: '2026-10-02',
        });
    });
});

describe('CoachingService.recommendDailyMissions', () => {
    it('returns the missions from the fenced reply', async () => {
        const missions = [
            { name: '저녁 10분 걷기', type: 'EXERCISE', difficulty: 1, estimatedMinutes: 10, estimatedCalories: 40 },
        ];
        const service = serviceWith(['planner', fenced({ missions })]);

        await expect(service.recommendDailyMissions(MISSION_REQUEST)).resolves.toEqual({ missions });
    });

    it('records onboarding as preferences under the numeric user id', async () => {
        const service = serviceWith(['planner', fenced({ missions: [] })]);
        await service.recommendDailyMissions(MISSION_REQUEST);

        const record = await store.snapshot('42');
        expect(record?.preferences.appGoal).toBe('체중 감량');
        expect(record?.events).toEqual([]);
    });

    it('rejects a malformed request before calling the model', async () => {
        const service = serviceWith(['planner']);
        const bad = { ...MISSION_REQUEST, onboarding: { ...MISSION_REQUEST.onboarding, availableStartTime: '7pm' } };

        await expect(service.recommendDailyMissions(bad)).rejects.toBeInstanceOf(ValidationError);
        expect(provider.calls).toHaveLength(0);
    });

    it('throws ContractError when difficulty is out of range', async () => {
        const missions = [{ name: 'x', type: 'DIET', difficulty: 9, estimatedMinutes: 5, estimatedCalories: 0 }];
        const service = serviceWith(['planner', fenced({ missions })]);

        await expect(service.recommendDailyMissions(MISSION_REQUEST)).rejects.toBeInstanceOf(ContractError);
    });

    it('throws ContractError when the agent falls back to the apology', async () => {
        const service = serviceWith(['planner']);
        await expect(service.recommendDailyMissions(MISSION_REQUEST)).rejects.toBeInstanceOf(ContractError);
    });
});

describe('CoachingService.generateDailyFeedback', () => {
    it('records the outcome and returns the feedback', async () => {
        const body = {
            feedbackText: '피곤한 날에는 5분만 해도 충분해요.',
            encouragementCandidates: [{ intent: 'RETRY', title: '다시 해봐요', message: '내일은 가볍게 시작해요.' }],
        };
        const service = serviceWith(['analysis', fenced(body)]);

        await expect(service.generateDailyFeedback(FEEDBACK_REQUEST)).resolves.toEqual(body);

        const record = await store.snapshot('42');
        expect(record?.stats).toEqual({ success: 0, fail: 1 });
        expect(provider.calls[1]?.messages[1]?.content).toContain('미션:EXERCISE (난이도 2) / 결과:fail / 실패이유:피곤함');
    });
});

describe('CoachingService.analyzeWeek', () => {
    it('returns the weekly analysis', async () => {
        const body = { mainFailureReason: '야근', overallFeedback: '퇴근 후 짧은 루틴을 추천해요.' };
        const service = serviceWith(['analysis', fenced(body)]);

        await expect(service.analyzeWeek({
            userId: 42,
            weekRange: { start: '2026-09-28', end: '2026-10-04' },
            weeklyStats: { totalDays: 7, successDays: 4, failureDays: 3 },
            failureReasonsRanked: [{ reason: '야근', count: 2 }],
        })).resolves.toEqual(body);
    });
});

describe('CoachingService chat', () => {
    it('starts a session', async () => {
        const body = { botMessage: { messageId: 1, text: '안녕하세요!', options: [] } };
        const service = serviceWith(['coach', fenced(body)]);

        await expect(service.startChatSession({
            sessionId: 5,
            userId: 42,
            initialContext: { appGoal: '근력 향상', lifestyleType: 'REGULAR_DAYTIME' },
        })).resolves.toEqual(body);
        expect((await store.snapshot('42'))?.preferences).toEqual({
            appGoal: '근력 향상',
            lifestyleType: 'REGULAR_DAYTIME',
        });
    });

    it('replies to a message', async () => {
        const body = {
            botMessage: { messageId: 2, text: '좋아요!', options: [{ label: '네', value: 'YES' }] },
            state: { isTerminal: true },
        };
        const service = serviceWith(['coach', fenced(body)]);

        await expect(service.replyToChatMessage({
            sessionId: 5,
            userId: 42,
            input: { type: 'OPTION', value: 'GOOD' },
            timestamp: '2026-10-02T09:00:00+09:00',
        })).resolves.toEqual(body);
    });

    it('rejects a text input without text', async () => {
        await expect(serviceWith([]).replyToChatMessage({
            sessionId: 5,
            userId: 42,
            input: { type: 'TEXT' },
            timestamp: '2026-10-02T09:00:00+09:00',
        })).rejects.toBeInstanceOf(ValidationError);
    });
});
