/**
 * Coaching service: daily missions, daily feedback, weekly analysis and chat.
 *
 * Every operation validates the request, turns it into a prompt, routes it
 * through the agent system and reads a typed JSON response out of the reply.
 * Request data that describes the user also feeds the personalization store,
 * so later requests are answered with it in context.
 *
 * Dependency direction: coaching.ts → workflow/runner, services/*, utils/validation
 * Used by: CLI `service` command, library consumers
 */

import type { z } from 'zod';
import type { AgentSystem, AgentSystemResult } from '../core/workflow/runner.js';
import type { PersonalizationPayload } from '../core/personalization/types.js';
import { logger } from '../utils/logger.js';
import { validateInput } from '../utils/validation.js';
import { parseAgentResponse } from './response-parser.js';
import {
    buildChatMessagePrompt,
    buildChatSessionPrompt,
    buildDailyFeedbackPrompt,
    buildDailyMissionPrompt,
    buildWeeklyAnalysisPrompt,
} from './prompts.js';
import {
    chatMessageRequestSchema,
    chatMessageResponseSchema,
    chatSessionRequestSchema,
    chatSessionResponseSchema,
    dailyFeedbackRequestSchema,
    dailyFeedbackResponseSchema,
    dailyMissionRequestSchema,
    dailyMissionResponseSchema,
    weeklyAnalysisRequestSchema,
    weeklyAnalysisResponseSchema,
    type ChatMessageResponse,
    type ChatSessionResponse,
    type DailyFeedbackRequest,
    type DailyFeedbackResponse,
    type DailyMissionRequest,
    type DailyMissionResponse,
    type WeeklyAnalysisResponse,
} from './schemas.js';

/** Preferences recorded from onboarding data. */
export function onboardingPreferences(request: DailyMissionRequest): Record<string, string> {
    const { onboarding } = request;
    return {
        appGoal: onboarding.appGoal,
        workTimeType: onboarding.workTimeType,
        availableTime: `${onboarding.availableStartTime}-${onboarding.availableEndTime}`,
        minExerciseMinutes: String(onboarding.minExerciseMinutes),
        preferredExercises: onboarding.preferredExercises.join(', '),
        lifestyleType: onboarding.lifestyleType,
    };
}

/** The personalization event for the day's mission outcome. */
export function missionOutcomeEvent(request: DailyFeedbackRequest): Record<string, unknown> {
    const { todayMission } = request;
    return {
        mission: `${todayMission.missionType} (난이도 ${todayMission.difficulty})`,
        mission_result: todayMission.result === 'SUCCESS' ? 'success' : 'fail',
        fail_reason: todayMission.failureReason ?? undefined,
        schedule: request.targetDate,
    };
}

export class CoachingService {
    private readonly system: Pick<AgentSystem, 'run'>;

    constructor(system: Pick<AgentSystem, 'run'>) {
        this.system = system;
    }

    /**
     * Recommend today's missions.
     *
     * @throws {ValidationError} if the request is malformed
     * @throws {ContractError} if the reply is not a valid mission list
     */
    async recommendDailyMissions(request: unknown): Promise<DailyMissionResponse> {
        const valid = validateInput(dailyMissionRequestSchema, request, 'DailyMissionRequest');
        return this.ask(
            valid.userId,
            buildDailyMissionPrompt(valid),
            { preferences: onboardingPreferences(valid) },
            dailyMissionResponseSchema,
            'DailyMissionResponse',
        );
    }

    /**
     * Feedback on one day's mission; records the outcome for personalization.
     */
    async generateDailyFeedback(request: unknown): Promise<DailyFeedbackResponse> {
        const valid = validateInput(dailyFeedbackRequestSchema, request, 'DailyFeedbackRequest');
        return this.ask(
            valid.userId,
            buildDailyFeedbackPrompt(valid),
            { event: missionOutcomeEvent(valid) },
            dailyFeedbackResponseSchema,
            'DailyFeedbackResponse',
        );
    }

    async analyzeWeek(request: unknown): Promise<WeeklyAnalysisResponse> {
        const valid = validateInput(weeklyAnalysisRequestSchema, request, 'WeeklyAnalysisRequest');
        return this.ask(
            valid.userId,
            buildWeeklyAnalysisPrompt(valid),
            undefined,
            weeklyAnalysisResponseSchema,
            'WeeklyAnalysisResponse',
        );
    }

    async startChatSession(request: unknown): Promise<ChatSessionResponse> {
        const valid = validateInput(chatSessionRequestSchema, request, 'ChatSessionRequest');
        return this.ask(
            valid.userId,
            buildChatSessionPrompt(valid),
            { preferences: { ...valid.initialContext } },
            chatSessionResponseSchema,
            'ChatSessionResponse',
        );
    }

    async replyToChatMessage(request: unknown): Promise<ChatMessageResponse> {
        const valid = validateInput(chatMessageRequestSchema, request, 'ChatMessageRequest');
        return this.ask(
            valid.userId,
            buildChatMessagePrompt(valid),
            undefined,
            chatMessageResponseSchema,
            'ChatMessageResponse',
        );
    }

    // ── Private helpers ──

    private async ask<T>(
        userId: number,
        prompt: string,
        payload: PersonalizationPayload | undefined,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        label: string,
    ): Promise<T> {
        const result: AgentSystemResult = await this.system.run({
            userRequest: prompt,
            userId: String(userId),
            userPayload: payload,
        });
        logger.debug(`${label} answered by ${result.selectedAgent ?? 'no agent'}`);
        return parseAgentResponse(result.agentResponse, schema, label);
    }
}
