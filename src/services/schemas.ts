/**
 * Request and response contracts of the coaching services.
 *
 * Requests are validated before any model call; responses are validated
 * after the model's JSON has been extracted.
 *
 * Dependency direction: schemas.ts → zod
 * Used by: coaching service, response parser, CLI
 */

import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date (YYYY-MM-DD)');
const clockTime = z.string().regex(/^\d{2}:\d{2}(:\d{2})?$/, 'Expected a time (HH:MM or HH:MM:SS)');
const difficulty = z.number().int().min(1).max(5);
const userId = z.number().int();

// ── Shared enums ──

export const workTimeTypeSchema = z.enum(['FIXED', 'SHIFT']);
export const lifestyleTypeSchema = z.enum([
    'REGULAR_DAYTIME',
    'IRREGULAR_OVERTIME',
    'SHIFT_NIGHT',
    'VARIABLE_DAILY',
]);
export const missionTypeSchema = z.enum(['EXERCISE', 'DIET']);
export const missionResultSchema = z.enum(['SUCCESS', 'FAILURE']);
export const intentSchema = z.enum(['PRAISE', 'RETRY', 'NORMAL', 'PUSH']);

// ── Daily missions ──

export const onboardingSchema = z.object({
    appGoal: z.string().min(1),
    workTimeType: workTimeTypeSchema,
    availableStartTime: clockTime,
    availableEndTime: clockTime,
    minExerciseMinutes: z.number().int().nonnegative(),
    preferredExercises: z.array(z.string()),
    lifestyleType: lifestyleTypeSchema,
});

export const missionHistoryItemSchema = z.object({
    date: isoDate,
    missionType: missionTypeSchema,
    difficulty,
    result: missionResultSchema,
    failureReason: z.string().nullish(),
});

export const dailyMissionRequestSchema = z.object({
    userId,
    onboarding: onboardingSchema,
    recentMissionHistory: z.array(missionHistoryItemSchema),
    weeklyFailureReasons: z.array(z.string()),
});

export const missionSchema = z.object({
    name: z.string().min(1),
    type: missionTypeSchema,
    difficulty,
    estimatedMinutes: z.number().int().nonnegative(),
    estimatedCalories: z.number().int().nonnegative(),
});

export const dailyMissionResponseSchema = z.object({
    missions: z.array(missionSchema),
});

// ── Daily feedback ──

export const todayMissionSchema = z.object({
    missionType: missionTypeSchema,
    difficulty,
    result: missionResultSchema,
    failureReason: z.string().nullish(),
});

export const dailyFeedbackRequestSchema = z.object({
    userId,
    targetDate: isoDate,
    todayMission: todayMissionSchema,
    recentSummary: z.object({
        successDays: z.number().int().nonnegative(),
        failureDays: z.number().int().nonnegative(),
    }),
});

export const dailyFeedbackResponseSchema = z.object({
    feedbackText: z.string().min(1),
    encouragementCandidates: z.array(
        z.object({
            intent: intentSchema,
            title: z.string(),
            message: z.string(),
        }),
    ),
});

// ── Weekly analysis ──

export const weeklyAnalysisRequestSchema = z.object({
    userId,
    weekRange: z.object({ start: isoDate, end: isoDate }),
    weeklyStats: z.object({
        totalDays: z.number().int().nonnegative(),
        successDays: z.number().int().nonnegative(),
        failureDays: z.number().int().nonnegative(),
    }),
    failureReasonsRanked: z.array(
        z.object({
            reason: z.string(),
            count: z.number().int().nonnegative(),
        }),
    ),
});

export const weeklyAnalysisResponseSchema = z.object({
    mainFailureReason: z.string(),
    overallFeedback: z.string().min(1),
});

// ── Chat ──

export const botMessageSchema = z.object({
    messageId: z.number().int(),
    text: z.string().min(1),
    options: z.array(z.object({ label: z.string(), value: z.string() })),
});

export const chatSessionRequestSchema = z.object({
    sessionId: z.number().int(),
    userId,
    initialContext: z.object({
        appGoal: z.string().min(1),
        lifestyleType: lifestyleTypeSchema,
    }),
});

export const chatSessionResponseSchema = z.object({
    botMessage: botMessageSchema,
});

export const chatInputSchema = z
    .object({
        type: z.enum(['TEXT', 'OPTION']),
        text: z.string().nullish(),
        value: z.string().nullish(),
    })
    .refine((input) => (input.type === 'TEXT' ? Boolean(input.text) : Boolean(input.value)), {
        message: 'TEXT input needs text; OPTION input needs value',
    });

export const chatMessageRequestSchema = z.object({
    sessionId: z.number().int(),
    userId,
    input: chatInputSchema,
    timestamp: z.string().datetime({ offset: true }),
});

export const chatMessageResponseSchema = z.object({
    botMessage: botMessageSchema,
    state: z.object({ isTerminal: z.boolean() }),
});

export type DailyMissionRequest = z.infer<typeof dailyMissionRequestSchema>;
export type DailyMissionResponse = z.infer<typeof dailyMissionResponseSchema>;
export type Mission = z.infer<typeof missionSchema>;
export type DailyFeedbackRequest = z.infer<typeof dailyFeedbackRequestSchema>;
export type DailyFeedbackResponse = z.infer<typeof dailyFeedbackResponseSchema>;
export type WeeklyAnalysisRequest = z.infer<typeof weeklyAnalysisRequestSchema>;
export type WeeklyAnalysisResponse = z.infer<typeof weeklyAnalysisResponseSchema>;
export type ChatSessionRequest = z.infer<typeof chatSessionRequestSchema>;
export type ChatSessionResponse = z.infer<typeof chatSessionResponseSchema>;
export type ChatMessageRequest = z.infer<typeof chatMessageRequestSchema>;
export type ChatMessageResponse = z.infer<typeof chatMessageResponseSchema>;
