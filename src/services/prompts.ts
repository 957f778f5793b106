/**
 * Request prompts of the coaching services.
 *
 * Each prompt states the caller's data, the task, and the exact JSON shape
 * the reply must take inside a ```json fence.
 *
 * Dependency direction: prompts.ts → services/schemas (types only)
 * Used by: coaching service
 */

import type {
    ChatMessageRequest,
    ChatSessionRequest,
    DailyFeedbackRequest,
    DailyMissionRequest,
    WeeklyAnalysisRequest,
} from './schemas.js';

const JSON_ONLY = '응답은 반드시 아래 JSON 형식으로만 해주세요:';

function fenced(example: unknown): string {
    return ['```json', JSON.stringify(example, null, 2), '```'].join('\n');
}

export function buildDailyMissionPrompt(request: DailyMissionRequest): string {
    return [
        `사용자 ID: ${request.userId}`,
        `온보딩 데이터: ${JSON.stringify(request.onboarding)}`,
        `최근 미션 이력: ${JSON.stringify(request.recentMissionHistory)}`,
        `주간 주요 실패 원인: ${JSON.stringify(request.weeklyFailureReasons)}`,
        '',
        '위 정보를 바탕으로 사용자에게 오늘 수행할 데일리 추천 미션 3개를 추천해주세요.',
        '미션 이름은 최대 20자 입니다.',
        '미션은 EXERCISE 또는 DIET 유형으로 구성될 수 있습니다.',
        '난이도는 1이상 5이하 정수로 표현합니다.',
        '각 미션에 대해 예상 소요 시간(분)과 예상 소모 칼로리(kcal)를 함께 알려주세요.',
        JSON_ONLY,
        fenced({
            missions: [
                { name: '미션 이름 1', type: 'EXERCISE', difficulty: 1, estimatedMinutes: 20, estimatedCalories: 80 },
                { name: '미션 이름 2', type: 'DIET', difficulty: 3, estimatedMinutes: 10, estimatedCalories: 0 },
            ],
        }),
    ].join('\n');
}

export function buildDailyFeedbackPrompt(request: DailyFeedbackRequest): string {
    return [
        `사용자 ID: ${request.userId}`,
        `분석 대상 날짜: ${request.targetDate}`,
        `해당 날짜의 미션: ${JSON.stringify(request.todayMission)}`,
        `최근 요약: 성공 ${request.recentSummary.successDays}일 / 실패 ${request.recentSummary.failureDays}일`,
        '',
        '위 정보를 바탕으로 다음 내용을 분석하여 피드백을 제공해주세요.',
        '1. 해당 날짜의 미션 수행 결과 및 최근 기록을 반영한 분석형 AI 피드백 문장을 생성해주세요. (feedbackText)',
        "2. 메인 화면에 표시할 격려/응원 메시지 후보를 생성해주세요. 각 메시지는 'intent'(PRAISE, RETRY, NORMAL, PUSH), 'title', 'message'를 포함해야 합니다. (encouragementCandidates)",
        JSON_ONLY,
        fenced({
            feedbackText: '시간 부족으로 미션을 완료하지 못했어요. 부담을 줄여 짧은 미션부터 다시 시작해보는 걸 추천해요.',
            encouragementCandidates: [
                { intent: 'PRAISE', title: '잘하고 있어요', message: '이대로만 하면 목표에 도달할 수 있어요.' },
                { intent: 'RETRY', title: '흐름은 다시 만들 수 있어요', message: '내일은 5분짜리 미션부터 가볍게 시작해봐요.' },
            ],
        }),
    ].join('\n');
}

export function buildWeeklyAnalysisPrompt(request: WeeklyAnalysisRequest): string {
    const { weeklyStats } = request;
    return [
        `사용자 ID: ${request.userId}`,
        `분석 주간: ${request.weekRange.start} ~ ${request.weekRange.end}`,
        `주간 통계: 전체 ${weeklyStats.totalDays}일 / 성공 ${weeklyStats.successDays}일 / 실패 ${weeklyStats.failureDays}일`,
        `실패 원인 순위: ${JSON.stringify(request.failureReasonsRanked)}`,
        '',
        '위 주간 데이터를 종합적으로 분석하여 사용자에게 다음 정보를 제공해주세요.',
        '1. 이번 주 가장 주요한 실패 원인 (mainFailureReason)',
        '2. 이번 주 종합 피드백 (overallFeedback)',
        JSON_ONLY,
        fenced({
            mainFailureReason: '시간 부족',
            overallFeedback: '이번 주는 시간 관리가 어려웠던 한 주였네요. 점심시간을 활용한 짧은 운동을 추천드립니다.',
        }),
    ].join('\n');
}

export function buildChatSessionPrompt(request: ChatSessionRequest): string {
    return [
        `세션 ID: ${request.sessionId}`,
        `사용자 목표: ${request.initialContext.appGoal}`,
        `생활 패턴: ${request.initialContext.lifestyleType}`,
        '',
        '새 코칭 대화를 시작하는 첫 챗봇 메시지를 생성해주세요.',
        '필요하다면 사용자에게 선택지를 제공할 수 있습니다.',
        JSON_ONLY,
        fenced({
            botMessage: {
                messageId: 1,
                text: '안녕하세요! 오늘 컨디션은 어떠세요?',
                options: [
                    { label: '좋아요', value: 'GOOD' },
                    { label: '피곤해요', value: 'TIRED' },
                ],
            },
        }),
    ].join('\n');
}

export function buildChatMessagePrompt(request: ChatMessageRequest): string {
    const { input } = request;
    const userInput = input.type === 'OPTION' ? `선택지 ${input.value ?? ''}` : (input.text ?? '');
    return [
        `세션 ID: ${request.sessionId}`,
        `사용자 마지막 입력: ${userInput}`,
        `요청 시각: ${request.timestamp}`,
        '',
        '대화의 흐름과 사용자 정보를 바탕으로 다음 챗봇 메시지를 생성해주세요.',
        '필요하다면 사용자에게 선택지를 제공할 수 있습니다.',
        '대화가 자연스럽게 종료되어야 할 시점이라고 판단되면 "state.isTerminal"을 true로 설정해주세요.',
        JSON_ONLY,
        fenced({
            botMessage: {
                messageId: 2,
                text: '챗봇 응답 메시지',
                options: [
                    { label: '선택지 1', value: 'VALUE_1' },
                    { label: '선택지 2', value: 'VALUE_2' },
                ],
            },
            state: { isTerminal: false },
        }),
    ].join('\n');
}
