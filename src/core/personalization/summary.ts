/**
 * Renders a user record as the system message injected ahead of the request.
 *
 * Dependency direction: summary.ts → personalization/types
 * Used by: personalization store
 */

import type { UserRecord } from './types.js';

/** How many of the most recent events the summary shows. */
export const SUMMARY_EVENT_LIMIT = 3;

/** Event fields shown in the summary, in display order, with their labels. */
const EVENT_FIELD_LABELS: ReadonlyArray<readonly [field: string, label: string]> = [
    ['mission', '미션'],
    ['mission_result', '결과'],
    ['fail_reason', '실패이유'],
    ['condition', '컨디션'],
    ['schedule', '일정'],
];

const NONE = '없음';

/** Display text for an event field; null for empty values, containers and objects. */
function displayValue(value: unknown): string | null {
    if (typeof value === 'string') return value.length > 0 ? value : null;
    if (typeof value === 'number') return value !== 0 && Number.isFinite(value) ? String(value) : null;
    if (typeof value === 'boolean') return value ? 'true' : null;
    return null;
}

function formatEvent(fields: Readonly<Record<string, unknown>>): string {
    const parts: string[] = [];
    for (const [field, label] of EVENT_FIELD_LABELS) {
        const value = displayValue(fields[field]);
        if (value !== null) {
            parts.push(`${label}:${value}`);
        }
    }
    return parts.join(' / ');
}

export function formatUserSummary(record: UserRecord): string {
    const recent = record.events
        .slice(-SUMMARY_EVENT_LIMIT)
        .map((event) => formatEvent(event.fields))
        .filter((line) => line.length > 0);

    const prefEntries = Object.entries(record.preferences);
    const prefs = prefEntries.length > 0
        ? prefEntries.map(([key, value]) => `${key}:${value}`).join(', ')
        : NONE;

    return [
        '유저 컨텍스트 요약:',
        `- 선호/기본값: ${prefs}`,
        `- 최근 기록(최대 ${SUMMARY_EVENT_LIMIT}건): ${recent.length > 0 ? recent.join(' | ') : NONE}`,
        `- 누적 통계: 성공 ${record.stats.success}회 / 실패 ${record.stats.fail}회`,
        '이 정보를 고려해 개인화된 답변을 제공하세요.',
    ].join('\n');
}
