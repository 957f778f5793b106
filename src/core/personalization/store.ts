/**
 * In-memory personalization store.
 *
 * One record per user: merged preferences, a bounded list of recent events,
 * success/fail counters and a last-updated time. A record untouched for longer
 * than the TTL is treated as absent and dropped on the next access to that user;
 * there is no background sweep. Every read and write goes through one mutex.
 *
 * Records live in this process only. A multi-instance deployment needs an
 * external cache that preserves the same lazy-expiry contract.
 *
 * Dependency direction: store.ts → utils/mutex, personalization/summary, logger
 * Used by: agent system runner
 */

import { Mutex } from '../../utils/mutex.js';
import { logger } from '../../utils/logger.js';
import { formatUserSummary } from './summary.js';
import type {
    PersonalizationPayload,
    PersonalizationStore,
    UserRecord,
    UserStats,
} from './types.js';

/** Store configuration options. */
export interface InMemoryStoreOptions {
    /** Maximum events kept per user; older ones are dropped first. */
    maxEvents?: number;
    /** Retention window in milliseconds. */
    ttlMs?: number;
    /** Clock, injectable for tests. */
    now?: () => number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Default configuration values. */
const DEFAULTS = {
    maxEvents: 30,
    ttlMs: 14 * DAY_MS,
    now: (): number => Date.now(),
} as const;

/** Which counter an event's `mission_result` increments, if any. Only the exact markers count. */
export function classifyOutcome(result: unknown): keyof UserStats | null {
    if (result === 'success') return 'success';
    if (result === 'fail') return 'fail';
    return null;
}

export class InMemoryPersonalizationStore implements PersonalizationStore {
    private readonly options: Required<InMemoryStoreOptions>;
    private readonly records = new Map<string, UserRecord>();
    private readonly mutex = new Mutex();

    constructor(options: InMemoryStoreOptions = {}) {
        this.options = { ...DEFAULTS, ...options };
    }

    async update(userId: string | null | undefined, payload?: PersonalizationPayload): Promise<void> {
        if (!userId) return;
        await this.mutex.runExclusive(() => this.applyUpdate(userId, payload));
    }

    async summarize(userId: string | null | undefined): Promise<string> {
        if (!userId) return '';
        return this.mutex.runExclusive(() => {
            const record = this.liveRecord(userId, this.options.now());
            return record ? formatUserSummary(record) : '';
        });
    }

    /** A deep copy of the user's live record, or null. */
    async snapshot(userId: string): Promise<UserRecord | null> {
        return this.mutex.runExclusive(() => {
            const record = this.liveRecord(userId, this.options.now());
            return record ? structuredClone(record) : null;
        });
    }

    // ── Private helpers ──

    private applyUpdate(userId: string, payload: PersonalizationPayload | undefined): void {
        const now = this.options.now();
        const record = this.liveRecord(userId, now) ?? this.createRecord(userId, now);

        if (payload?.preferences) {
            Object.assign(record.preferences, payload.preferences);
        }

        if (payload?.event) {
            record.events.push({ fields: { ...payload.event }, recordedAt: now });
            const overflow = record.events.length - this.options.maxEvents;
            if (overflow > 0) {
                record.events.splice(0, overflow);
            }

            const outcome = classifyOutcome(payload.event.mission_result);
            if (outcome) {
                record.stats[outcome]++;
            }
        }

        record.updatedAt = now;
    }

    private liveRecord(userId: string, now: number): UserRecord | undefined {
        const record = this.records.get(userId);
        if (!record) return undefined;

        if (now - record.updatedAt > this.options.ttlMs) {
            this.records.delete(userId);
            logger.debug(`Pruned expired personalization record for user ${userId}`);
            return undefined;
        }
        return record;
    }

    private createRecord(userId: string, now: number): UserRecord {
        const record: UserRecord = {
            preferences: {},
            events: [],
            stats: { success: 0, fail: 0 },
            updatedAt: now,
        };
        this.records.set(userId, record);
        return record;
    }
}
