/**
 * Personalization record and payload types.
 *
 * Dependency direction: types.ts → zod
 * Used by: personalization store, runner, services, CLI
 */

import { z } from 'zod';

/**
 * Payload accepted by `PersonalizationStore.update`.
 * Preference values are coerced to strings; event fields are free-form.
 */
export const personalizationPayloadSchema = z.object({
    preferences: z
        .record(z.string(), z.union([z.string(), z.number(), z.boolean()]).transform(String))
        .optional(),
    event: z.record(z.string(), z.unknown()).optional(),
});

export type PersonalizationPayload = z.infer<typeof personalizationPayloadSchema>;

/** An event as stored, stamped with the time it was recorded. */
export interface StoredEvent {
    readonly fields: Readonly<Record<string, unknown>>;
    readonly recordedAt: number;
}

export interface UserStats {
    success: number;
    fail: number;
}

/** Everything kept about one user. */
export interface UserRecord {
    preferences: Record<string, string>;
    events: StoredEvent[];
    stats: UserStats;
    updatedAt: number;
}

/**
 * Per-user personalization, with lazy expiry of stale records.
 * Implementations serialize all access; callers never see a partial update.
 */
export interface PersonalizationStore {
    /** Merge preferences and record an event. No-op for an empty user id. */
    update(userId: string | null | undefined, payload?: PersonalizationPayload): Promise<void>;

    /** Render the user's record for prompt injection, or '' when there is none. */
    summarize(userId: string | null | undefined): Promise<string>;
}
