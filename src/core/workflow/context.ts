/**
 * Per-invocation request identity.
 *
 * Dependency direction: context.ts → node:crypto
 * Used by: workflow state, tracing, runner
 */

import { randomUUID } from 'node:crypto';

/** Immutable identity of one invocation, shared by every node. */
export interface RequestContext {
    /** Globally unique per invocation. */
    readonly requestId: string;
    /** Conversation identifier: the user id, or a generated one for anonymous requests. */
    readonly threadId: string;
    readonly userId: string | null;
    /** Environment tag. */
    readonly appEnv: string;
    /** Build/version tag. */
    readonly gitSha: string;
    /** Sampling decision, held for the whole request. */
    readonly traceEnabled: boolean;
}

export interface RequestContextInit {
    userId: string | null;
    appEnv: string;
    gitSha: string;
    traceEnabled: boolean;
}

export function createRequestContext(
    init: RequestContextInit,
    generateId: () => string = randomUUID,
): RequestContext {
    return Object.freeze({
        requestId: generateId(),
        threadId: init.userId ?? generateId(),
        userId: init.userId,
        appEnv: init.appEnv,
        gitSha: init.gitSha,
        traceEnabled: init.traceEnabled,
    });
}
