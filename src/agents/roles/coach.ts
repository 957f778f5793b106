/**
 * Coach agent — practical, step-by-step guidance and advice.
 *
 * Dependency direction: coach.ts → agents/base
 * Used by: agents/factory
 */

import { RoleAgent, type AgentRuntime } from '../base.js';

export class CoachAgent extends RoleAgent {
    constructor(runtime: AgentRuntime) {
        super('coach', {
            ...runtime,
            model: { ...runtime.model, temperature: runtime.model.temperature ?? 0.7 },
        });
    }
}
