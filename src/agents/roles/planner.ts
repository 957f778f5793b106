/**
 * Planner agent — turns a request into a staged, time-boxed plan or roadmap.
 *
 * Dependency direction: planner.ts → agents/base
 * Used by: agents/factory
 */

import { RoleAgent, type AgentRuntime } from '../base.js';

export class PlannerAgent extends RoleAgent {
    constructor(runtime: AgentRuntime) {
        super('planner', {
            ...runtime,
            model: { ...runtime.model, temperature: runtime.model.temperature ?? 0.5 },
        });
    }
}
