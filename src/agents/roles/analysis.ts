/**
 * Analysis agent — the default route. Reviews records and explains causes,
 * and is where requests land when classification is inconclusive.
 *
 * Dependency direction: analysis.ts → agents/base
 * Used by: agents/factory
 */

import { RoleAgent, type AgentRuntime } from '../base.js';

export class AnalysisAgent extends RoleAgent {
    constructor(runtime: AgentRuntime) {
        super('analysis', {
            ...runtime,
            model: { ...runtime.model, temperature: runtime.model.temperature ?? 0.3 },
        });
    }
}
