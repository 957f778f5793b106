/**
 * Agent factory — builds the role agents and the classifier from one runtime.
 *
 * Dependency direction: factory.ts → agents/roles/*, agents/classifier
 * Used by: agent system wiring
 */

import type { AgentKind } from './types.js';
import type { AgentRuntime, RoleAgent } from './base.js';
import { ClassifierAgent } from './classifier.js';
import { PlannerAgent } from './roles/planner.js';
import { CoachAgent } from './roles/coach.js';
import { AnalysisAgent } from './roles/analysis.js';
import { WorkflowError } from '../core/errors.js';
import type { AgentGraph } from '../core/workflow/engine.js';

/**
 * Create the role agent for a kind.
 */
export function createAgent(kind: AgentKind, runtime: AgentRuntime): RoleAgent {
    switch (kind) {
        case 'planner':
            return new PlannerAgent(runtime);
        case 'coach':
            return new CoachAgent(runtime);
        case 'analysis':
            return new AnalysisAgent(runtime);
        default: {
            const unknown: never = kind;
            throw new WorkflowError(`Unknown agent kind: ${String(unknown)}`, { kind: unknown });
        }
    }
}

/**
 * Build every node of the orchestration graph.
 */
export function createAgentGraph(runtime: AgentRuntime): AgentGraph {
    return {
        classifier: new ClassifierAgent(runtime),
        agents: {
            planner: createAgent('planner', runtime),
            coach: createAgent('coach', runtime),
            analysis: createAgent('analysis', runtime),
        },
    };
}
