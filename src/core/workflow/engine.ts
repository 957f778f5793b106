/**
 * Orchestration graph: classifier → one role agent → end.
 *
 * The graph is a fixed two-hop pipeline. The classifier always runs first,
 * exactly one role agent runs second, and nothing loops back.
 *
 * Dependency direction: engine.ts → agents/base, workflow/state, logger
 * Used by: agents/factory, runner
 */

import type { Context } from '@opentelemetry/api';
import type { BaseAgent, RoleAgent } from '../../agents/base.js';
import { DEFAULT_AGENT, type AgentKind } from '../../agents/types.js';
import type { ConversationState } from './state.js';
import { logger } from '../../utils/logger.js';

export const WorkflowStage = {
    Start: 'start',
    Classified: 'classified',
    Complete: 'complete',
} as const;

export type WorkflowStage = (typeof WorkflowStage)[keyof typeof WorkflowStage];

/** Compiled nodes of the graph. */
export interface AgentGraph {
    readonly classifier: BaseAgent;
    readonly agents: Readonly<Record<AgentKind, RoleAgent>>;
}

/** The role agent a classified state is routed to. */
export function routeToAgent(state: ConversationState): AgentKind {
    return state.selectedAgent ?? DEFAULT_AGENT;
}

/** Where a state sits in the pipeline. */
export function stageOf(state: ConversationState): WorkflowStage {
    if (state.taskCompleted) return WorkflowStage.Complete;
    if (state.selectedAgent) return WorkflowStage.Classified;
    return WorkflowStage.Start;
}

/**
 * Run the graph from the start node to the end.
 *
 * @param parent - Trace context of the request span, when sampled
 */
export async function runGraph(
    graph: AgentGraph,
    initial: ConversationState,
    parent?: Context,
): Promise<ConversationState> {
    logger.step(1, 2, 'Classifying request');
    const classified = await graph.classifier.run(initial, parent);

    const kind = routeToAgent(classified);
    logger.step(2, 2, `Running ${kind} agent`);
    return graph.agents[kind].run(classified, parent);
}
