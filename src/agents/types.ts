/**
 * Agent kind definitions.
 *
 * Dependency direction: agents/types.ts → nothing (leaf module)
 * Used by: prompts, workflow state, graph routing, services
 */

/** The three role agents a request can be routed to. */
export type AgentKind = 'planner' | 'coach' | 'analysis';

/** Every node of the orchestration graph that calls the model. */
export type AgentNode = 'classifier' | AgentKind;

/** Label used when a request has to be routed without a usable classification. */
export const DEFAULT_AGENT: AgentKind = 'analysis';

/** All agent kinds in classification priority order (first match wins). */
export const ALL_AGENT_KINDS: readonly AgentKind[] = ['planner', 'coach', 'analysis'] as const;

/** Display-friendly labels for each node. */
export const AGENT_NODE_LABELS: Record<AgentNode, string> = {
    classifier: '🧭 Classifier',
    planner: '🗺️ Planner',
    coach: '🏃 Coach',
    analysis: '📊 Analysis',
};
