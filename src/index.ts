/**
 * Public entry point of the mission-coach library.
 */

// Agent system
export {
    createAgentSystem,
    getAgentSystem,
    resetAgentSystem,
    runAgentSystem,
    validateUserRequest,
} from './core/workflow/runner.js';
export type {
    AgentSystem,
    AgentSystemDeps,
    AgentSystemInput,
    AgentSystemOverrides,
    AgentSystemResult,
    SamplingSettings,
} from './core/workflow/runner.js';
export { routeToAgent, runGraph, WorkflowStage } from './core/workflow/engine.js';
export type { AgentGraph } from './core/workflow/engine.js';
export type { ConversationState } from './core/workflow/state.js';
export type { RequestContext } from './core/workflow/context.js';

// Agents
export type { AgentKind, AgentNode } from './agents/types.js';
export { parseAgentChoice, fallbackAgentChoice } from './agents/classifier.js';
export { createAgentGraph } from './agents/factory.js';

// Personalization
export { InMemoryPersonalizationStore } from './core/personalization/store.js';
export { personalizationPayloadSchema } from './core/personalization/types.js';
export type {
    PersonalizationPayload,
    PersonalizationStore,
    UserRecord,
} from './core/personalization/types.js';

// Tracing
export { shouldTraceRequest, resolveSampleRate } from './core/tracing/sampling.js';
export { getTracer, shutdownTracer } from './core/tracing/tracer.js';

// Prompts
export { buildMessages, SAFETY_SYSTEM_PROMPT } from './prompts/library.js';

// Services
export { CoachingService } from './services/coaching.js';
export * from './services/schemas.js';

// Config
export { loadConfig, getConfig, loadDotEnv } from './core/config/manager.js';
export type { AppConfig } from './core/config/types.js';

// Providers
export { createProvider } from './providers/registry.js';
export type { ChatMessage, ChatResponse, LLMProvider } from './providers/types.js';

// Errors
export {
    AppError,
    ConfigError,
    ContractError,
    ProviderError,
    ValidationError,
    WorkflowError,
} from './core/errors.js';
