/**
 * nextstep - autonomous task agent
 *
 * Main exports for programmatic usage
 */

export { TaskAgent, DEFAULT_MAX_STEPS } from './core/agent.js';
export type { Task, AgentConfig, RunOutcome, RunStatus } from './core/agent.js';
export { ActionDispatcher, deleteAsUpdate } from './core/dispatcher.js';
export { aggregatePages, isPageLimitExceeded, DEFAULT_PAGE_SIZE, END_OF_RESULTS } from './core/pagination.js';
export { decidePreflight, runPreflight, PREFLIGHT_CONFIDENCE_THRESHOLD } from './core/preflight.js';
export { RunState, RunStateMachine } from './core/run-state.js';
export { ConversationLog } from './core/conversation-log.js';
export { resolveActor, actorId } from './core/actor.js';
export type { Actor } from './core/actor.js';
export { ConfigManager, getConfigManager, resolveRuntimeConfig } from './core/config.js';
export type { AppConfig, RuntimeConfig } from './core/config.js';

export { HttpDomainClient } from './api/client.js';
export type { DomainClient } from './api/client.js';
export * from './api/schemas.js';
export * from './contract/index.js';

export { OpenAICompatibleModel, createOpenAICompatibleModel } from './models/openai-compatible.js';
export { defineContract } from './models/structured.js';
export type { OutputContract, StructuredModel } from './models/structured.js';

export * from './knowledge/index.js';
export * from './harness/index.js';

export { logger, LogLevel } from './utils/logger.js';

export * from './utils/errors.js';
export * from './models/base.js';
