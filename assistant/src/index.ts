export * from './types.js';
export * from './errors.js';
export { Logger, configureLogger, getLogs, clearLogs, type LogEntry, type LogLevel, type LogStage } from './logger.js';
export { loadConfig, createBackendClient, type AppConfig, type BackendKind } from './config.js';

export { defineTool, type ToolDescriptor, type ToolDefinition, type ToolHandler } from './tools/definition.js';
export { ToolRegistry, createDefaultToolRegistry, DEFAULT_TOOLS } from './tools/registry.js';
export { CALCULATE_TOOL, calculate } from './tools/builtin/calculate.js';
export { SEARCH_TOOL } from './tools/builtin/search.js';
export { WEATHER_TOOL } from './tools/builtin/weather.js';

export {
  ConversationEngine,
  NO_RESPONSE_TEXT,
  type ConversationEngineOptions,
  type EngineConfig,
} from './engine/engine.js';
export { normalizeBackendResponse, type NormalizedResponse } from './engine/normalize.js';
export { resolveToolArguments } from './engine/tool-executor.js';

export { ResponsesClient } from './models/responses.js';
export { ChatCompletionsClient } from './models/chat-completions.js';

export * from './evaluation/metrics.js';
export * from './evaluation/cases.js';
export * from './evaluation/case-store.js';
export * from './evaluation/evaluator.js';

export * from './training/checkpoint-store.js';
export * from './training/trainer.js';

export { AgentFactory, AgentPool, type AgentSpec, type PooledAgent } from './agents/factory.js';
export * from './chat/conversation-store.js';
export * from './chat/chat-service.js';
