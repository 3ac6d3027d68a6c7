export * from './types.js';
export * from './errors.js';
export { loadConfiguration, parseConfiguration, type Configuration } from './config.js';
export { buildApp, startApp, type AppServices } from './app.js';

export { ToolServerClient, type ToolServerConnection, type TransportFactory } from './tools/tool-server-client.js';
export { ToolServerRegistry, type RegistryStatus, type ClientFactory } from './tools/tool-server-registry.js';
export { parseToolServerConfig, loadToolServerConfig, type ToolServerConfig } from './tools/server-config.js';
export { composeToolName, splitToolName, TOOL_NAME_SEPARATOR } from './tools/tool-identity.js';

export { ConversationAgent, type PermissionDecision, type ToolDispatcher } from './conversation/conversation-agent.js';
export { ConversationController, type ChatRequest, type PermitCallToolRequest, type ExchangeHandle } from './conversation/conversation-controller.js';

export { EventStream, type StreamItem } from './streaming/event-stream.js';
export { StreamRegistry } from './streaming/stream-registry.js';
export { pumpIntoStream } from './streaming/stream-pump.js';

export { AiSdkModelEngine } from './llm-providers/ai-sdk-engine.js';
export { ScriptedLanguageModel, type ScriptedStep } from './llm-providers/test-llm.js';
export { createModelEngine } from './llm-providers/factory.js';
export type { ModelEngine, ModelRequest, ModelStreamChunk } from './llm-providers/types.js';

export { InMemoryConversationStore } from './store/memory-store.js';
export { SqliteConversationStore } from './store/sqlite-store.js';
export type { ConversationStore, ConversationRecord, ConversationPage, ListQuery } from './store/types.js';

export { ConversationHeadend, type ConversationHeadendOptions, type UserResolver } from './headends/conversation-headend.js';
export { StructuredLogger, type LogFormat } from './logging/structured-logger.js';
