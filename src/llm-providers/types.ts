import type { ConversationTurn, ModelResponseTurn, ModelSettings, ResponseStreamEvent, ToolDefinition } from '../types.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ModelRequest {
  messages: readonly ConversationTurn[];
  tools: readonly ToolDefinition[];
  settings: ModelSettings;
  abortSignal?: AbortSignal;
}

export type EngineEvent = Extract<ResponseStreamEvent, { type: 'part-start' | 'part-delta' }>;

export type ModelStreamChunk =
  | EngineEvent
  | { type: 'finish'; response: ModelResponseTurn; usage: TokenUsage };

/**
 * Black-box completion engine: takes history plus tool catalog and yields
 * part events, ending with exactly one `finish` chunk. Tool calls are only
 * proposed, never executed.
 */
export interface ModelEngine {
  readonly name: string;
  requestStream: (request: ModelRequest) => AsyncIterable<ModelStreamChunk>;
}
