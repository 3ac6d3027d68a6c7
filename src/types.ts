// Shared type definitions

export type LogSeverity = 'VRB' | 'WRN' | 'ERR' | 'TRC';

export interface LogEntry {
  timestamp: number;
  severity: LogSeverity;
  type: 'llm' | 'tool' | 'stream' | 'server';
  direction: 'request' | 'response';
  remoteIdentifier: string;
  fatal: boolean;
  message: string;
  conversationId?: string;
  streamId?: string;
  details?: Record<string, string | number | boolean>;
}

export type LogSink = (entry: LogEntry) => void;

// Tool servers

export interface StdioServerParams {
  readonly transport: 'stdio';
  readonly command: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export interface SseServerParams {
  readonly transport: 'sse';
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly connectTimeoutMs: number;
  readonly readTimeoutMs: number;
}

export type ServerParams = StdioServerParams | SseServerParams;

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolIdentity {
  readonly serverName: string;
  readonly toolName: string;
}

/** Catalog entry handed to the model engine; `name` is the exposed `server-tool` key. */
export interface ToolDefinition extends ToolDescriptor {
  identity: ToolIdentity;
}

/** Raw outcome of one tool invocation. `isError` is a tool-level failure, not a transport one. */
export interface ToolCallOutcome {
  content: unknown[];
  isError: boolean;
  structuredContent?: Record<string, unknown>;
  /** Set when the call never reached the tool (denied, unknown tool, transport failure). */
  errorKind?: 'denied' | 'tool_not_found' | 'tool_execution_error';
}

// Conversation turns

export interface SystemPromptPart {
  kind: 'system-prompt';
  content: string;
}

export interface UserPromptPart {
  kind: 'user-prompt';
  content: string;
  timestamp: number;
}

export interface ToolReturnPart {
  kind: 'tool-return';
  toolName: string;
  toolCallId: string;
  content: ToolCallOutcome;
  timestamp: number;
}

export type RequestPart = SystemPromptPart | UserPromptPart | ToolReturnPart;

export interface TextPart {
  kind: 'text';
  content: string;
}

export interface ToolCallPart {
  kind: 'tool-call';
  toolName: string;
  args: Record<string, unknown>;
  toolCallId: string;
}

export type ResponsePart = TextPart | ToolCallPart;

export interface ModelRequestTurn {
  role: 'request';
  parts: RequestPart[];
}

export interface ModelResponseTurn {
  role: 'response';
  parts: ResponsePart[];
  modelName?: string;
  timestamp: number;
}

export type ConversationTurn = ModelRequestTurn | ModelResponseTurn;

export interface ConversationUsage {
  requests: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ModelSettings {
  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
}

export type ConversationState = 'idle' | 'awaiting-model' | 'awaiting-permission' | 'interrupted';

// Events delivered to stream consumers

export interface PartDelta {
  kind: 'text';
  content: string;
}

export type ResponseStreamEvent =
  | { type: 'part-start'; index: number; part: ResponsePart }
  | { type: 'part-delta'; index: number; delta: PartDelta }
  | { type: 'tool-return'; part: ToolReturnPart }
  | { type: 'error'; kind: string; message: string }
  | { type: 'done'; usage: ConversationUsage; state: ConversationState };
