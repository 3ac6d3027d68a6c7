import type { ModelEngine } from '../llm-providers/types.js';
import type { ConversationRecord, ConversationStore, ConversationPage, ListQuery } from '../store/types.js';
import type { StreamItem } from '../streaming/event-stream.js';
import type { StreamRegistry } from '../streaming/stream-registry.js';
import type { ConversationState, ConversationTurn, LogEntry, LogSink, ModelSettings, ResponseStreamEvent } from '../types.js';
import type { AgentEventStream, PermissionDecision, ToolDispatcher } from './conversation-agent.js';

import { formatZodIssues } from '../config.js';
import { busy, ConversationNotFoundError, ForbiddenError, InvalidRequestError, isToolgateError, toErrorMessage } from '../errors.js';
import { DEFAULT_LIST_QUERY } from '../store/types.js';
import { pumpIntoStream } from '../streaming/stream-pump.js';
import { buildLogEntry, warn } from '../utils.js';

import { ConversationAgent } from './conversation-agent.js';
import { firstUserPrompt, parseTurns, settledState } from './messages.js';

export const TITLE_MAX_CHARS = 60;
export const MAX_PAGE_SIZE = 100;

export interface ExchangeOptions {
  settings?: ModelSettings;
  /** Client-edited history that replaces the stored one for this exchange. */
  redactedMessages?: unknown;
}

export interface ChatRequest extends ExchangeOptions {
  prompt: string;
  /** Honoured only while the conversation has no turns. */
  systemPrompt?: string;
}

export interface PermitCallToolRequest extends ExchangeOptions, PermissionDecision {}

export type RetryRequest = ExchangeOptions;

export interface ExchangeHandle {
  conversationId: string;
  streamId: string;
}

export interface ConversationInfo extends ConversationRecord {
  state: ConversationState;
}

export interface ConversationControllerOptions {
  store: ConversationStore;
  tools: ToolDispatcher;
  engine: ModelEngine;
  streams: StreamRegistry<ResponseStreamEvent>;
  defaultSystemPrompt?: string;
  defaultSettings?: ModelSettings;
  onLog?: LogSink;
}

export const toErrorEvent = (error: unknown): ResponseStreamEvent => ({
  type: 'error',
  kind: isToolgateError(error) ? error.kind : 'internal_error',
  message: toErrorMessage(error),
});

export function deriveTitle(prompt: string): string {
  const flat = prompt.replace(/\s+/g, ' ').trim();
  return flat.length <= TITLE_MAX_CHARS ? flat : `${flat.slice(0, TITLE_MAX_CHARS - 1)}…`;
}

/**
 * Ties persisted conversations to agents, the tool registry and event streams.
 * One exchange per conversation id at a time; each exchange runs in the
 * background and is read through its stream.
 */
export class ConversationController {
  private readonly store: ConversationStore;
  private readonly tools: ToolDispatcher;
  private readonly engine: ModelEngine;
  private readonly streams: StreamRegistry<ResponseStreamEvent>;
  private readonly defaultSystemPrompt?: string;
  private readonly defaultSettings: ModelSettings;
  private readonly onLog?: LogSink;
  private readonly inFlight = new Set<string>();
  private readonly running = new Set<Promise<void>>();
  private readonly abort = new AbortController();

  constructor(opts: ConversationControllerOptions) {
    this.store = opts.store;
    this.tools = opts.tools;
    this.engine = opts.engine;
    this.streams = opts.streams;
    this.defaultSystemPrompt = opts.defaultSystemPrompt;
    this.defaultSettings = opts.defaultSettings ?? {};
    this.onLog = opts.onLog;
  }

  async createConversation(userId: string, input: { title?: string; systemPrompt?: string } = {}): Promise<{ conversationId: string }> {
    const record = await this.store.create({ userId, ...input });
    this.log('VRB', 'conversation created', record.id);
    return { conversationId: record.id };
  }

  async listConversations(userId: string, query: Partial<ListQuery> = {}): Promise<ConversationPage> {
    const merged: ListQuery = { ...DEFAULT_LIST_QUERY, ...query };
    if (!Number.isInteger(merged.limit) || merged.limit < 1 || merged.limit > MAX_PAGE_SIZE) {
      throw new InvalidRequestError(`limit must be an integer between 1 and ${String(MAX_PAGE_SIZE)}`);
    }
    if (!Number.isInteger(merged.offset) || merged.offset < 0) {
      throw new InvalidRequestError('offset must be a non-negative integer');
    }
    return await this.store.list(userId, merged);
  }

  async getConversationInfo(userId: string, conversationId: string): Promise<ConversationInfo> {
    const record = await this.loadOwned(userId, conversationId);
    const state = this.inFlight.has(conversationId) ? 'awaiting-model' : settledState(record.messages);
    return { ...record, state };
  }

  async deleteConversation(userId: string, conversationId: string): Promise<void> {
    await this.loadOwned(userId, conversationId);
    if (this.inFlight.has(conversationId)) throw busy(conversationId);
    await this.store.delete(conversationId);
    this.log('VRB', 'conversation deleted', conversationId);
  }

  async chat(userId: string, conversationId: string, request: ChatRequest): Promise<ExchangeHandle> {
    return await this.exchange(userId, conversationId, request, (agent, settings) => agent.chat(request.prompt, settings), request.systemPrompt);
  }

  async permitCallTool(userId: string, conversationId: string, request: PermitCallToolRequest): Promise<ExchangeHandle> {
    const decision: PermissionDecision = {
      ...(request.executeAll !== undefined ? { executeAll: request.executeAll } : {}),
      ...(request.toolCallIds !== undefined ? { toolCallIds: request.toolCallIds } : {}),
    };
    return await this.exchange(userId, conversationId, request, (agent, settings) => agent.permitAndRun(decision, settings));
  }

  async retry(userId: string, conversationId: string, request: RetryRequest = {}): Promise<ExchangeHandle> {
    return await this.exchange(userId, conversationId, request, (agent, settings) => agent.resume(settings));
  }

  subscribe(streamId: string, fromIndex = 0, signal?: AbortSignal): AsyncGenerator<StreamItem<ResponseStreamEvent>, void, undefined> {
    return this.streams.subscribe(streamId, fromIndex, signal);
  }

  isBusy(conversationId: string): boolean {
    return this.inFlight.has(conversationId);
  }

  /** Abort model calls still running and wait for their exchanges to settle. */
  async close(): Promise<void> {
    this.abort.abort();
    await Promise.allSettled(Array.from(this.running));
  }

  private async exchange(
    userId: string,
    conversationId: string,
    request: ExchangeOptions,
    start: (agent: ConversationAgent, settings: ModelSettings) => AgentEventStream,
    systemPromptOverride?: string
  ): Promise<ExchangeHandle> {
    // claimed before the first await so a concurrent request sees it
    if (this.inFlight.has(conversationId)) throw busy(conversationId);
    this.inFlight.add(conversationId);
    try {
      const record = await this.loadOwned(userId, conversationId);
      const history = this.resolveHistory(record, request.redactedMessages);
      const systemPrompt = (history.length === 0 && systemPromptOverride !== undefined && systemPromptOverride.length > 0)
        ? systemPromptOverride
        : record.systemPrompt ?? this.defaultSystemPrompt;
      const agent = new ConversationAgent({
        engine: this.engine,
        tools: this.tools,
        history,
        usage: record.usage,
        conversationId,
        abortSignal: this.abort.signal,
        ...(systemPrompt !== undefined ? { systemPrompt } : {}),
        ...(this.onLog !== undefined ? { onLog: this.onLog } : {}),
      });
      const events = start(agent, { ...this.defaultSettings, ...request.settings });
      const streamId = crypto.randomUUID();
      const stream = await this.streams.create(streamId);
      const run = pumpIntoStream(this.settleAfter(events, agent, record), stream, {
        toErrorEvent,
        ...(this.onLog !== undefined ? { onLog: this.onLog } : {}),
      });
      const tracked: Promise<void> = run
        .catch((e: unknown) => { warn(`exchange pump failed for '${conversationId}': ${toErrorMessage(e)}`); })
        .finally(() => { this.running.delete(tracked); });
      this.running.add(tracked);
      this.log('VRB', 'exchange started', conversationId, streamId);
      return { conversationId, streamId };
    } catch (e) {
      this.inFlight.delete(conversationId);
      throw e;
    }
  }

  /**
   * Forward the agent's events, persisting before the terminal `done` so a
   * client that reacts to it finds the conversation saved and free.
   */
  private async *settleAfter(events: AgentEventStream, agent: ConversationAgent, record: ConversationRecord): AgentEventStream {
    let done: ResponseStreamEvent | undefined;
    let persistError: unknown;
    try {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const event of events) {
        if (event.type === 'done') {
          done = event;
          continue;
        }
        yield event;
      }
    } finally {
      persistError = await this.persist(agent, record);
      this.inFlight.delete(record.id);
    }
    if (persistError !== undefined) {
      yield toErrorEvent(persistError);
      return;
    }
    if (done !== undefined) yield done;
  }

  private async persist(agent: ConversationAgent, record: ConversationRecord): Promise<unknown> {
    const messages = agent.allMessages();
    const prompt = record.title === undefined ? firstUserPrompt(messages) : undefined;
    try {
      await this.store.update(record.id, {
        messages,
        usage: agent.usage(),
        ...(prompt !== undefined ? { title: deriveTitle(prompt) } : {}),
      });
      this.log('VRB', `persisted turns=${String(messages.length)} requests=${String(agent.usage().requests)}`, record.id);
      return undefined;
    } catch (e) {
      this.log('ERR', `failed to persist conversation: ${toErrorMessage(e)}`, record.id);
      return e;
    }
  }

  private resolveHistory(record: ConversationRecord, redacted: unknown): ConversationTurn[] {
    if (redacted === undefined || redacted === null) return record.messages;
    const parsed = parseTurns(redacted);
    if (!parsed.ok) {
      throw new InvalidRequestError(`invalid redactedMessages: ${formatZodIssues(parsed.issues)}`);
    }
    return parsed.turns;
  }

  private async loadOwned(userId: string, conversationId: string): Promise<ConversationRecord> {
    const record = await this.store.get(conversationId);
    if (record === undefined) throw new ConversationNotFoundError(conversationId);
    if (record.userId !== userId) throw new ForbiddenError(conversationId);
    return record;
  }

  private log(severity: LogEntry['severity'], message: string, conversationId: string, streamId?: string): void {
    try {
      this.onLog?.(buildLogEntry('conversation', message, {
        severity,
        conversationId,
        ...(streamId !== undefined ? { streamId } : {}),
      }));
    } catch (e) {
      warn(`controller onLog failed: ${toErrorMessage(e)}`);
    }
  }
}
