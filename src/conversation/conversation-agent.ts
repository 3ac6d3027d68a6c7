import type { ModelEngine, ModelStreamChunk } from '../llm-providers/types.js';
import type {
  ConversationState,
  ConversationTurn,
  ConversationUsage,
  LogEntry,
  LogSink,
  ModelRequestTurn,
  ModelResponseTurn,
  ModelSettings,
  RequestPart,
  ResponseStreamEvent,
  ToolCallOutcome,
  ToolCallPart,
  ToolDefinition,
  ToolIdentity,
  ToolReturnPart,
} from '../types.js';

import { alreadyResolved, busy, InvalidRequestError, isToolgateError, ModelError, needsPermission, toErrorMessage } from '../errors.js';
import { buildLogEntry, warn } from '../utils.js';

import { addRequestUsage, emptyUsage, pendingToolCalls, settledState, textOutcome } from './messages.js';

/** What the agent needs from the tool-server registry. */
export interface ToolDispatcher {
  buildCatalog: () => ToolDefinition[];
  resolveTool: (exposedName: string) => ToolIdentity | undefined;
  call: (serverName: string, toolName: string, args: Record<string, unknown>) => Promise<ToolCallOutcome>;
}

/**
 * Permission step input. `{}` denies every pending call; `executeAll` runs all
 * of them, and adds to any explicit ids rather than narrowing them.
 */
export interface PermissionDecision {
  executeAll?: boolean;
  toolCallIds?: readonly string[];
}

export interface ConversationAgentOptions {
  engine: ModelEngine;
  tools: ToolDispatcher;
  systemPrompt?: string;
  history?: readonly ConversationTurn[];
  usage?: ConversationUsage;
  conversationId?: string;
  abortSignal?: AbortSignal;
  onLog?: LogSink;
}

export type AgentEventStream = AsyncGenerator<ResponseStreamEvent, void, undefined>;

/**
 * One conversation's history, usage and tool-call state machine.
 *
 * `chat`, `permitAndRun` and `resume` validate and claim the conversation
 * synchronously, then hand back a single-pass event sequence that performs the
 * exchange as it is drained. At most one exchange runs at a time.
 */
export class ConversationAgent {
  readonly systemPrompt?: string;
  private readonly engine: ModelEngine;
  private readonly tools: ToolDispatcher;
  private readonly history: ConversationTurn[];
  private usageCounters: ConversationUsage;
  private lastResponseTurn?: ModelResponseTurn;
  private readonly conversationId?: string;
  private readonly abortSignal?: AbortSignal;
  private readonly onLog?: LogSink;
  private inFlight = false;

  constructor(opts: ConversationAgentOptions) {
    this.engine = opts.engine;
    this.tools = opts.tools;
    this.systemPrompt = opts.systemPrompt;
    this.history = structuredClone([...(opts.history ?? [])]);
    this.usageCounters = { ...(opts.usage ?? emptyUsage()) };
    this.conversationId = opts.conversationId;
    this.abortSignal = opts.abortSignal;
    this.onLog = opts.onLog;
    this.lastResponseTurn = [...this.history].reverse().find((turn): turn is ModelResponseTurn => turn.role === 'response');
  }

  get state(): ConversationState {
    return this.inFlight ? 'awaiting-model' : settledState(this.history);
  }

  allMessages(): ConversationTurn[] {
    return structuredClone(this.history);
  }

  usage(): ConversationUsage {
    return { ...this.usageCounters };
  }

  lastResponse(): ModelResponseTurn | undefined {
    return this.lastResponseTurn === undefined ? undefined : structuredClone(this.lastResponseTurn);
  }

  pendingToolCalls(): ToolCallPart[] {
    return structuredClone(pendingToolCalls(this.history));
  }

  chat(prompt: string, settings: ModelSettings = {}): AgentEventStream {
    this.assertIdle();
    const pending = pendingToolCalls(this.history);
    if (pending.length > 0) {
      throw needsPermission(pending.map((call) => call.toolCallId));
    }
    const snapshot = structuredClone(this.history);
    const promptPart: RequestPart = { kind: 'user-prompt', content: prompt, timestamp: Date.now() };
    const last = this.history.at(-1);
    if (last?.role === 'request') {
      // previous model call failed; keep request/response alternation
      last.parts.push(promptPart);
    } else {
      const parts: RequestPart[] = this.history.length === 0 && this.systemPrompt !== undefined
        ? [{ kind: 'system-prompt', content: this.systemPrompt }, promptPart]
        : [promptPart];
      this.history.push({ role: 'request', parts });
    }
    this.log('VRB', `chat prompt chars=${String(prompt.length)}`, 'request');
    return this.claim(this.runExchange(undefined, settings), () => {
      this.history.splice(0, this.history.length, ...snapshot);
    });
  }

  permitAndRun(decision: PermissionDecision, settings: ModelSettings = {}): AgentEventStream {
    this.assertIdle();
    const pending = pendingToolCalls(this.history);
    if (pending.length === 0) throw alreadyResolved();
    const pendingIds = new Set(pending.map((call) => call.toolCallId));
    const unknown = (decision.toolCallIds ?? []).filter((id) => !pendingIds.has(id));
    if (unknown.length > 0) {
      throw new InvalidRequestError(`not pending: ${unknown.join(', ')}`, { toolCallIds: unknown });
    }
    const selected = new Set(decision.executeAll === true ? pendingIds : decision.toolCallIds ?? []);
    this.log('VRB', `permission step: run ${String(selected.size)} of ${String(pending.length)} pending tool calls`, 'request');
    return this.claim(this.runExchange(this.runToolCalls(pending, selected), settings));
  }

  /** Re-run the model for an interrupted conversation. */
  resume(settings: ModelSettings = {}): AgentEventStream {
    this.assertIdle();
    if (settledState(this.history) !== 'interrupted') throw alreadyResolved();
    this.log('VRB', 'resuming interrupted exchange', 'request');
    return this.claim(this.runExchange(undefined, settings));
  }

  /**
   * Mark the agent busy for `body`. A stream closed before its first read
   * never runs `body`, so closing it here releases the agent and undoes the
   * history change made when the exchange was requested.
   */
  private claim(body: AgentEventStream, rollback?: () => void): AgentEventStream {
    this.inFlight = true;
    let settled = false;
    const abandon = (): void => {
      if (settled) return;
      settled = true;
      rollback?.();
      this.inFlight = false;
      this.log('VRB', 'exchange closed before it started', 'response');
    };
    const stream: AgentEventStream = {
      next: async () => {
        settled = true;
        return await body.next();
      },
      return: async (value) => {
        abandon();
        return await body.return(value);
      },
      throw: async (err: unknown) => {
        abandon();
        return await body.throw(err);
      },
      [Symbol.asyncIterator]: () => stream,
    };
    return stream;
  }

  private assertIdle(): void {
    if (this.inFlight) throw busy(this.conversationId);
  }

  private async *runExchange(toolStep: AgentEventStream | undefined, settings: ModelSettings): AgentEventStream {
    try {
      if (toolStep !== undefined) yield* toolStep;
      yield* this.streamModel(settings);
    } finally {
      this.inFlight = false;
    }
  }

  private async *runToolCalls(pending: readonly ToolCallPart[], selected: ReadonlySet<string>): AgentEventStream {
    // each outcome stays bound to its own call, whatever order they finish in
    const outcomes = await Promise.all(pending.map(async (call): Promise<ToolReturnPart> => {
      const content = selected.has(call.toolCallId)
        ? await this.executeCall(call)
        : textOutcome(`tool call '${call.toolName}' was not permitted`, 'denied');
      return { kind: 'tool-return', toolName: call.toolName, toolCallId: call.toolCallId, content, timestamp: Date.now() };
    }));
    const turn: ModelRequestTurn = { role: 'request', parts: outcomes };
    this.history.push(turn);
    // eslint-disable-next-line functional/no-loop-statements
    for (const part of outcomes) {
      yield { type: 'tool-return', part: structuredClone(part) };
    }
  }

  private async executeCall(call: ToolCallPart): Promise<ToolCallOutcome> {
    const identity = this.tools.resolveTool(call.toolName);
    if (identity === undefined) {
      this.log('WRN', `unknown tool '${call.toolName}' (${call.toolCallId})`, 'response', 'tool');
      return textOutcome(`unknown tool '${call.toolName}'`, 'tool_not_found');
    }
    const start = Date.now();
    try {
      const outcome = await this.tools.call(identity.serverName, identity.toolName, call.args);
      this.log('VRB', `tool ${call.toolName} (${call.toolCallId}) ${outcome.isError ? 'reported an error' : 'ok'} in ${String(Date.now() - start)}ms`, 'response', 'tool');
      return outcome;
    } catch (e) {
      const kind = isToolgateError(e) && e.kind === 'tool_not_found' ? 'tool_not_found' : 'tool_execution_error';
      this.log('WRN', `tool ${call.toolName} (${call.toolCallId}) failed: ${toErrorMessage(e)}`, 'response', 'tool');
      return textOutcome(toErrorMessage(e), kind);
    }
  }

  private async *streamModel(settings: ModelSettings): AgentEventStream {
    let finish: Extract<ModelStreamChunk, { type: 'finish' }> | undefined;
    const chunks = this.engine.requestStream({
      messages: structuredClone(this.history),
      tools: this.tools.buildCatalog(),
      settings,
      ...(this.abortSignal !== undefined ? { abortSignal: this.abortSignal } : {}),
    });
    try {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const chunk of chunks) {
        if (chunk.type === 'finish') {
          finish = chunk;
          continue;
        }
        yield chunk;
      }
    } catch (e) {
      this.log('ERR', `model exchange failed: ${toErrorMessage(e)}`, 'response', 'llm');
      throw e;
    }
    if (finish === undefined) {
      throw new ModelError(`model '${this.engine.name}' ended without a response`);
    }
    this.history.push(finish.response);
    this.lastResponseTurn = finish.response;
    this.usageCounters = addRequestUsage(this.usageCounters, finish.usage);
    yield { type: 'done', usage: this.usage(), state: settledState(this.history) };
  }

  private log(severity: LogEntry['severity'], message: string, direction: LogEntry['direction'], type: LogEntry['type'] = 'server'): void {
    try {
      this.onLog?.(buildLogEntry(`agent:${this.engine.name}`, message, {
        severity,
        type,
        direction,
        ...(this.conversationId !== undefined ? { conversationId: this.conversationId } : {}),
      }));
    } catch (e) {
      warn(`agent onLog failed: ${toErrorMessage(e)}`);
    }
  }
}
