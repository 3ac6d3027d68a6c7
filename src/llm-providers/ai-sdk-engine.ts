import { jsonSchema } from '@ai-sdk/provider-utils';
import { streamText, tool } from 'ai';

import type { ConversationTurn, LogEntry, LogSink, ResponsePart, ToolCallOutcome, ToolDefinition, ToolReturnPart } from '../types.js';
import type { ModelEngine, ModelRequest, ModelStreamChunk, TokenUsage } from './types.js';
import type { AssistantModelMessage, LanguageModel, ModelMessage, ToolModelMessage, ToolSet } from 'ai';

import { ModelError, toErrorMessage } from '../errors.js';
import { buildLogEntry, isPlainObject, warn } from '../utils.js';

type AssistantContentPart = Exclude<AssistantModelMessage['content'], string>[number];
type ToolContentPart = ToolModelMessage['content'][number];

export const NO_TOOL_OUTPUT = '(no output)';

/** Flatten a tool outcome's content blocks to the text the model sees. */
export function renderToolOutcome(outcome: ToolCallOutcome): string {
  const texts = outcome.content
    .map((block) => (isPlainObject(block) && block.type === 'text' && typeof block.text === 'string' ? block.text : undefined))
    .filter((t): t is string => t !== undefined);
  if (texts.length > 0) return texts.join('\n');
  if (outcome.structuredContent !== undefined) return JSON.stringify(outcome.structuredContent);
  if (outcome.content.length > 0) return JSON.stringify(outcome.content);
  return NO_TOOL_OUTPUT;
}

function toolResultPart(part: ToolReturnPart): ToolContentPart {
  const value = renderToolOutcome(part.content);
  return {
    type: 'tool-result',
    toolCallId: part.toolCallId,
    toolName: part.toolName,
    output: part.content.isError ? { type: 'error-text', value } : { type: 'text', value },
  };
}

export function convertTurns(turns: readonly ConversationTurn[]): ModelMessage[] {
  const out: ModelMessage[] = [];
  turns.forEach((turn) => {
    if (turn.role === 'response') {
      const content: AssistantContentPart[] = [];
      turn.parts.forEach((part) => {
        if (part.kind === 'text') {
          if (part.content.length > 0) content.push({ type: 'text', text: part.content });
          return;
        }
        content.push({ type: 'tool-call', toolCallId: part.toolCallId, toolName: part.toolName, input: part.args });
      });
      out.push({ role: 'assistant', content: content.length > 0 ? content : '' });
      return;
    }
    // consecutive tool returns share one tool message
    let pendingResults: ToolContentPart[] = [];
    const flush = (): void => {
      if (pendingResults.length === 0) return;
      out.push({ role: 'tool', content: pendingResults });
      pendingResults = [];
    };
    turn.parts.forEach((part) => {
      if (part.kind === 'tool-return') {
        pendingResults.push(toolResultPart(part));
        return;
      }
      flush();
      out.push(part.kind === 'system-prompt'
        ? { role: 'system', content: part.content }
        : { role: 'user', content: part.content });
    });
    flush();
  });
  return out;
}

export function convertTools(tools: readonly ToolDefinition[]): ToolSet {
  const set: ToolSet = {};
  tools.forEach((definition) => {
    // no execute: calls surface as proposals and wait for permission
    set[definition.name] = tool({
      description: definition.description,
      inputSchema: jsonSchema<Record<string, unknown>>(definition.inputSchema),
    });
  });
  return set;
}

export interface AiSdkModelEngineOptions {
  name?: string;
  onLog?: LogSink;
}

/** `ModelEngine` on top of the AI SDK's `streamText`. */
export class AiSdkModelEngine implements ModelEngine {
  readonly name: string;
  private readonly model: LanguageModel;
  private readonly onLog?: LogSink;

  constructor(model: LanguageModel, opts: AiSdkModelEngineOptions = {}) {
    this.model = model;
    this.name = opts.name ?? (typeof model === 'string' ? model : `${model.provider}:${model.modelId}`);
    this.onLog = opts.onLog;
  }

  async *requestStream(request: ModelRequest): AsyncGenerator<ModelStreamChunk, void, undefined> {
    const { settings } = request;
    let streamError: unknown;
    const start = Date.now();
    this.log('VRB', `request messages=${String(request.messages.length)} tools=${String(request.tools.length)}`, 'request');

    const result = streamText({
      model: this.model,
      messages: convertTurns(request.messages),
      tools: convertTools(request.tools),
      ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
      ...(settings.topP !== undefined ? { topP: settings.topP } : {}),
      ...(settings.maxOutputTokens !== undefined ? { maxOutputTokens: settings.maxOutputTokens } : {}),
      ...(request.abortSignal !== undefined ? { abortSignal: request.abortSignal } : {}),
      onError: (event) => { streamError = event.error; },
    });

    const parts: ResponsePart[] = [];
    const textIndexById = new Map<string, number>();
    let usage: TokenUsage | undefined;

    // eslint-disable-next-line functional/no-loop-statements
    for await (const part of result.fullStream) {
      switch (part.type) {
        case 'text-delta': {
          if (part.text.length === 0) break;
          const existing = textIndexById.get(part.id);
          if (existing === undefined) {
            const index = parts.length;
            const started: ResponsePart = { kind: 'text', content: part.text };
            parts.push(started);
            textIndexById.set(part.id, index);
            yield { type: 'part-start', index, part: { ...started } };
            break;
          }
          const target = parts[existing];
          if (target.kind === 'text') target.content += part.text;
          yield { type: 'part-delta', index: existing, delta: { kind: 'text', content: part.text } };
          break;
        }
        case 'tool-call': {
          // arguments are announced whole; input deltas are not forwarded
          const args = isPlainObject(part.input) ? { ...part.input } : {};
          const index = parts.length;
          const call: ResponsePart = { kind: 'tool-call', toolName: part.toolName, args, toolCallId: part.toolCallId };
          parts.push(call);
          yield { type: 'part-start', index, part: { ...call } };
          break;
        }
        case 'finish':
          usage = normalizeUsage(part.totalUsage);
          break;
        case 'error':
          streamError = part.error;
          break;
        case 'abort':
          throw new ModelError('model request aborted');
        default:
          break;
      }
      if (streamError !== undefined) break;
    }

    if (streamError !== undefined) {
      this.log('ERR', `stream failed after ${String(Date.now() - start)}ms: ${toErrorMessage(streamError)}`, 'response');
      throw new ModelError(toErrorMessage(streamError), { cause: streamError });
    }
    const finalUsage = usage ?? { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
    this.log('VRB', `response parts=${String(parts.length)} input=${String(finalUsage.inputTokens)} output=${String(finalUsage.outputTokens)} latency=${String(Date.now() - start)}ms`, 'response');
    yield {
      type: 'finish',
      response: { role: 'response', parts, modelName: this.name, timestamp: Date.now() },
      usage: finalUsage,
    };
  }

  private log(severity: LogEntry['severity'], message: string, direction: LogEntry['direction']): void {
    try {
      this.onLog?.(buildLogEntry(`llm:${this.name}`, message, { severity, type: 'llm', direction }));
    } catch (e) {
      warn(`model engine onLog failed: ${toErrorMessage(e)}`);
    }
  }
}

function normalizeUsage(raw: { inputTokens?: number; outputTokens?: number; totalTokens?: number }): TokenUsage {
  const num = (v: number | undefined): number => (typeof v === 'number' && Number.isFinite(v) ? v : 0);
  const inputTokens = num(raw.inputTokens);
  const outputTokens = num(raw.outputTokens);
  const totalTokens = num(raw.totalTokens) > 0 ? num(raw.totalTokens) : inputTokens + outputTokens;
  return { inputTokens, outputTokens, totalTokens };
}
