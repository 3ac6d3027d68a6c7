import { z } from 'zod';

import type { TokenUsage } from '../llm-providers/types.js';
import type { ConversationState, ConversationTurn, ConversationUsage, ToolCallOutcome, ToolCallPart } from '../types.js';

const ToolCallOutcomeSchema = z.object({
  content: z.array(z.unknown()),
  isError: z.boolean(),
  structuredContent: z.record(z.unknown()).optional(),
  errorKind: z.enum(['denied', 'tool_not_found', 'tool_execution_error']).optional(),
});

const RequestPartSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('system-prompt'), content: z.string() }),
  z.object({ kind: z.literal('user-prompt'), content: z.string(), timestamp: z.number() }),
  z.object({
    kind: z.literal('tool-return'),
    toolName: z.string(),
    toolCallId: z.string(),
    content: ToolCallOutcomeSchema,
    timestamp: z.number(),
  }),
]);

const ResponsePartSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), content: z.string() }),
  z.object({
    kind: z.literal('tool-call'),
    toolName: z.string().min(1),
    args: z.record(z.unknown()),
    toolCallId: z.string().min(1),
  }),
]);

const TurnSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('request'), parts: z.array(RequestPartSchema) }),
  z.object({
    role: z.literal('response'),
    parts: z.array(ResponsePartSchema),
    modelName: z.string().optional(),
    timestamp: z.number(),
  }),
]);

export const ConversationTurnsSchema = z.array(TurnSchema);

export const ConversationUsageSchema = z.object({
  requests: z.number().int().min(0),
  inputTokens: z.number().int().min(0),
  outputTokens: z.number().int().min(0),
  totalTokens: z.number().int().min(0),
});

export type TurnsParseResult =
  | { ok: true; turns: ConversationTurn[] }
  | { ok: false; issues: z.ZodIssue[] };

export function parseTurns(value: unknown): TurnsParseResult {
  const parsed = ConversationTurnsSchema.safeParse(value);
  if (!parsed.success) return { ok: false, issues: parsed.error.issues };
  const turns: ConversationTurn[] = parsed.data;
  return { ok: true, turns };
}

export function parseUsage(value: unknown): ConversationUsage | undefined {
  const parsed = ConversationUsageSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export const emptyUsage = (): ConversationUsage => ({ requests: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0 });

/** One more model request plus the tokens it reported. */
export const addRequestUsage = (usage: ConversationUsage, tokens: TokenUsage): ConversationUsage => ({
  requests: usage.requests + 1,
  inputTokens: usage.inputTokens + tokens.inputTokens,
  outputTokens: usage.outputTokens + tokens.outputTokens,
  totalTokens: usage.totalTokens + tokens.totalTokens,
});

/** Tool calls of the trailing response turn; resolved calls are always followed by a request turn. */
export function pendingToolCalls(history: readonly ConversationTurn[]): ToolCallPart[] {
  const last = history.at(-1);
  if (last?.role !== 'response') return [];
  return last.parts.filter((part): part is ToolCallPart => part.kind === 'tool-call');
}

/** State of a conversation that has no exchange in flight. */
export function settledState(history: readonly ConversationTurn[]): ConversationState {
  const last = history.at(-1);
  if (last === undefined) return 'idle';
  if (last.role === 'request') return 'interrupted';
  return last.parts.some((part) => part.kind === 'tool-call') ? 'awaiting-permission' : 'idle';
}

export function firstUserPrompt(history: readonly ConversationTurn[]): string | undefined {
  const found = history
    .flatMap((turn) => (turn.role === 'request' ? turn.parts : []))
    .find((part) => part.kind === 'user-prompt');
  return found?.kind === 'user-prompt' ? found.content : undefined;
}

export const textOutcome = (text: string, errorKind?: ToolCallOutcome['errorKind']): ToolCallOutcome => ({
  content: [{ type: 'text', text }],
  isError: errorKind !== undefined,
  ...(errorKind !== undefined ? { errorKind } : {}),
});
