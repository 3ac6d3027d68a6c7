import type { LanguageModelV2, LanguageModelV2CallOptions, LanguageModelV2Content, LanguageModelV2FinishReason, LanguageModelV2Prompt, LanguageModelV2StreamPart, LanguageModelV2Usage } from '@ai-sdk/provider';

const PROVIDER_NAME = 'test-llm';

export interface ScriptedToolCall {
  toolCallId: string;
  toolName: string;
  args: Record<string, unknown>;
}

/** One canned model turn. `error` makes the call fail instead. */
export interface ScriptedStep {
  text?: string;
  toolCalls?: ScriptedToolCall[];
  usage?: { inputTokens: number; outputTokens: number };
  error?: string;
}

export type ScriptSource = readonly ScriptedStep[] | ((prompt: LanguageModelV2Prompt, call: number) => ScriptedStep);

const DEFAULT_USAGE = { inputTokens: 64, outputTokens: 32 };

export function lastUserText(prompt: LanguageModelV2Prompt): string {
  const user = [...prompt].reverse().find((message) => message.role === 'user');
  if (user === undefined || user.role !== 'user') return '';
  return user.content
    .map((part) => (part.type === 'text' ? part.text : ''))
    .join('');
}

/** Replies with the last user prompt; used when no script is configured. */
export const echoScript = (prompt: LanguageModelV2Prompt): ScriptedStep => ({
  text: `echo: ${lastUserText(prompt)}`,
});

function splitIntoDeltas(text: string): string[] {
  const pieces = text.match(/\S+\s*|\s+/g);
  return pieces ?? [text];
}

function buildContent(step: ScriptedStep): { content: LanguageModelV2Content[]; finishReason: LanguageModelV2FinishReason; usage: LanguageModelV2Usage } {
  const content: LanguageModelV2Content[] = [];
  if (step.text !== undefined && step.text.length > 0) {
    content.push({ type: 'text', text: step.text });
  }
  (step.toolCalls ?? []).forEach((call) => {
    content.push({ type: 'tool-call', toolCallId: call.toolCallId, toolName: call.toolName, input: JSON.stringify(call.args) });
  });
  const tokens = step.usage ?? DEFAULT_USAGE;
  return {
    content,
    finishReason: (step.toolCalls ?? []).length > 0 ? 'tool-calls' : 'stop',
    usage: { inputTokens: tokens.inputTokens, outputTokens: tokens.outputTokens, totalTokens: tokens.inputTokens + tokens.outputTokens },
  };
}

function toStreamParts(step: ScriptedStep): LanguageModelV2StreamPart[] {
  const { content, finishReason, usage } = buildContent(step);
  const parts: LanguageModelV2StreamPart[] = [{ type: 'stream-start', warnings: [] }];
  let textIndex = 0;
  content.forEach((entry) => {
    if (entry.type === 'text') {
      textIndex += 1;
      const id = `text-${String(textIndex)}`;
      parts.push({ type: 'text-start', id });
      splitIntoDeltas(entry.text).forEach((delta) => {
        parts.push({ type: 'text-delta', id, delta });
      });
      parts.push({ type: 'text-end', id });
      return;
    }
    if (entry.type === 'tool-call') {
      parts.push(entry);
    }
  });
  parts.push({ type: 'finish', finishReason, usage });
  return parts;
}

/**
 * Scripted language model for offline runs and tests. Each call consumes the
 * next step of the script (or asks the script function for one).
 */
export class ScriptedLanguageModel implements LanguageModelV2 {
  readonly specificationVersion = 'v2';
  readonly provider = PROVIDER_NAME;
  readonly modelId: string;
  readonly supportedUrls: Record<string, RegExp[]> = {};
  private readonly script: ScriptSource;
  private calls = 0;
  readonly prompts: LanguageModelV2Prompt[] = [];

  constructor(script: ScriptSource = echoScript, modelId = 'scripted') {
    this.script = script;
    this.modelId = modelId;
  }

  get callCount(): number {
    return this.calls;
  }

  doGenerate(options: LanguageModelV2CallOptions): ReturnType<LanguageModelV2['doGenerate']> {
    const step = this.nextStep(options.prompt);
    if (step.error !== undefined) return Promise.reject(new Error(step.error));
    return Promise.resolve({ ...buildContent(step), warnings: [] });
  }

  doStream(options: LanguageModelV2CallOptions): ReturnType<LanguageModelV2['doStream']> {
    const step = this.nextStep(options.prompt);
    if (step.error !== undefined) return Promise.reject(new Error(step.error));
    const parts = toStreamParts(step);
    const stream = new ReadableStream<LanguageModelV2StreamPart>({
      start(controller) {
        parts.forEach((part) => {
          controller.enqueue(part);
        });
        controller.close();
      },
    });
    return Promise.resolve({ stream });
  }

  private nextStep(prompt: LanguageModelV2Prompt): ScriptedStep {
    const call = this.calls;
    this.calls += 1;
    this.prompts.push(prompt);
    if (typeof this.script === 'function') return this.script(prompt, call);
    if (call >= this.script.length) {
      return { error: `script exhausted after ${String(this.script.length)} step(s)` };
    }
    return this.script[call];
  }
}
