import { describe, expect, it } from 'vitest';

import type { ModelStreamChunk } from '../../llm-providers/types.js';
import type { ConversationTurn, ToolDefinition } from '../../types.js';

import { parseConfiguration } from '../../config.js';
import { ConfigError, ModelError } from '../../errors.js';
import { AiSdkModelEngine, convertTurns, NO_TOOL_OUTPUT, renderToolOutcome } from '../../llm-providers/ai-sdk-engine.js';
import { createModelEngine, defaultModelSettings } from '../../llm-providers/factory.js';
import { lastUserText, ScriptedLanguageModel } from '../../llm-providers/test-llm.js';

const LIST_FILES: ToolDefinition = {
  name: 'fs-list_files',
  description: 'List the files in a directory.',
  inputSchema: { type: 'object', properties: { path: { type: 'string' } }, required: ['path'] },
  identity: { serverName: 'fs', toolName: 'list_files' },
};

const userTurn = (content: string): ConversationTurn => ({ role: 'request', parts: [{ kind: 'user-prompt', content, timestamp: 1 }] });

const collect = async (stream: AsyncIterable<ModelStreamChunk>): Promise<ModelStreamChunk[]> => {
  const out: ModelStreamChunk[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for await (const chunk of stream) out.push(chunk);
  return out;
};

describe('AiSdkModelEngine', () => {
  it('streams text as one part with deltas and reports usage', async () => {
    const engine = new AiSdkModelEngine(new ScriptedLanguageModel([{ text: 'Hello there world', usage: { inputTokens: 7, outputTokens: 3 } }]));
    const chunks = await collect(engine.requestStream({ messages: [userTurn('hi')], tools: [], settings: {} }));
    expect(chunks.slice(0, -1)).toEqual([
      { type: 'part-start', index: 0, part: { kind: 'text', content: 'Hello ' } },
      { type: 'part-delta', index: 0, delta: { kind: 'text', content: 'there ' } },
      { type: 'part-delta', index: 0, delta: { kind: 'text', content: 'world' } },
    ]);
    const finish = chunks.at(-1);
    expect(finish?.type).toBe('finish');
    if (finish?.type !== 'finish') return;
    expect(finish.response.parts).toEqual([{ kind: 'text', content: 'Hello there world' }]);
    expect(finish.response.modelName).toBe('test-llm:scripted');
    expect(finish.usage).toEqual({ inputTokens: 7, outputTokens: 3, totalTokens: 10 });
  });

  it('surfaces tool calls as proposals without running them', async () => {
    const model = new ScriptedLanguageModel([{
      toolCalls: [{ toolCallId: 'call-1', toolName: 'fs-list_files', args: { path: '/docs' } }],
    }]);
    const engine = new AiSdkModelEngine(model, { name: 'scripted' });
    const chunks = await collect(engine.requestStream({ messages: [userTurn('what is in /docs?')], tools: [LIST_FILES], settings: {} }));
    const call = { kind: 'tool-call', toolName: 'fs-list_files', args: { path: '/docs' }, toolCallId: 'call-1' };
    expect(chunks[0]).toEqual({ type: 'part-start', index: 0, part: call });
    const finish = chunks.at(-1);
    expect(finish?.type === 'finish' ? finish.response.parts : []).toEqual([call]);
    expect(model.callCount).toBe(1);
    expect(lastUserText(model.prompts[0])).toBe('what is in /docs?');
  });

  it('raises ModelError when the provider fails', async () => {
    const engine = new AiSdkModelEngine(new ScriptedLanguageModel([{ error: 'rate limited' }]));
    const run = collect(engine.requestStream({ messages: [userTurn('hi')], tools: [], settings: {} }));
    await expect(run).rejects.toBeInstanceOf(ModelError);
  });

  it('fails once the script runs out', async () => {
    const engine = new AiSdkModelEngine(new ScriptedLanguageModel([]));
    await expect(collect(engine.requestStream({ messages: [userTurn('hi')], tools: [], settings: {} })))
      .rejects.toThrow('script exhausted after 0 step(s)');
  });
});

describe('convertTurns', () => {
  it('maps history onto AI SDK messages', () => {
    const turns: ConversationTurn[] = [
      {
        role: 'request',
        parts: [
          { kind: 'system-prompt', content: 'Be brief.' },
          { kind: 'user-prompt', content: 'List /docs and /src', timestamp: 1 },
        ],
      },
      {
        role: 'response',
        timestamp: 2,
        parts: [
          { kind: 'text', content: 'Looking.' },
          { kind: 'tool-call', toolName: 'fs-list_files', args: { path: '/docs' }, toolCallId: 'a' },
          { kind: 'tool-call', toolName: 'fs-list_files', args: { path: '/src' }, toolCallId: 'b' },
        ],
      },
      {
        role: 'request',
        parts: [
          { kind: 'tool-return', toolName: 'fs-list_files', toolCallId: 'a', content: { content: [{ type: 'text', text: 'guide.md' }], isError: false }, timestamp: 3 },
          { kind: 'tool-return', toolName: 'fs-list_files', toolCallId: 'b', content: { content: [{ type: 'text', text: 'denied' }], isError: true, errorKind: 'denied' }, timestamp: 3 },
        ],
      },
    ];
    expect(convertTurns(turns)).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'List /docs and /src' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Looking.' },
          { type: 'tool-call', toolCallId: 'a', toolName: 'fs-list_files', input: { path: '/docs' } },
          { type: 'tool-call', toolCallId: 'b', toolName: 'fs-list_files', input: { path: '/src' } },
        ],
      },
      {
        role: 'tool',
        content: [
          { type: 'tool-result', toolCallId: 'a', toolName: 'fs-list_files', output: { type: 'text', value: 'guide.md' } },
          { type: 'tool-result', toolCallId: 'b', toolName: 'fs-list_files', output: { type: 'error-text', value: 'denied' } },
        ],
      },
    ]);
  });
});

describe('renderToolOutcome', () => {
  it('joins text blocks', () => {
    expect(renderToolOutcome({ content: [{ type: 'text', text: 'a' }, { type: 'image', data: '' }, { type: 'text', text: 'b' }], isError: false })).toBe('a\nb');
  });

  it('falls back to structured content, then raw blocks', () => {
    expect(renderToolOutcome({ content: [], structuredContent: { n: 1 }, isError: false })).toBe('{"n":1}');
    expect(renderToolOutcome({ content: [{ type: 'image', data: 'x' }], isError: false })).toBe('[{"type":"image","data":"x"}]');
    expect(renderToolOutcome({ content: [], isError: false })).toBe(NO_TOOL_OUTPUT);
  });
});

describe('createModelEngine', () => {
  const base = parseConfiguration({}).model;

  it('builds the scripted engine by default and echoes the prompt', async () => {
    const engine = createModelEngine(base);
    expect(engine.name).toBe('test-llm:scripted');
    const chunks = await collect(engine.requestStream({ messages: [userTurn('ping')], tools: [], settings: {} }));
    const finish = chunks.at(-1);
    expect(finish?.type === 'finish' ? finish.response.parts : []).toEqual([{ kind: 'text', content: 'echo: ping' }]);
  });

  it('requires credentials for hosted providers', () => {
    expect(() => createModelEngine({ ...base, provider: 'openai', name: 'gpt-4o-mini' })).toThrow(ConfigError);
    expect(() => createModelEngine({ ...base, provider: 'anthropic', name: 'claude-3-5-haiku-latest' })).toThrow('model.apiKey is required for provider anthropic');
    expect(createModelEngine({ ...base, provider: 'anthropic', name: 'claude-3-5-haiku-latest', apiKey: 'test-key' }).name)
      .toBe('anthropic:claude-3-5-haiku-latest');
  });

  it('copies only configured settings', () => {
    expect(defaultModelSettings(base)).toEqual({});
    expect(defaultModelSettings({ ...base, temperature: 0.2, maxOutputTokens: 256 })).toEqual({ temperature: 0.2, maxOutputTokens: 256 });
  });
});
