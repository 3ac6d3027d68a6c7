import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';

import type { Configuration } from '../config.js';
import type { LogSink, ModelSettings } from '../types.js';
import type { ModelEngine } from './types.js';
import type { LanguageModel } from 'ai';

import { ConfigError } from '../errors.js';

import { AiSdkModelEngine } from './ai-sdk-engine.js';
import { ScriptedLanguageModel } from './test-llm.js';

export type ModelConfig = Configuration['model'];

function buildLanguageModel(config: ModelConfig): LanguageModel {
  switch (config.provider) {
    case 'openai': {
      if (config.apiKey === undefined && config.baseUrl === undefined) {
        throw new ConfigError('model.apiKey is required for provider openai');
      }
      const prov = createOpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
      return prov(config.name);
    }
    case 'anthropic': {
      if (config.apiKey === undefined) {
        throw new ConfigError('model.apiKey is required for provider anthropic');
      }
      const prov = createAnthropic({ apiKey: config.apiKey, baseURL: config.baseUrl });
      return prov(config.name);
    }
    case 'test-llm':
      return new ScriptedLanguageModel(undefined, config.name);
  }
}

/** Build the single configured engine. */
export function createModelEngine(config: ModelConfig, onLog?: LogSink): ModelEngine {
  const model = buildLanguageModel(config);
  return new AiSdkModelEngine(model, { name: `${config.provider}:${config.name}`, onLog });
}

/** Settings from config; request-level values win. */
export function defaultModelSettings(config: ModelConfig): ModelSettings {
  return {
    ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
    ...(config.maxOutputTokens !== undefined ? { maxOutputTokens: config.maxOutputTokens } : {}),
  };
}
