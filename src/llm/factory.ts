import type { AppConfig } from '../config/index.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAIProvider } from './openai.js';
import type { ModelClient } from './types.js';

export function createModelClient(config: AppConfig): ModelClient {
  switch (config.provider) {
    case 'anthropic':
      if (!config.anthropicApiKey) {
        throw new Error('ANTHROPIC_API_KEY required for Anthropic provider');
      }
      return new AnthropicProvider({
        apiKey: config.anthropicApiKey,
        model: config.model,
        debug: config.debugLlm,
      });

    case 'openai':
    default:
      if (!config.openaiApiKey) {
        throw new Error('OPENAI_API_KEY required for OpenAI provider');
      }
      return new OpenAIProvider({
        apiKey: config.openaiApiKey,
        model: config.model,
        baseUrl: config.openaiBaseUrl,
        debug: config.debugLlm,
      });
  }
}
