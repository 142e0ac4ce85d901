export * from './types.js';
export {
  AnthropicProvider,
  ANTHROPIC_DEFAULT_MODEL,
  type AnthropicProviderConfig,
  type AnthropicMessagesClient,
  type AnthropicReply,
  type AnthropicReplyBlock,
} from './anthropic.js';
export { OpenAIProvider, OPENAI_DEFAULT_MODEL, OPENAI_DEFAULT_BASE_URL, type OpenAIProviderConfig } from './openai.js';
export { createModelClient } from './factory.js';
