// Model client abstraction types

import type { ToolDescriptor } from '../tools/types.js';

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

// Tool call requested by the model
export interface ModelToolCall {
  id: string;
  name: string;
  // JSON text (chat-completions) or a decoded object (Anthropic)
  rawArguments: unknown;
}

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  // Set on tool messages: the call this message answers
  toolCallId?: string;
  // Set on assistant messages that requested tools
  toolCalls?: ModelToolCall[];
}

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelReply {
  content?: string;
  toolCalls?: ModelToolCall[];
  model?: string;
  usage?: ModelUsage;
  finishReason?: string;
}

export interface ModelClient {
  readonly name: string;
  readonly model: string;

  // Send the full conversation and every available tool; one reply back
  send(messages: readonly ConversationMessage[], tools: readonly ToolDescriptor[]): Promise<ModelReply>;
}

export type ModelProviderName = 'openai' | 'anthropic';

/**
 * Sanitize tool name to match provider patterns: ^[a-zA-Z0-9_-]{1,64}$
 * Replaces dots and other invalid characters with underscores.
 */
export function sanitizeToolName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64);
}
