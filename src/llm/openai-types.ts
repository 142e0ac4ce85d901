/**
 * OpenAI API Types
 * Request types and zod schemas for Chat Completions responses
 */

import { z } from 'zod';
import type { SchemaDescription } from '../schema/types.js';

// ============================================================================
// Response Schemas
// ============================================================================

/** A tool call in an assistant message */
export const openAIToolCallSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default('{}'),
  }),
});

/** Message content in a chat completion response */
export const openAIResponseMessageSchema = z.object({
  content: z.string().nullish(),
  tool_calls: z.array(openAIToolCallSchema).nullish(),
});

/** Token usage statistics */
export const openAIUsageSchema = z.object({
  prompt_tokens: z.number().optional(),
  completion_tokens: z.number().optional(),
  total_tokens: z.number().optional(),
});

/** Response from the chat completions endpoint */
export const openAIChatCompletionSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: openAIResponseMessageSchema,
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: openAIUsageSchema.nullish(),
});

export type OpenAIToolCall = z.infer<typeof openAIToolCallSchema>;
export type OpenAIChatCompletionResponse = z.infer<typeof openAIChatCompletionSchema>;

// ============================================================================
// Request Message Types
// ============================================================================

/** Basic message for chat completions */
export interface OpenAIRequestMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Tool call structure for request messages */
export interface OpenAIRequestToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

/** Assistant message with tool calls for request */
export interface OpenAIAssistantMessageWithTools {
  role: 'assistant';
  content: string | null;
  tool_calls: OpenAIRequestToolCall[];
}

/** Tool result message for request */
export interface OpenAIToolResultMessage {
  role: 'tool';
  tool_call_id: string;
  content: string;
}

/** Union of all possible message types in a request */
export type OpenAIMessage =
  | OpenAIRequestMessage
  | OpenAIAssistantMessageWithTools
  | OpenAIToolResultMessage;

// ============================================================================
// Tool Definition Types
// ============================================================================

export interface OpenAIFunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: SchemaDescription;
  };
}

export interface OpenAIChatCompletionRequest {
  model: string;
  messages: OpenAIMessage[];
  tools?: OpenAIFunctionTool[];
  tool_choice?: 'auto' | 'none';
  max_tokens?: number;
  temperature?: number;
}
