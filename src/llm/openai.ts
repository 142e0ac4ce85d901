import type { ToolDescriptor } from '../tools/types.js';
import type { ConversationMessage, ModelClient, ModelReply, ModelToolCall } from './types.js';
import { sanitizeToolName } from './types.js';
import { openAIChatCompletionSchema } from './openai-types.js';
import type {
  OpenAIChatCompletionRequest,
  OpenAIFunctionTool,
  OpenAIMessage,
} from './openai-types.js';

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  debug?: boolean;
}

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';
export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';

function serializeArguments(raw: unknown): string {
  if (typeof raw === 'string') {
    return raw;
  }
  return JSON.stringify(raw ?? {});
}

/**
 * OpenAI-compatible chat-completions provider
 *
 * Works against any endpoint speaking the chat-completions dialect
 * (OpenAI, DeepSeek, local gateways) by changing `baseUrl`.
 */
export class OpenAIProvider implements ModelClient {
  readonly name = 'openai';
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;
  private maxTokens?: number;
  private temperature?: number;
  private debug: boolean;

  constructor(config: OpenAIProviderConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? OPENAI_DEFAULT_MODEL;
    this.baseUrl = (config.baseUrl ?? OPENAI_DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    this.debug = config.debug ?? false;
  }

  async send(messages: readonly ConversationMessage[], tools: readonly ToolDescriptor[]): Promise<ModelReply> {
    // Reverse map: sanitized name -> original name
    const toolNameMap = new Map<string, string>();
    const openaiTools: OpenAIFunctionTool[] = tools.map((tool) => {
      const sanitized = sanitizeToolName(tool.name);
      toolNameMap.set(sanitized, tool.name);
      return {
        type: 'function',
        function: {
          name: sanitized,
          description: tool.description,
          parameters: tool.argumentSchema,
        },
      };
    });

    const requestBody: OpenAIChatCompletionRequest = {
      model: this.model,
      messages: this.convertMessages(messages),
    };
    if (openaiTools.length > 0) {
      requestBody.tools = openaiTools;
      requestBody.tool_choice = 'auto';
    }
    if (this.maxTokens !== undefined) {
      requestBody.max_tokens = this.maxTokens;
    }
    if (this.temperature !== undefined) {
      requestBody.temperature = this.temperature;
    }

    if (this.debug) {
      console.log(`[OpenAI] Request: model=${this.model}, messages=${messages.length}, tools=${openaiTools.length}`);
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`[OpenAI] API error: ${response.status} ${error}`);
    }

    const parsed = openAIChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`[OpenAI] Unexpected response shape: ${issues}`);
    }

    const data = parsed.data;
    const choice = data.choices[0];
    const toolCalls: ModelToolCall[] = (choice.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: toolNameMap.get(call.function.name) ?? call.function.name,
      rawArguments: call.function.arguments,
    }));

    if (this.debug) {
      console.log(`[OpenAI] Reply: finish=${choice.finish_reason ?? 'none'}, toolCalls=${toolCalls.length}`);
    }

    const reply: ModelReply = {
      content: choice.message.content ?? undefined,
      model: data.model ?? this.model,
      finishReason: choice.finish_reason ?? undefined,
    };
    if (toolCalls.length > 0) {
      reply.toolCalls = toolCalls;
    }
    if (data.usage) {
      reply.usage = {
        inputTokens: data.usage.prompt_tokens ?? 0,
        outputTokens: data.usage.completion_tokens ?? 0,
      };
    }
    return reply;
  }

  /**
   * Convert conversation messages to chat-completions format
   */
  private convertMessages(messages: readonly ConversationMessage[]): OpenAIMessage[] {
    return messages.map((message): OpenAIMessage => {
      switch (message.role) {
        case 'tool':
          return {
            role: 'tool',
            tool_call_id: message.toolCallId ?? '',
            content: message.content,
          };
        case 'assistant':
          if (message.toolCalls && message.toolCalls.length > 0) {
            return {
              role: 'assistant',
              content: message.content || null,
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: 'function',
                function: {
                  name: sanitizeToolName(call.name),
                  arguments: serializeArguments(call.rawArguments),
                },
              })),
            };
          }
          return { role: 'assistant', content: message.content };
        default:
          return { role: message.role, content: message.content };
      }
    });
  }
}
