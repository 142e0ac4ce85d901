import Anthropic from '@anthropic-ai/sdk';
import { decodeJson } from '../parser/json.js';
import { isPlainObject } from '../schema/types.js';
import type { ToolDescriptor } from '../tools/types.js';
import type { ConversationMessage, ModelClient, ModelReply, ModelToolCall } from './types.js';
import { sanitizeToolName } from './types.js';

// Content block as returned by messages.create; only the fields read here
export interface AnthropicReplyBlock {
  type: string;
  text?: string;
  id?: string;
  name?: string;
  input?: unknown;
}

export interface AnthropicReply {
  content: AnthropicReplyBlock[];
  model?: string;
  stop_reason?: string | null;
  usage?: { input_tokens: number; output_tokens: number };
}

/** The part of the SDK client this provider talks to */
export interface AnthropicMessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<AnthropicReply>;
  };
}

export interface AnthropicProviderConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  debug?: boolean;
  client?: AnthropicMessagesClient;
}

export const ANTHROPIC_DEFAULT_MODEL = 'claude-sonnet-4-20250514';

function toolInput(raw: unknown): Record<string, unknown> {
  if (typeof raw === 'string') {
    const decoded = decodeJson(raw);
    return decoded.ok && isPlainObject(decoded.value) ? decoded.value : {};
  }
  return isPlainObject(raw) ? raw : {};
}

export class AnthropicProvider implements ModelClient {
  readonly name = 'anthropic';
  readonly model: string;

  private client: AnthropicMessagesClient;
  private maxTokens: number;
  private temperature?: number;
  private debug: boolean;

  constructor(config: AnthropicProviderConfig) {
    this.model = config.model ?? ANTHROPIC_DEFAULT_MODEL;
    this.client = config.client ?? new Anthropic({ apiKey: config.apiKey });
    this.maxTokens = config.maxTokens ?? 4096;
    this.temperature = config.temperature;
    this.debug = config.debug ?? false;
  }

  async send(messages: readonly ConversationMessage[], tools: readonly ToolDescriptor[]): Promise<ModelReply> {
    // Separate system messages from conversation
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    // Build reverse map: sanitized name -> original name
    const toolNameMap = new Map<string, string>();
    const anthropicTools: Anthropic.Tool[] = tools.map((tool) => {
      const sanitized = sanitizeToolName(tool.name);
      toolNameMap.set(sanitized, tool.name);
      return {
        name: sanitized,
        description: tool.description,
        input_schema: {
          type: 'object',
          properties: tool.argumentSchema.properties ?? {},
          required: tool.argumentSchema.required ?? [],
        },
      };
    });

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: this.formatMessagesForApi(messages),
    };
    if (system) {
      params.system = system;
    }
    if (this.temperature !== undefined) {
      params.temperature = this.temperature;
    }
    if (anthropicTools.length > 0) {
      params.tools = anthropicTools;
      params.tool_choice = { type: 'auto' };
    }

    if (this.debug) {
      console.log(`[Anthropic] Request: model=${this.model}, messages=${params.messages.length}, tools=${anthropicTools.length}`);
    }

    const response = await this.client.messages.create(params);

    // Extract text content
    const content = response.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    // Extract tool_use content and map sanitized names back to original
    const toolCalls: ModelToolCall[] = [];
    for (const block of response.content) {
      if (block.type === 'tool_use' && typeof block.id === 'string' && typeof block.name === 'string') {
        toolCalls.push({
          id: block.id,
          name: toolNameMap.get(block.name) ?? block.name,
          rawArguments: block.input ?? {},
        });
      }
    }

    if (this.debug) {
      console.log(`[Anthropic] Reply: stop=${response.stop_reason ?? 'none'}, toolCalls=${toolCalls.length}`);
    }

    const reply: ModelReply = {
      content,
      model: response.model ?? this.model,
      finishReason: response.stop_reason ?? undefined,
    };
    if (toolCalls.length > 0) {
      reply.toolCalls = toolCalls;
    }
    if (response.usage) {
      reply.usage = {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      };
    }
    return reply;
  }

  /**
   * Format messages for the API: assistant tool calls become tool_use blocks,
   * and consecutive tool messages are merged into one user turn of tool_result blocks.
   */
  private formatMessagesForApi(messages: readonly ConversationMessage[]): Anthropic.MessageParam[] {
    const formatted: Anthropic.MessageParam[] = [];
    let pendingResults: Anthropic.ToolResultBlockParam[] | null = null;

    for (const message of messages) {
      if (message.role === 'system') {
        continue;
      }

      if (message.role === 'tool') {
        const block: Anthropic.ToolResultBlockParam = {
          type: 'tool_result',
          tool_use_id: message.toolCallId ?? '',
          content: message.content,
        };
        if (pendingResults) {
          pendingResults.push(block);
        } else {
          pendingResults = [block];
          formatted.push({ role: 'user', content: pendingResults });
        }
        continue;
      }

      pendingResults = null;

      if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
        const blocks: Array<Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam> = [];
        if (message.content) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls) {
          blocks.push({
            type: 'tool_use',
            id: call.id,
            name: sanitizeToolName(call.name),
            input: toolInput(call.rawArguments),
          });
        }
        formatted.push({ role: 'assistant', content: blocks });
        continue;
      }

      formatted.push({ role: message.role, content: message.content });
    }

    return formatted;
  }
}
