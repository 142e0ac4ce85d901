import type { ConversationMessage, ModelClient, ModelReply } from '../../llm/types.js';
import type { ToolDescriptor } from '../../tools/types.js';

/** Model client that plays back canned replies and records what it was sent */
export class ScriptedModel implements ModelClient {
  readonly name = 'scripted';
  readonly model = 'scripted-1';
  readonly requests: Array<{ messages: ConversationMessage[]; tools: string[] }> = [];

  private replies: Array<ModelReply | Error>;

  constructor(replies: Array<ModelReply | Error>) {
    this.replies = [...replies];
  }

  async send(messages: readonly ConversationMessage[], tools: readonly ToolDescriptor[]): Promise<ModelReply> {
    this.requests.push({ messages: messages.map((message) => ({ ...message })), tools: tools.map((tool) => tool.name) });
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('no scripted reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
