/**
 * Conversation State
 *
 * Ordered transcript owned by one execution loop. Messages are only ever
 * appended; `clear()` drops everything except a leading system message.
 */

import type { ConversationMessage, ModelToolCall } from '../llm/types.js';

export class ConversationState {
  private messages: ConversationMessage[] = [];

  get length(): number {
    return this.messages.length;
  }

  get hasSystemMessage(): boolean {
    return this.messages[0]?.role === 'system';
  }

  /** Snapshot of the transcript */
  toArray(): ConversationMessage[] {
    return this.messages.map((message) => ({ ...message }));
  }

  last(): ConversationMessage | undefined {
    return this.messages.at(-1);
  }

  appendSystem(content: string): void {
    this.append({ role: 'system', content });
  }

  /** Replace the leading system message, or put one in front */
  setSystem(content: string): void {
    const message: ConversationMessage = { role: 'system', content: content.trimEnd() };
    if (this.hasSystemMessage) {
      this.messages[0] = message;
    } else {
      this.messages.unshift(message);
    }
  }

  appendUser(content: string): void {
    this.append({ role: 'user', content });
  }

  appendAssistant(content: string, toolCalls?: readonly ModelToolCall[]): void {
    const message: ConversationMessage = { role: 'assistant', content };
    if (toolCalls && toolCalls.length > 0) {
      message.toolCalls = toolCalls.map((call) => ({ ...call }));
    }
    this.append(message);
  }

  // A tool message without the id of the call it answers is dropped
  appendTool(content: string, toolCallId: string): void {
    if (!toolCallId) {
      console.warn('[Conversation] Dropping tool message without a call id');
      return;
    }
    this.append({ role: 'tool', content, toolCallId });
  }

  /** Drop every message after the first `length` */
  truncate(length: number): void {
    this.messages.length = Math.min(this.messages.length, Math.max(0, length));
  }

  clear(): void {
    const first = this.messages[0];
    this.messages = first && first.role === 'system' ? [first] : [];
  }

  private append(message: ConversationMessage): void {
    this.messages.push({ ...message, content: message.content.trimEnd() });
  }
}
