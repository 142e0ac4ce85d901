// Execution loop types

import type { ConversationMessage, ModelReply, ModelToolCall } from '../llm/types.js';
import type { ToolCallResult } from '../tools/types.js';
import type { ToolUsageLedger } from '../tools/usage.js';

export type ExecutorInputs = Record<string, string>;

// 'report' adds an `Error: ...` tool message for failed or unknown calls
export type ToolErrorPolicy = 'report' | 'silent';

export type StopReason = 'completed' | 'max_rounds';

export type ExecutorState =
  | { status: 'init'; inputs: ExecutorInputs }
  // `previous` is the reply whose tool calls were just dispatched
  | { status: 'awaiting_model'; round: number; previous?: ModelReply }
  | { status: 'tool_dispatch'; round: number; reply: ModelReply; toolCalls: ModelToolCall[] }
  | { status: 'done'; output: string; stopReason: StopReason; rounds: number; reply?: ModelReply };

export type DoneState = Extract<ExecutorState, { status: 'done' }>;

export interface ExecutionResult {
  output: string;
  stopReason: StopReason;
  // Model calls made during this invocation
  rounds: number;
  reply?: ModelReply;
  messages: ConversationMessage[];
  toolCalls: ToolCallResult[];
  ledger: ToolUsageLedger;
}
