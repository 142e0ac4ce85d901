/**
 * Agent Executor
 *
 * Turn-based loop: send the conversation to the model, dispatch whatever
 * tools it asks for, feed the results back, and stop when a reply comes
 * without tool calls (or when the round limit is hit).
 *
 *   init -> awaiting_model -> (tool_dispatch -> awaiting_model)* -> done
 */

import type { ConversationMessage, ModelClient, ModelReply, ModelToolCall } from '../llm/types.js';
import type { BaseTool } from '../tools/base-tool.js';
import { ToolRunner } from '../tools/runner.js';
import { ToolUsageLedger } from '../tools/usage.js';
import { formatToolResultContent } from '../utils/tool-results.js';
import { ConversationState } from './conversation.js';
import { fillSlice } from './prompts.js';
import type { PromptTemplate } from './prompts.js';
import type {
  DoneState,
  ExecutionResult,
  ExecutorInputs,
  ExecutorState,
  ToolErrorPolicy,
} from './types.js';

export const DEFAULT_MAX_ROUNDS = 10;

export interface AgentExecutorConfig {
  model: ModelClient;
  prompt: PromptTemplate;
  tools?: readonly BaseTool[];
  // Existing runner to register the tools on (e.g. one with event listeners)
  runner?: ToolRunner;
  // Keep the conversation across invocations
  memory?: boolean;
  // Transcript to retain into when memory is on, e.g. one owned by an agent
  conversation?: ConversationState;
  maxRounds?: number;
  toolErrorPolicy?: ToolErrorPolicy;
  taskId?: string;
  agentId?: string;
  // Log prefix
  name?: string;
}

export class AgentExecutor {
  readonly model: ModelClient;
  readonly prompt: PromptTemplate;
  readonly memory: boolean;
  readonly maxRounds: number;
  readonly toolErrorPolicy: ToolErrorPolicy;
  readonly runner: ToolRunner;

  private taskId?: string;
  private agentId?: string;
  private logPrefix: string;
  private conversation: ConversationState;
  private lastLedger: ToolUsageLedger | null = null;

  constructor(config: AgentExecutorConfig) {
    this.model = config.model;
    this.prompt = config.prompt;
    this.memory = config.memory ?? false;
    this.maxRounds = config.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.toolErrorPolicy = config.toolErrorPolicy ?? 'report';
    this.taskId = config.taskId;
    this.agentId = config.agentId;
    this.logPrefix = `[${config.name ?? 'AgentExecutor'}]`;
    this.conversation = config.conversation ?? new ConversationState();

    this.runner = config.runner ?? new ToolRunner();
    for (const tool of config.tools ?? []) {
      this.runner.registerTool(tool);
    }
  }

  /** Snapshot of the retained conversation (empty when memory is disabled) */
  get messages(): ConversationMessage[] {
    return this.conversation.toArray();
  }

  /** Ledger of the most recent invocation */
  get ledger(): ToolUsageLedger | null {
    return this.lastLedger;
  }

  clearMemory(): void {
    this.conversation.clear();
  }

  async invoke(inputs: ExecutorInputs): Promise<ExecutionResult> {
    const conversation = this.memory ? this.conversation : new ConversationState();
    const ledger = new ToolUsageLedger({ taskId: this.taskId, agentId: this.agentId });
    this.lastLedger = ledger;

    // A failed invocation leaves the retained conversation as it found it
    const mark = conversation.length;

    let state: DoneState;
    try {
      state = await this.run({ status: 'init', inputs }, conversation, ledger);
    } catch (error) {
      conversation.truncate(mark);
      throw error;
    }

    const result: ExecutionResult = {
      output: state.output,
      stopReason: state.stopReason,
      rounds: state.rounds,
      messages: conversation.toArray(),
      toolCalls: ledger.toolCalls,
      ledger,
    };
    if (state.reply) {
      result.reply = state.reply;
    }
    return result;
  }

  private async run(
    initial: ExecutorState,
    conversation: ConversationState,
    ledger: ToolUsageLedger
  ): Promise<DoneState> {
    let state: ExecutorState = initial;

    while (state.status !== 'done') {
      switch (state.status) {
        case 'init':
          this.seed(conversation, state.inputs);
          state = { status: 'awaiting_model', round: 1 };
          break;

        case 'awaiting_model':
          state = await this.awaitModel(conversation, state.round, state.previous);
          break;

        case 'tool_dispatch':
          await this.dispatchTools(conversation, ledger, state.reply, state.toolCalls);
          state = { status: 'awaiting_model', round: state.round + 1, previous: state.reply };
          break;

        default: {
          const unknownState: never = state;
          throw new Error(`${this.logPrefix} Unknown state: ${JSON.stringify(unknownState)}`);
        }
      }
    }

    return state;
  }

  private seed(conversation: ConversationState, inputs: ExecutorInputs): void {
    if (this.prompt.system) {
      conversation.setSystem(fillSlice(this.prompt.system, inputs));
    }
    conversation.appendUser(fillSlice(this.prompt.user, inputs));
  }

  private async awaitModel(
    conversation: ConversationState,
    round: number,
    previous?: ModelReply
  ): Promise<ExecutorState> {
    if (round > this.maxRounds) {
      console.warn(`${this.logPrefix} Max rounds (${this.maxRounds}) reached`);
      return {
        status: 'done',
        output: (previous?.content ?? '').trimEnd(),
        stopReason: 'max_rounds',
        rounds: this.maxRounds,
        reply: previous,
      };
    }

    // Model failures propagate unchanged
    const reply = await this.model.send(conversation.toArray(), this.runner.getToolDescriptors());

    const toolCalls = reply.toolCalls ?? [];
    if (toolCalls.length > 0) {
      console.log(`${this.logPrefix} Round ${round}: ${toolCalls.length} tool call(s) requested`);
      return { status: 'tool_dispatch', round, reply, toolCalls };
    }

    const output = (reply.content ?? '').trimEnd();
    conversation.appendAssistant(output);
    return { status: 'done', output, stopReason: 'completed', rounds: round, reply };
  }

  /**
   * Run the requested calls in order. A failing or unknown tool never aborts
   * the turn or the remaining calls. The assistant turn lists only the calls
   * answered by a tool message, so no call is left without its result.
   */
  private async dispatchTools(
    conversation: ConversationState,
    ledger: ToolUsageLedger,
    reply: ModelReply,
    toolCalls: readonly ModelToolCall[]
  ): Promise<void> {
    const answers: Array<{ call: ModelToolCall; content: string }> = [];

    for (const call of toolCalls) {
      if (!this.runner.hasTool(call.name)) {
        console.warn(`${this.logPrefix} Unknown tool '${call.name}' requested, skipping`);
        if (this.toolErrorPolicy === 'report') {
          answers.push({ call, content: `Error: Tool not found: ${call.name}` });
        }
        continue;
      }

      const result = await this.runner.executeTool({
        id: call.id,
        toolName: call.name,
        rawArguments: call.rawArguments,
      });
      ledger.addToolCall(result);

      if (!result.success) {
        console.warn(`${this.logPrefix} Tool '${call.name}' failed: ${result.error ?? 'unknown error'}`);
        if (this.toolErrorPolicy === 'silent') {
          continue;
        }
      }

      answers.push({ call, content: formatToolResultContent(result) });
    }

    const content = reply.content ?? '';
    if (answers.length === 0 && content.trim().length === 0) {
      return;
    }
    conversation.appendAssistant(content, answers.map((answer) => answer.call));
    for (const answer of answers) {
      conversation.appendTool(answer.content, answer.call.id);
    }
  }
}
