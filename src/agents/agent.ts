import { v4 as uuid } from 'uuid';
import type { ModelClient } from '../llm/types.js';
import { ValueError } from '../schema/errors.js';
import { renderRecordSummary } from '../schema/summary.js';
import { isPlainObject } from '../schema/types.js';
import type { RecordInstance } from '../schema/types.js';
import type { Task } from '../tasks/task.js';
import { TaskOutput } from '../tasks/task-output.js';
import type { BaseTool } from '../tools/base-tool.js';
import { StructuredOutputTool } from '../tools/structured-output-tool.js';
import { ConversationState } from './conversation.js';
import { AgentExecutor } from './executor.js';
import { PROMPT_SLICES, buildTaskExecutionPrompt, fillSlice } from './prompts.js';
import type { ToolErrorPolicy } from './types.js';

export interface AgentConfig {
  role: string;
  goal: string;
  backstory: string;
  model: ModelClient;
  tools?: readonly BaseTool[];
  memory?: boolean;
  maxRounds?: number;
  toolErrorPolicy?: ToolErrorPolicy;
}

function summarizeTools(tools: readonly BaseTool[]): string {
  return tools
    .map((tool) => `- ${tool.name}: ${tool.description.split('\n')[0].substring(0, 100)}`)
    .join('\n');
}

/**
 * Role-playing agent that executes tasks through an AgentExecutor.
 */
export class Agent {
  readonly id: string = uuid();
  readonly role: string;
  readonly goal: string;
  readonly backstory: string;
  readonly model: ModelClient;
  readonly tools: readonly BaseTool[];
  readonly memory: boolean;

  private maxRounds?: number;
  private toolErrorPolicy?: ToolErrorPolicy;
  private _executor: AgentExecutor | null = null;
  // Shared by every task when memory is on
  private conversation = new ConversationState();

  constructor(config: AgentConfig) {
    for (const key of ['role', 'goal', 'backstory'] as const) {
      if (!config[key] || config[key].trim().length === 0) {
        throw new ValueError(`agent requires a ${key}`);
      }
    }
    this.role = config.role;
    this.goal = config.goal;
    this.backstory = config.backstory;
    this.model = config.model;
    this.tools = config.tools ?? [];
    this.memory = config.memory ?? false;
    this.maxRounds = config.maxRounds;
    this.toolErrorPolicy = config.toolErrorPolicy;
  }

  /** Executor of the most recent task */
  get executor(): AgentExecutor | null {
    return this._executor;
  }

  clearMemory(): void {
    this.conversation.clear();
  }

  async executeTask(task: Task, tools?: readonly BaseTool[]): Promise<TaskOutput> {
    let taskPrompt = task.prompt();
    const taskTools: BaseTool[] = [...(tools ?? this.tools)];

    let outputTool: StructuredOutputTool | null = null;
    if (task.outputSchema) {
      outputTool = new StructuredOutputTool(task.outputSchema);
      taskPrompt += `\n${fillSlice(PROMPT_SLICES.structuredOutput, {
        output_format: renderRecordSummary(task.outputSchema),
        tool_name: outputTool.name,
      })}`;
      taskTools.push(outputTool);
    }

    const prompt = buildTaskExecutionPrompt(this, taskTools.length > 0 ? summarizeTools(taskTools) : undefined);

    this._executor = new AgentExecutor({
      model: this.model,
      prompt,
      tools: taskTools,
      memory: this.memory,
      conversation: this.conversation,
      maxRounds: this.maxRounds,
      toolErrorPolicy: this.toolErrorPolicy,
      taskId: task.id,
      agentId: this.id,
      name: this.role,
    });

    console.log(`[${this.role}] Executing task${task.name ? ` '${task.name}'` : ''}`);
    const result = await this._executor.invoke({ input: taskPrompt });

    let structured: RecordInstance | undefined;
    if (outputTool) {
      const last = result.ledger.getLastResult(outputTool.name);
      if (isPlainObject(last)) {
        // Ledger entries are frozen; the task output gets its own copy
        structured = structuredClone(last);
      } else {
        console.warn(`[${this.role}] Task finished without a structured output`);
      }
    }

    const output = new TaskOutput({
      description: task.description,
      name: task.name,
      expectedOutput: task.expectedOutput,
      raw: result.output,
      structured,
      agent: this.id,
    });

    task.output = output;
    return output;
  }
}
