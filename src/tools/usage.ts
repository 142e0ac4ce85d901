/**
 * Tool Usage Ledger
 *
 * Append-only record of the tool calls made by one agent for one task.
 * `addToolCall` is the only writer; entries are frozen results and the
 * accessors hand out copies of the list.
 */

import { v4 as uuid } from 'uuid';
import type { ToolCallResult } from './types.js';

export interface ToolUsageSummaryEntry {
  toolName: string;
  arguments: Readonly<Record<string, unknown>>;
  resultType: string;
  result: unknown;
  success: boolean;
}

export interface ToolUsageSummary {
  id: string;
  taskId: string | null;
  agentId: string | null;
  toolCalls: ToolUsageSummaryEntry[];
  createdAt: string;
  totalCalls: number;
}

export interface ToolUsageJSON {
  id: string;
  taskId: string | null;
  agentId: string | null;
  toolCalls: Array<{
    id: string;
    toolName: string;
    arguments: Readonly<Record<string, unknown>>;
    success: boolean;
    result?: unknown;
    error?: string;
    durationMs: number;
  }>;
  createdAt: string;
}

export interface ToolUsageLedgerOptions {
  taskId?: string;
  agentId?: string;
}

function typeName(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

/** A call counts as successful when it produced a non-null output */
function isSuccessful(call: ToolCallResult): boolean {
  return call.success && call.output !== undefined && call.output !== null;
}

export class ToolUsageLedger {
  readonly id: string = uuid();
  readonly taskId: string | null;
  readonly agentId: string | null;
  readonly createdAt: Date = new Date();
  private calls: ToolCallResult[] = [];

  constructor(options: ToolUsageLedgerOptions = {}) {
    this.taskId = options.taskId ?? null;
    this.agentId = options.agentId ?? null;
  }

  static fromToolCalls(calls: readonly ToolCallResult[], options: ToolUsageLedgerOptions = {}): ToolUsageLedger {
    const ledger = new ToolUsageLedger(options);
    for (const call of calls) {
      ledger.addToolCall(call);
    }
    return ledger;
  }

  addToolCall(call: ToolCallResult): void {
    this.calls.push(Object.isFrozen(call) ? call : Object.freeze({ ...call }));
  }

  get toolCalls(): ToolCallResult[] {
    return [...this.calls];
  }

  get toolNames(): string[] {
    return this.calls.map((call) => call.toolName);
  }

  get size(): number {
    return this.calls.length;
  }

  getResultsByTool(toolName: string): unknown[] {
    return this.calls.filter((call) => call.toolName === toolName).map((call) => call.output);
  }

  /**
   * Output of the most recent call, optionally restricted to one tool.
   * Undefined when there is no such call.
   */
  getLastResult(toolName?: string): unknown {
    const matching = toolName === undefined
      ? this.calls
      : this.calls.filter((call) => call.toolName === toolName);
    return matching.at(-1)?.output;
  }

  hasToolCall(toolName: string): boolean {
    return this.calls.some((call) => call.toolName === toolName);
  }

  filterSuccessfulCalls(): ToolCallResult[] {
    return this.calls.filter(isSuccessful);
  }

  summary(): ToolUsageSummary {
    return {
      id: this.id,
      taskId: this.taskId,
      agentId: this.agentId,
      toolCalls: this.calls.map((call) => ({
        toolName: call.toolName,
        arguments: call.resolvedArguments,
        resultType: typeName(call.output),
        result: call.output,
        success: isSuccessful(call),
      })),
      createdAt: this.createdAt.toISOString(),
      totalCalls: this.calls.length,
    };
  }

  toJSON(): ToolUsageJSON {
    return {
      id: this.id,
      taskId: this.taskId,
      agentId: this.agentId,
      toolCalls: this.calls.map((call) => ({
        id: call.id,
        toolName: call.toolName,
        arguments: call.resolvedArguments,
        success: call.success,
        result: call.output,
        error: call.error,
        durationMs: call.durationMs,
      })),
      createdAt: this.createdAt.toISOString(),
    };
  }
}
