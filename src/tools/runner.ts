/**
 * Tool Runner - Executes tools and emits events
 *
 * Central runtime for tool execution that:
 * - Registers tools by name
 * - Resolves and parses untrusted call requests
 * - Emits events around every execution
 */

import type { RecordInstance } from '../schema/types.js';
import type { BaseTool } from './base-tool.js';
import type {
  ToolCallRequest,
  ToolCallResult,
  ToolDescriptor,
  ToolEvent,
  ToolEventCallback,
} from './types.js';

export interface ToolRunnerConfig {
  tools?: readonly BaseTool[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Detached, frozen copy for the ledger. Values structuredClone cannot copy
 * (functions, class instances holding them) are recorded as given.
 */
function snapshot<T>(value: T): T {
  let copy: T;
  try {
    copy = structuredClone(value);
  } catch (error) {
    console.warn('[ToolRunner] Tool output is not cloneable, recording it as is:', errorMessage(error));
    return value;
  }
  return deepFreeze(copy);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ToolRunner {
  private tools: Map<string, BaseTool> = new Map();
  private eventListeners: Set<ToolEventCallback> = new Set();

  constructor(config: ToolRunnerConfig = {}) {
    for (const tool of config.tools ?? []) {
      this.registerTool(tool);
    }
  }

  /**
   * Register a tool
   * A tool whose name is already taken is rejected; the first one wins
   */
  registerTool(tool: BaseTool): boolean {
    if (this.tools.has(tool.name)) {
      console.error(`[ToolRunner] Tool '${tool.name}' is already registered. Duplicate ignored.`);
      return false;
    }
    this.tools.set(tool.name, tool);
    console.log(`[ToolRunner] Registered tool: ${tool.name}`);
    return true;
  }

  getTool(name: string): BaseTool | undefined {
    return this.tools.get(name);
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Get all tool descriptors, in registration order
   */
  getToolDescriptors(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => tool.describe());
  }

  /**
   * Subscribe to tool events
   * Returns unsubscribe function
   */
  onToolEvent(callback: ToolEventCallback): () => void {
    this.eventListeners.add(callback);
    return () => this.eventListeners.delete(callback);
  }

  /**
   * Emit event to all listeners
   */
  private emitEvent(event: ToolEvent): void {
    for (const listener of this.eventListeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('[ToolRunner] Event listener error:', error);
      }
    }
  }

  /**
   * Execute a single tool call
   * Never throws for tool failures: they come back as `success: false`
   */
  async executeTool(request: ToolCallRequest): Promise<ToolCallResult> {
    const startTime = new Date();

    this.emitEvent({
      type: 'tool_requested',
      requestId: request.id,
      toolName: request.toolName,
      rawArguments: request.rawArguments,
      timestamp: startTime,
    });

    let resolvedArguments: RecordInstance = {};
    let result: ToolCallResult;

    try {
      const tool = this.tools.get(request.toolName);
      if (!tool) {
        throw new Error(`Tool not found: ${request.toolName}`);
      }
      resolvedArguments = tool.parseArguments(request.rawArguments);
      // The tool gets its own copy; the ledger keeps the parsed arguments
      const output = await tool.execute(structuredClone(resolvedArguments));
      const endTime = new Date();

      result = Object.freeze({
        id: request.id,
        toolName: request.toolName,
        resolvedArguments: snapshot(resolvedArguments),
        success: true,
        output: snapshot(output),
        startTime,
        endTime,
        durationMs: endTime.getTime() - startTime.getTime(),
      });
    } catch (error) {
      const endTime = new Date();
      console.error(`[ToolRunner] Tool '${request.toolName}' failed:`, errorMessage(error));

      result = Object.freeze({
        id: request.id,
        toolName: request.toolName,
        resolvedArguments: snapshot(resolvedArguments),
        success: false,
        error: errorMessage(error),
        startTime,
        endTime,
        durationMs: endTime.getTime() - startTime.getTime(),
      });
    }

    this.emitEvent({
      type: 'tool_execution_finished',
      requestId: result.id,
      toolName: result.toolName,
      success: result.success,
      resolvedArguments: result.resolvedArguments,
      result: result.output,
      error: result.error,
      startTime: result.startTime,
      endTime: result.endTime,
      durationMs: result.durationMs,
      timestamp: new Date(),
    });

    return result;
  }
}
