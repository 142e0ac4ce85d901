/**
 * Tool System Types
 *
 * Core type definitions for tool descriptors, call requests, call results,
 * and the events emitted while a call runs.
 */

import type { SchemaDescription } from '../schema/types.js';

// Externally visible description of a tool, ready to hand to a model
export interface ToolDescriptor {
  name: string;
  description: string;
  argumentSchema: SchemaDescription;
}

// Tool invocation request from the model (untrusted)
export interface ToolCallRequest {
  id: string;
  toolName: string;
  // JSON text or an already decoded map
  rawArguments: unknown;
}

// Tool execution result, frozen once created
export interface ToolCallResult {
  readonly id: string;
  readonly toolName: string;
  readonly resolvedArguments: Readonly<Record<string, unknown>>;
  readonly success: boolean;
  readonly output?: unknown;
  readonly error?: string;
  readonly startTime: Date;
  readonly endTime: Date;
  readonly durationMs: number;
}

// Event: Tool requested (emitted when tool execution starts)
export interface ToolRequestedEvent {
  type: 'tool_requested';
  requestId: string;
  toolName: string;
  rawArguments: unknown;
  timestamp: Date;
}

// Event: Tool execution finished (emitted when tool completes)
export interface ToolExecutionFinishedEvent {
  type: 'tool_execution_finished';
  requestId: string;
  toolName: string;
  success: boolean;
  resolvedArguments: Readonly<Record<string, unknown>>;
  result?: unknown;
  error?: string;
  startTime: Date;
  endTime: Date;
  durationMs: number;
  timestamp: Date;
}

// Union of all tool events
export type ToolEvent = ToolRequestedEvent | ToolExecutionFinishedEvent;

// Event callback type
export type ToolEventCallback = (event: ToolEvent) => void;
