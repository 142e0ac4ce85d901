import type { RecordInstance } from '../schema/types.js';
import { BaseTool } from './base-tool.js';
import type { BaseToolConfig } from './base-tool.js';

export type ToolHandler = (args: RecordInstance) => unknown;

export interface FunctionToolConfig extends BaseToolConfig {
  handler: ToolHandler;
}

/**
 * Tool backed by a plain callable.
 */
export class FunctionTool extends BaseTool {
  private handler: ToolHandler;

  constructor(config: FunctionToolConfig) {
    super(config);
    this.handler = config.handler;
  }

  async execute(args: RecordInstance): Promise<unknown> {
    return await this.handler(args);
  }
}

export function defineTool(config: FunctionToolConfig): FunctionTool {
  return new FunctionTool(config);
}
