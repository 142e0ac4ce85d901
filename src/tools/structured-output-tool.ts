/**
 * Structured Output Tool
 *
 * Exposes a record schema as a tool. The model "calls" it with the final
 * answer and the result is the validated instance, so a task can read its
 * structured output from the usage ledger.
 */

import type { RecordInstance, RecordSchema } from '../schema/types.js';
import { BaseTool } from './base-tool.js';

export const STRUCTURED_OUTPUT_TOOL_NAME = 'structured_output';

export interface StructuredOutputToolOptions {
  name?: string;
  description?: string;
}

export class StructuredOutputTool extends BaseTool {
  readonly outputSchema: RecordSchema;

  constructor(schema: RecordSchema, options: StructuredOutputToolOptions = {}) {
    super({
      name: options.name ?? STRUCTURED_OUTPUT_TOOL_NAME,
      description:
        options.description ??
        `Submit the final answer as a ${schema.name} object. Call this exactly once, when the answer is complete.`,
      argumentSchema: schema,
    });
    this.outputSchema = schema;
  }

  async execute(args: RecordInstance): Promise<RecordInstance> {
    return { ...args };
  }
}
