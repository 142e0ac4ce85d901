export { BaseTool, schemaFromParameters, type BaseToolConfig, type ToolParameter } from './base-tool.js';
export { FunctionTool, defineTool, type FunctionToolConfig, type ToolHandler } from './function-tool.js';
export {
  StructuredOutputTool,
  STRUCTURED_OUTPUT_TOOL_NAME,
  type StructuredOutputToolOptions,
} from './structured-output-tool.js';
export { ToolRunner, type ToolRunnerConfig } from './runner.js';
export {
  ToolUsageLedger,
  type ToolUsageLedgerOptions,
  type ToolUsageSummary,
  type ToolUsageSummaryEntry,
  type ToolUsageJSON,
} from './usage.js';
export type * from './types.js';
