import type { ToolCallResult } from '../tools/types.js';

/**
 * Serialize a tool output for a `tool` message.
 */
export function serializeToolOutput(output: unknown): string {
  if (typeof output === 'string') {
    return output;
  }
  if (output === undefined) {
    return 'null';
  }
  try {
    return JSON.stringify(output) ?? String(output);
  } catch {
    // Cycles and bigints
    return String(output);
  }
}

export function formatToolResultContent(result: ToolCallResult): string {
  if (result.success) {
    return serializeToolOutput(result.output);
  }
  return `Error: ${result.error || 'Unknown error'}`;
}
