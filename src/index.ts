export * from './schema/index.js';
export * from './parser/index.js';
export * from './tools/index.js';
export * from './llm/index.js';
export * from './agents/index.js';
export * from './tasks/index.js';
export { loadConfig, ConfigError, type AppConfig } from './config/index.js';
export { formatToolResultContent, serializeToolOutput } from './utils/tool-results.js';
