export { Agent, type AgentConfig } from './agent.js';
export { AgentExecutor, DEFAULT_MAX_ROUNDS, type AgentExecutorConfig } from './executor.js';
export { ConversationState } from './conversation.js';
export {
  PROMPT_SLICES,
  buildTaskExecutionPrompt,
  fillSlice,
  type PromptTemplate,
  type RolePlayingIdentity,
} from './prompts.js';
export type * from './types.js';
