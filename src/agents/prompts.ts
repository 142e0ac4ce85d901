// Prompt slices for role-playing agents and task execution

export const PROMPT_SLICES = {
  rolePlaying: 'You are {role}. {backstory}\nYour personal goal is: {goal}',
  task: 'Current Task: {input}',
  expectedOutput:
    'This is the expected criteria for your final answer: {expected_output}\nYou MUST return the actual complete content as the final answer, not a summary.',
  structuredOutput:
    'Your final answer must match this format:\n{output_format}\nSubmit it by calling the `{tool_name}` tool with these fields.',
  toolsAvailable: 'You have access to the following tools. Call them when they help with the task:\n{tools}',
} as const;

export interface PromptTemplate {
  // Seeded once per conversation
  system?: string;
  // Appended on every invocation; `{input}` is replaced with the invocation input
  user: string;
}

/**
 * Replace `{key}` placeholders with the given values; unknown placeholders are left as they are.
 */
export function fillSlice(slice: string, values: Record<string, string>): string {
  return slice.replace(/\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

export interface RolePlayingIdentity {
  role: string;
  goal: string;
  backstory: string;
}

export function buildTaskExecutionPrompt(identity: RolePlayingIdentity, toolSummary?: string): PromptTemplate {
  let system = fillSlice(PROMPT_SLICES.rolePlaying, {
    role: identity.role,
    backstory: identity.backstory,
    goal: identity.goal,
  });

  if (toolSummary) {
    system += `\n\n${fillSlice(PROMPT_SLICES.toolsAvailable, { tools: toolSummary })}`;
  }

  return { system, user: PROMPT_SLICES.task };
}
