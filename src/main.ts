#!/usr/bin/env node
import 'dotenv/config';
import { Agent } from './agents/agent.js';
import { loadConfig } from './config/index.js';
import { createModelClient } from './llm/factory.js';
import { t } from './schema/builders.js';
import { Task } from './tasks/task.js';
import { defineTool } from './tools/function-tool.js';

const USAGE = 'Usage: toolbridge "<task description>"';

async function main(): Promise<void> {
  const description = process.argv.slice(2).join(' ').trim();
  if (!description) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const model = createModelClient(config);

  const currentDate = defineTool({
    name: 'current_date',
    description: 'Return the current date and time as an ISO 8601 string.',
    parameters: [
      {
        name: 'timeZone',
        type: t.string(),
        description: 'IANA time zone name, e.g. "America/Sao_Paulo"',
        default: 'UTC',
      },
    ],
    maxDepth: config.schemaMaxDepth,
    handler: (args) => {
      const timeZone = typeof args.timeZone === 'string' ? args.timeZone : 'UTC';
      return new Date().toLocaleString('sv-SE', { timeZone }).replace(' ', 'T');
    },
  });

  const agent = new Agent({
    role: 'Assistant',
    goal: 'Complete the task accurately, calling tools when they help',
    backstory: 'You are a careful assistant who double-checks facts before answering.',
    model,
    tools: [currentDate],
    memory: config.memory,
    maxRounds: config.maxRounds,
  });

  const task = new Task({
    description,
    expectedOutput: 'A direct, complete answer to the task.',
  });

  console.log(`
  Provider: ${model.name}/${model.model}
  Max rounds: ${config.maxRounds}
`);

  const output = await agent.executeTask(task);
  console.log(output.toString());
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
