import { describe, it, expect, vi, beforeEach } from 'vitest';
import { field, record, t } from '../../schema/builders.js';
import { Task } from '../../tasks/task.js';
import { defineTool } from '../../tools/function-tool.js';
import { Agent } from '../agent.js';
import { ScriptedModel } from './scripted-model.js';

const City = record('City', [field('name', t.string()), field('population', t.integer())]);

function geographer(model: ScriptedModel, memory = false): Agent {
  return new Agent({ role: 'Geographer', goal: 'Answer precisely', backstory: 'Knows cities.', model, memory });
}

describe('Agent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should require an identity', () => {
    const model = new ScriptedModel([]);

    expect(() => new Agent({ role: ' ', goal: 'g', backstory: 'b', model })).toThrow('agent requires a role');
    expect(() => new Agent({ role: 'r', goal: '', backstory: 'b', model })).toThrow('agent requires a goal');
  });

  it('should read the structured answer from the output tool', async () => {
    const model = new ScriptedModel([
      { toolCalls: [{ id: 's1', name: 'structured_output', rawArguments: '{"name":"Porto","population":"231800"}' }] },
      { content: 'Porto has about 231800 people.' },
    ]);
    const task = new Task({ description: 'Name a city', expectedOutput: 'A city and its population', outputSchema: City });

    const output = await geographer(model).executeTask(task);

    expect(output.structured).toEqual({ name: 'Porto', population: 231800 });
    expect(output.outputFormat).toBe('structured');
    expect(output.raw).toBe('Porto has about 231800 people.');
    expect(output.toString()).toBe('{"name":"Porto","population":231800}');
    expect(task.output).toBe(output);
    expect(model.requests[0].tools).toEqual(['structured_output']);
    expect(model.requests[0].messages).toEqual([
      {
        role: 'system',
        content: [
          'You are Geographer. Knows cities.',
          'Your personal goal is: Answer precisely',
          '',
          'You have access to the following tools. Call them when they help with the task:',
          '- structured_output: Submit the final answer as a City object. Call this exactly once, when the answer is complete.',
        ].join('\n'),
      },
      {
        role: 'user',
        content: [
          'Current Task: Name a city',
          'This is the expected criteria for your final answer: A city and its population',
          'You MUST return the actual complete content as the final answer, not a summary.',
          'Your final answer must match this format:',
          '{',
          '  "name": string,',
          '  "population": integer',
          '}',
          'Submit it by calling the `structured_output` tool with these fields.',
        ].join('\n'),
      },
    ]);
  });

  it('should keep the ledger intact when the task output is changed', async () => {
    const Tagged = record('Tagged', [field('value', t.number()), field('tags', t.array(t.string()))]);
    const model = new ScriptedModel([
      { toolCalls: [{ id: 's1', name: 'structured_output', rawArguments: { value: 1, tags: ['a'] } }] },
      { content: 'ok' },
    ]);
    const agent = geographer(model);

    const output = await agent.executeTask(new Task({ description: 'Tag it', expectedOutput: 'Tags', outputSchema: Tagged }));
    const structured = output.structured ?? {};
    structured.value = 999;
    const tags = structured.tags;
    if (Array.isArray(tags)) {
      tags.push('injected');
    }

    const ledger = agent.executor?.ledger;
    expect(ledger?.getLastResult('structured_output')).toEqual({ value: 1, tags: ['a'] });
    expect(ledger?.toolCalls[0].resolvedArguments).toEqual({ value: 1, tags: ['a'] });
    expect(structured).toEqual({ value: 999, tags: ['a', 'injected'] });
  });

  it('should fall back to the raw answer when no structured output was submitted', async () => {
    const model = new ScriptedModel([{ content: 'Lisbon' }]);
    const task = new Task({ description: 'Name a city', expectedOutput: 'A city', outputSchema: City });

    const output = await geographer(model).executeTask(task);

    expect(output.structured).toBeUndefined();
    expect(output.outputFormat).toBe('raw');
    expect(output.toString()).toBe('Lisbon');
    expect(console.warn).toHaveBeenCalledWith('[Geographer] Task finished without a structured output');
  });

  it('should offer the given tools instead of its own', async () => {
    const own = defineTool({ name: 'atlas', description: 'Open the atlas', parameters: [], handler: () => 'map' });
    const extra = defineTool({ name: 'census', description: 'Query the census', parameters: [], handler: () => 1 });
    const model = new ScriptedModel([{ content: 'done' }]);
    const agent = new Agent({ role: 'Geographer', goal: 'g', backstory: 'b', model, tools: [own] });

    await agent.executeTask(new Task({ description: 'Count', expectedOutput: 'A number' }), [extra]);

    expect(model.requests[0].tools).toEqual(['census']);
    expect(agent.executor?.ledger?.size).toBe(0);
  });

  it('should carry the conversation across tasks when memory is on', async () => {
    const model = new ScriptedModel([{ content: 'Porto' }, { content: 'Braga' }]);
    const agent = geographer(model, true);

    await agent.executeTask(new Task({ description: 'First city', expectedOutput: 'A city' }));
    await agent.executeTask(new Task({ description: 'Second city', expectedOutput: 'A city' }));

    expect(model.requests[1].messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'user']);

    agent.clearMemory();
    expect(agent.executor?.messages.map((message) => message.role)).toEqual(['system']);
  });

  it('should refresh the system prompt for each task when memory is on', async () => {
    const model = new ScriptedModel([
      { content: 'Porto' },
      { toolCalls: [{ id: 's1', name: 'structured_output', rawArguments: { name: 'Braga', population: 193000 } }] },
      { content: 'Braga' },
    ]);
    const agent = geographer(model, true);

    await agent.executeTask(new Task({ description: 'First city', expectedOutput: 'A city' }));
    const output = await agent.executeTask(
      new Task({ description: 'Second city', expectedOutput: 'A city', outputSchema: City })
    );

    expect(model.requests[0].messages[0].content).toBe('You are Geographer. Knows cities.\nYour personal goal is: Answer precisely');
    expect(model.requests[1].messages[0].content).toBe(
      [
        'You are Geographer. Knows cities.',
        'Your personal goal is: Answer precisely',
        '',
        'You have access to the following tools. Call them when they help with the task:',
        '- structured_output: Submit the final answer as a City object. Call this exactly once, when the answer is complete.',
      ].join('\n')
    );
    expect(model.requests[1].messages.filter((message) => message.role === 'system')).toHaveLength(1);
    expect(output.structured).toEqual({ name: 'Braga', population: 193000 });
  });
});
