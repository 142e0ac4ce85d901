import { describe, it, expect, vi, beforeEach } from 'vitest';
import { t } from '../../schema/builders.js';
import { defineTool } from '../function-tool.js';
import { ToolRunner } from '../runner.js';
import type { ToolEvent } from '../types.js';

const echo = defineTool({
  name: 'echo',
  description: 'Repeat the text',
  parameters: [{ name: 'text', type: t.string() }],
  handler: (args) => ({ text: args.text }),
});

const explode = defineTool({
  name: 'explode',
  description: 'Always fails',
  parameters: [{ name: 'text', type: t.string() }],
  handler: () => {
    throw new Error('boom');
  },
});

describe('ToolRunner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should register tools once and keep the first', () => {
    const runner = new ToolRunner({ tools: [echo] });
    const impostor = defineTool({ name: 'echo', description: 'Other', parameters: [], handler: () => null });

    expect(runner.registerTool(impostor)).toBe(false);
    expect(runner.getTool('echo')).toBe(echo);
    expect(runner.hasTool('explode')).toBe(false);
    expect(console.error).toHaveBeenCalledWith("[ToolRunner] Tool 'echo' is already registered. Duplicate ignored.");
  });

  it('should list descriptors in registration order', () => {
    const runner = new ToolRunner({ tools: [explode, echo] });

    expect(runner.getToolDescriptors().map((descriptor) => descriptor.name)).toEqual(['explode', 'echo']);
  });

  it('should execute a tool and emit events around it', async () => {
    const runner = new ToolRunner({ tools: [echo] });
    const events: ToolEvent[] = [];
    runner.onToolEvent((event) => events.push(event));

    const result = await runner.executeTool({ id: 'call-1', toolName: 'echo', rawArguments: '{"text":"hi"}' });

    expect(result.success).toBe(true);
    expect(result.output).toEqual({ text: 'hi' });
    expect(result.resolvedArguments).toEqual({ text: 'hi' });
    expect(Object.isFrozen(result)).toBe(true);
    expect(result.durationMs).toBe(result.endTime.getTime() - result.startTime.getTime());
    expect(events.map((event) => event.type)).toEqual(['tool_requested', 'tool_execution_finished']);
    expect(events[0]).toMatchObject({ requestId: 'call-1', toolName: 'echo', rawArguments: '{"text":"hi"}' });
    expect(events[1]).toMatchObject({ requestId: 'call-1', success: true, result: { text: 'hi' } });
  });

  it('should turn a tool failure into an unsuccessful result', async () => {
    const runner = new ToolRunner({ tools: [explode] });

    const result = await runner.executeTool({ id: 'call-2', toolName: 'explode', rawArguments: { text: 'x' } });

    expect(result).toMatchObject({ id: 'call-2', success: false, error: 'boom', resolvedArguments: { text: 'x' } });
    expect(result.output).toBeUndefined();
    expect(console.error).toHaveBeenCalledWith("[ToolRunner] Tool 'explode' failed:", 'boom');
  });

  it('should report an unknown tool', async () => {
    const runner = new ToolRunner();

    const result = await runner.executeTool({ id: 'call-3', toolName: 'nope', rawArguments: {} });

    expect(result).toMatchObject({ success: false, error: 'Tool not found: nope', resolvedArguments: {} });
  });

  it('should record detached, frozen copies of arguments and output', async () => {
    const shared: string[] = [];
    const collect = defineTool({
      name: 'collect',
      description: 'Collect tags',
      parameters: [{ name: 'tags', type: t.array(t.string()) }],
      handler: (args) => {
        const tags = args.tags;
        if (Array.isArray(tags)) {
          tags.push('from-handler');
          shared.push(...tags.map(String));
        }
        return { tags: shared };
      },
    });
    const runner = new ToolRunner({ tools: [collect] });

    const result = await runner.executeTool({ id: 'c', toolName: 'collect', rawArguments: { tags: ['a'] } });
    shared.push('later');

    expect(result.resolvedArguments).toEqual({ tags: ['a'] });
    expect(result.output).toEqual({ tags: ['a', 'from-handler'] });
    expect(Object.isFrozen(result.resolvedArguments.tags)).toBe(true);
    expect(Object.isFrozen(result.output)).toBe(true);
  });

  it('should record an output that cannot be cloned as given', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const greet = () => 'hi';
    const factory = defineTool({ name: 'factory', description: 'Return a function', parameters: [], handler: () => greet });
    const runner = new ToolRunner({ tools: [factory] });

    const result = await runner.executeTool({ id: 'f', toolName: 'factory', rawArguments: {} });

    expect(result.success).toBe(true);
    expect(result.output).toBe(greet);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should isolate listener errors and support unsubscribe', async () => {
    const runner = new ToolRunner({ tools: [echo] });
    const seen: string[] = [];
    runner.onToolEvent(() => {
      throw new Error('listener broke');
    });
    const unsubscribe = runner.onToolEvent((event) => seen.push(event.type));

    await runner.executeTool({ id: 'a', toolName: 'echo', rawArguments: { text: '1' } });
    unsubscribe();
    const result = await runner.executeTool({ id: 'b', toolName: 'echo', rawArguments: { text: '2' } });

    expect(result.success).toBe(true);
    expect(seen).toEqual(['tool_requested', 'tool_execution_finished']);
    expect(console.error).toHaveBeenCalledWith('[ToolRunner] Event listener error:', new Error('listener broke'));
  });
});
