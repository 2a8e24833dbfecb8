/**
 * Tests for the tool-loop decorator (src/llm/tool-loop.ts) and the shared
 * tool-call executor (src/tools/executor.ts).
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolLoopProvider, DEFAULT_MAX_TOOL_LOOPS } from '../llm/tool-loop';
import { executeToolCall, MAX_TOOL_OUTPUT_CHARS } from '../tools/executor';
import { ToolRegistry } from '../tools/types';
import { LoopBudgetExceededError, UnknownToolError, ValidationError } from '../utils/errors';
import { FakeProvider, toolCall } from './fakes';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function registry(output: (key: string) => string = key => `value-for-${key}`): ToolRegistry {
  const tools = new ToolRegistry();
  const input = z.object({ key: z.string() });
  tools.register({
    name: 'lookup',
    description: 'Look a key up',
    inputSchema: input,
    category: 'builtin',
    execute: async raw => ({ output: output(input.parse(raw).key), isError: false }),
  });
  return tools;
}

// ---------------------------------------------------------------------------
// ToolLoopProvider
// ---------------------------------------------------------------------------

describe('ToolLoopProvider', () => {
  it('resolves tool calls until the model answers in text', async () => {
    const call = toolCall('lookup', { key: 'a' });
    const inner = new FakeProvider('fake', [{ toolCalls: [call] }, { content: 'The value is value-for-a' }]);
    const provider = new ToolLoopProvider(inner, registry());

    const response = await provider.complete({ messages: [{ role: 'user', content: 'what is a?' }] });

    expect(response.content).toBe('The value is value-for-a');
    expect(inner.toolRequests).toHaveLength(2);
    expect(inner.toolRequests[1].messages.slice(1)).toEqual([
      { role: 'assistant', content: '', toolCalls: [call] },
      { role: 'tool', name: 'lookup', toolCallId: call.id, content: 'value-for-a' },
    ]);
    expect(provider.name).toBe('tool-loop(fake)');
  });

  it('raises UnknownToolError for a tool the registry lacks', async () => {
    const inner = new FakeProvider('fake', [{ toolCalls: [toolCall('delete_everything', {})] }]);
    const provider = new ToolLoopProvider(inner, registry());

    await expect(provider.complete({ messages: [] })).rejects.toBeInstanceOf(UnknownToolError);
  });

  it('raises LoopBudgetExceededError when the model never stops calling tools', async () => {
    const script = Array.from({ length: 10 }, (_, i) => ({ toolCalls: [toolCall('lookup', { key: `k${i}` })] }));
    const inner = new FakeProvider('fake', script);
    const provider = new ToolLoopProvider(inner, registry(), { maxLoops: 3 });

    await expect(provider.complete({ messages: [] })).rejects.toThrow('Tool loop exceeded 3 rounds');
    expect(inner.toolRequests).toHaveLength(3);
  });

  it('allows DEFAULT_MAX_TOOL_LOOPS rounds by default', async () => {
    const script = Array.from({ length: 10 }, () => ({ toolCalls: [toolCall('lookup', { key: 'k' })] }));
    const inner = new FakeProvider('fake', script);

    await expect(new ToolLoopProvider(inner, registry()).complete({ messages: [] })).rejects.toBeInstanceOf(
      LoopBudgetExceededError
    );
    expect(inner.toolRequests).toHaveLength(DEFAULT_MAX_TOOL_LOOPS);
  });

  it('refuses caller-supplied tools', async () => {
    const provider = new ToolLoopProvider(new FakeProvider('fake'), registry());
    const tools = registry().toToolSchemas();

    await expect(provider.completeWithTools({ messages: [], tools })).rejects.toBeInstanceOf(ValidationError);
  });

  it('passes straight through when the registry is empty', async () => {
    const inner = new FakeProvider('fake', [{ content: 'plain' }]);
    const response = await new ToolLoopProvider(inner, new ToolRegistry()).complete({ messages: [] });

    expect(response.content).toBe('plain');
    expect(inner.toolRequests).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// executeToolCall
// ---------------------------------------------------------------------------

describe('executeToolCall', () => {
  it('reports invalid JSON arguments', async () => {
    const result = await executeToolCall(
      { id: '1', type: 'function', function: { name: 'lookup', arguments: '{key' } },
      registry()
    );
    expect(result).toEqual({
      output: '',
      error: "Failed to parse tool arguments as JSON for 'lookup': {key",
      isError: true,
    });
  });

  it('reports arguments that fail the input schema', async () => {
    const result = await executeToolCall(toolCall('lookup', { key: 7 }), registry());
    expect(result.isError).toBe(true);
    expect(result.error).toBe("Invalid arguments for 'lookup': key: Expected string, received number");
  });

  it('truncates oversized output', async () => {
    const result = await executeToolCall(
      toolCall('lookup', { key: 'big' }),
      registry(() => 'x'.repeat(MAX_TOOL_OUTPUT_CHARS + 5))
    );
    expect(result.output).toBe(`${'x'.repeat(MAX_TOOL_OUTPUT_CHARS)}\n... [truncated 5 characters]`);
  });
});
