/**
 * Tests for src/agent/supervisor.ts and the completion service in
 * src/agent/conversation.ts.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { CompletionSupervisor, DONE_TOOL, renderTranscript } from '../agent/supervisor';
import { AgentCompletionService, Conversation } from '../agent/conversation';
import { SUPERVISOR_INSTRUCTIONS } from '../agent/prompts';
import { ToolRegistry } from '../tools/types';
import { SupervisorError } from '../utils/errors';
import { wrap } from '../sections';
import { FakeProvider, toolCall } from './fakes';

// ---------------------------------------------------------------------------
// CompletionSupervisor
// ---------------------------------------------------------------------------

describe('CompletionSupervisor', () => {
  it('forces the done tool and returns its verdict', async () => {
    const provider = new FakeProvider('fake', [
      { toolCalls: [toolCall('done', { task: 'Add a title', next_steps: 'Bold it', is_complete: false })] },
    ]);
    const supervisor = new CompletionSupervisor(provider, { model: 'gpt-4o' });

    const verdict = await supervisor.checkDone(wrap('Hello'), [{ role: 'user', content: 'add a title' }]);

    expect(verdict).toEqual({ task: 'Add a title', nextSteps: 'Bold it', isComplete: false });
    const request = provider.toolRequests[0];
    expect(request.tools).toEqual([DONE_TOOL]);
    expect(request.toolChoice).toEqual({ type: 'function', function: { name: 'done' } });
    expect(request.model).toBe('gpt-4o');
    expect(request.messages[0]).toEqual({ role: 'system', content: SUPERVISOR_INSTRUCTIONS });
    expect(request.messages[1].content).toContain('The document as displayed:\nHello\n');
    expect(request.messages[1].content).toContain('user: add a title');
  });

  it('defaults missing next steps to an empty string', async () => {
    const provider = new FakeProvider('fake', [
      { toolCalls: [toolCall('done', { task: 'Add a title', is_complete: true })] },
    ]);
    const verdict = await new CompletionSupervisor(provider).checkDone(null, []);
    expect(verdict).toEqual({ task: 'Add a title', nextSteps: '', isComplete: true });
    expect(provider.toolRequests[0].messages[1].content).toContain('There is no document for this session');
  });

  it('rejects an answer without a done call', async () => {
    const provider = new FakeProvider('fake', [{ content: 'Looks finished to me' }]);
    await expect(new CompletionSupervisor(provider).checkDone(null, [])).rejects.toBeInstanceOf(SupervisorError);
  });

  it('rejects arguments that are not valid JSON', async () => {
    const provider = new FakeProvider('fake', [
      { toolCalls: [{ id: 'x', type: 'function', function: { name: 'done', arguments: '{task:' } }] },
    ]);
    await expect(new CompletionSupervisor(provider).checkDone(null, [])).rejects.toThrow(
      'Supervisor verdict is not valid JSON'
    );
  });

  it('rejects a verdict missing is_complete', async () => {
    const provider = new FakeProvider('fake', [{ toolCalls: [toolCall('done', { task: 'x' })] }]);
    await expect(new CompletionSupervisor(provider).checkDone(null, [])).rejects.toThrow(
      'Supervisor verdict has an unexpected shape'
    );
  });
});

describe('renderTranscript', () => {
  it('keeps user and assistant text only', () => {
    expect(
      renderTranscript([
        { role: 'system', content: 'rules' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: '' },
        { role: 'tool', content: '{"ok":true}', toolCallId: 'c1' },
        { role: 'assistant', content: 'hello' },
      ])
    ).toBe('user: hi\n\nassistant: hello');
  });
});

// ---------------------------------------------------------------------------
// AgentCompletionService
// ---------------------------------------------------------------------------

describe('AgentCompletionService', () => {
  function registryWithLookup(): ToolRegistry {
    const registry = new ToolRegistry();
    const input = z.object({ key: z.string() });
    registry.register({
      name: 'lookup',
      description: 'Look a key up',
      inputSchema: input,
      category: 'builtin',
      execute: async raw => ({ output: `value-for-${input.parse(raw).key}`, isError: false }),
    });
    return registry;
  }

  it('uses a plain completion when no tools are registered', async () => {
    const provider = new FakeProvider('fake', [{ content: 'Hi there' }]);
    const service = new AgentCompletionService(provider, new ToolRegistry(), { model: 'gpt-4o' });
    const conversation = new Conversation('be nice', 'conv-1');
    conversation.append({ role: 'user', content: 'hello' });

    const completion = await service.complete(conversation.state());

    expect(completion).toEqual({
      text: 'Hi there',
      toolCall: undefined,
      messages: [{ role: 'assistant', content: 'Hi there' }],
    });
    expect(provider.toolRequests).toEqual([]);
    expect(provider.requests[0]).toEqual({
      model: 'gpt-4o',
      messages: [
        { role: 'system', content: 'be nice' },
        { role: 'user', content: 'hello' },
      ],
    });
  });

  it('runs tool calls and returns their results as messages', async () => {
    const call = toolCall('lookup', { key: 'a' });
    const provider = new FakeProvider('fake', [{ content: 'Checking', toolCalls: [call] }]);
    const service = new AgentCompletionService(provider, registryWithLookup());

    const completion = await service.complete({ system: 's', messages: [{ role: 'user', content: 'go' }] });

    expect(completion.toolCall).toEqual(call);
    expect(completion.messages).toEqual([
      { role: 'assistant', content: 'Checking', toolCalls: [call] },
      { role: 'tool', name: 'lookup', toolCallId: call.id, content: 'value-for-a' },
    ]);
    expect(provider.toolRequests[0].toolChoice).toBe('auto');
  });

  it('reports an unknown tool back to the model instead of throwing', async () => {
    const call = toolCall('missing', {});
    const provider = new FakeProvider('fake', [{ toolCalls: [call] }]);
    const service = new AgentCompletionService(provider, registryWithLookup());

    const completion = await service.complete({ system: 's', messages: [] });

    expect(completion.messages[1]).toEqual({
      role: 'tool',
      name: 'missing',
      toolCallId: call.id,
      content: 'Error: Unknown tool: missing',
    });
  });
});
